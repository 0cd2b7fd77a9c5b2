// src/utils/logger.ts
// 带标签的控制台日志，级别由 LOG_LEVEL 控制

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL || 'warn').toLowerCase();
  return LEVEL_ORDER[isLogLevel(raw) ? raw : 'warn'];
}

function silenced(): boolean {
  return process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const write = (level: LogLevel, args: unknown[]): void => {
    if (silenced() || LEVEL_ORDER[level] < threshold()) return;
    switch (level) {
      case 'debug':
        console.debug(prefix, ...args);
        break;
      case 'info':
        console.log(prefix, ...args);
        break;
      case 'warn':
        console.warn(prefix, ...args);
        break;
      case 'error':
        console.error(prefix, ...args);
        break;
    }
  };

  return {
    debug: (...args) => write('debug', args),
    info: (...args) => write('info', args),
    warn: (...args) => write('warn', args),
    error: (...args) => write('error', args),
  };
}
