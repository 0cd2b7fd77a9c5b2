// src/cli/args.ts

import { parseArgs } from 'node:util';
import { LLMProviderSchema, type LLMProvider } from '../config/schema.js';

export interface CliOptions {
  provider?: LLMProvider;
  docs?: string;
  memory: boolean;
  tools: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `用法: conversa [选项]

选项:
  --provider <name>  LLM 提供商 (${LLMProviderSchema.options.join(' | ')})
  --docs <dir>       文档搜索路径
  --no-memory        禁用记忆功能
  --no-tools         禁用工具功能
  -h, --help         显示帮助`;

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        provider: { type: 'string' },
        docs: { type: 'string' },
        'no-memory': { type: 'boolean' },
        'no-tools': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);

  let provider: LLMProvider | undefined;
  if (values.provider !== undefined) {
    const parsed = LLMProviderSchema.safeParse(values.provider);
    if (!parsed.success) {
      throw new CliUsageError(`未知的提供商: ${values.provider}`);
    }
    provider = parsed.data;
  }

  return {
    provider,
    docs: values.docs,
    memory: !values['no-memory'],
    tools: !values['no-tools'],
    help: Boolean(values.help),
  };
}
