/**
 * Error Classifier
 *
 * Categorizes errors from their HTTP status (when the error carries one),
 * their name and their message, and attaches a user-facing message.
 */

import {
  ErrorCategory,
  type ClassifiedError,
  type ErrorContext,
  generateErrorId
} from './types.js';

const NETWORK_PATTERNS = [
  'connection refused',
  'econnrefused',
  'timeout',
  'timed out',
  'enotfound',
  'econnreset',
  'socket hang up',
  'network error',
  'connection error',
  'fetch failed'
];

const SERVICE_PATTERNS = [
  'rate limit',
  'rate-limit',
  '429',
  'too many requests',
  'service unavailable',
  'server error',
  'overloaded',
  'bad gateway',
  'gateway timeout'
];

const USER_INPUT_PATTERNS = [
  'invalid json',
  'not valid json',
  'unexpected token',
  'parse error',
  'validation error',
  'invalid format',
  'invalid input',
  'malformed',
  'syntax error'
];

const SYSTEM_PATTERNS = [
  'out of memory',
  'enomem',
  'disk full',
  'enospc',
  'permission denied',
  'eacces',
  'file not found',
  'enoent'
];

const CONFIG_PATTERNS = [
  'config not found',
  'configuration error',
  'invalid api key',
  'incorrect api key',
  'api key',
  'authentication',
  'unauthorized',
  'invalid token',
  'missing configuration'
];

const NETWORK_ERROR_NAMES = ['APIConnectionError', 'APIConnectionTimeoutError', 'AbortError'];

// JSON.parse 等解析失败，说明收到的内容本身不合法
const PARSE_ERROR_NAMES = ['SyntaxError'];

/**
 * Reads a numeric `status` off SDK errors without trusting their shape
 */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

export class ErrorClassifier {
  /**
   * Classify an error based on its status, name and message
   */
  classify(error: unknown, context: Partial<ErrorContext> = {}): ClassifiedError {
    const originalMessage = error instanceof Error ? error.message : String(error);
    const name = error instanceof Error ? error.name : '';
    const status = errorStatus(error);

    const category = this.categorize(originalMessage.toLowerCase(), name, status);

    return {
      id: generateErrorId(),
      category,
      message: this.userMessage(category),
      originalMessage,
      status,
      recoverable: this.isRetryable(category),
      context: {
        timestamp: Date.now(),
        ...context
      }
    };
  }

  private categorize(message: string, name: string, status?: number): ErrorCategory {
    if (status !== undefined) {
      if (status === 401 || status === 403) return ErrorCategory.CONFIGURATION;
      if (status === 408) return ErrorCategory.NETWORK;
      if (status === 429 || status >= 500) return ErrorCategory.EXTERNAL_SERVICE;
      if (status >= 400) return ErrorCategory.EXTERNAL_SERVICE;
    }

    if (NETWORK_ERROR_NAMES.includes(name)) {
      return ErrorCategory.NETWORK;
    }

    if (PARSE_ERROR_NAMES.includes(name)) {
      return ErrorCategory.USER_INPUT;
    }

    // Check patterns in order of specificity
    if (CONFIG_PATTERNS.some(pattern => message.includes(pattern))) {
      return ErrorCategory.CONFIGURATION;
    }

    if (NETWORK_PATTERNS.some(pattern => message.includes(pattern))) {
      return ErrorCategory.NETWORK;
    }

    if (SERVICE_PATTERNS.some(pattern => message.includes(pattern))) {
      return ErrorCategory.EXTERNAL_SERVICE;
    }

    if (USER_INPUT_PATTERNS.some(pattern => message.includes(pattern))) {
      return ErrorCategory.USER_INPUT;
    }

    if (SYSTEM_PATTERNS.some(pattern => message.includes(pattern))) {
      return ErrorCategory.SYSTEM;
    }

    return ErrorCategory.UNKNOWN;
  }

  private isRetryable(category: ErrorCategory): boolean {
    switch (category) {
      case ErrorCategory.NETWORK:
      case ErrorCategory.EXTERNAL_SERVICE:
      case ErrorCategory.SYSTEM:
        return true;

      case ErrorCategory.USER_INPUT:
      case ErrorCategory.CONFIGURATION:
      case ErrorCategory.UNKNOWN:
      default:
        return false;
    }
  }

  private userMessage(category: ErrorCategory): string {
    switch (category) {
      case ErrorCategory.NETWORK:
        return '网络连接出现问题，请检查网络设置后重试。';

      case ErrorCategory.EXTERNAL_SERVICE:
        return 'AI 服务暂时不可用，请稍后重试。';

      case ErrorCategory.USER_INPUT:
        return '输入格式不正确，请检查后重新输入。';

      case ErrorCategory.SYSTEM:
        return '系统资源异常，请稍后重试。';

      case ErrorCategory.CONFIGURATION:
        return '模型配置有误，请检查 API Key 等配置。';

      case ErrorCategory.UNKNOWN:
      default:
        return '未知错误，请稍后重试。';
    }
  }
}
