// src/agents/llm/errors.ts

import { ErrorClassifier } from '../../reliability/error-classifier.js';
import { ErrorCategory } from '../../reliability/types.js';

const classifier = new ErrorClassifier();

interface ProviderErrorOptions {
  category?: ErrorCategory;
  userMessage?: string;
  cause?: unknown;
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly category: ErrorCategory;
  readonly userMessage: string;

  constructor(provider: string, message: string, options: ProviderErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.category = options.category ?? ErrorCategory.UNKNOWN;
    this.userMessage = options.userMessage ?? message;
  }
}

/**
 * 提供商未配置、密钥缺失或认证失败
 */
export class ProviderConfigError extends ProviderError {
  constructor(provider: string, message: string, options: ProviderErrorOptions = {}) {
    super(provider, message, { category: ErrorCategory.CONFIGURATION, ...options });
    this.name = 'ProviderConfigError';
  }
}

/**
 * 网络、超时、限流或服务端返回的错误状态
 */
export class ProviderTransportError extends ProviderError {
  readonly status?: number;

  constructor(provider: string, message: string, options: ProviderErrorOptions & { status?: number } = {}) {
    super(provider, message, { category: ErrorCategory.EXTERNAL_SERVICE, ...options });
    this.name = 'ProviderTransportError';
    this.status = options.status;
  }
}

/**
 * 响应结构不符合预期（没有 choices、工具参数无法解析等）
 */
export class ProviderResponseError extends ProviderError {
  constructor(provider: string, message: string, options: ProviderErrorOptions = {}) {
    super(provider, message, { category: ErrorCategory.EXTERNAL_SERVICE, ...options });
    this.name = 'ProviderResponseError';
  }
}

/**
 * 发送时图片文件不可读
 */
export class ImageResourceError extends Error {
  readonly path: string;

  constructor(path: string, options: { cause?: unknown } = {}) {
    super(`图片文件不存在: ${path}`, { cause: options.cause });
    this.name = 'ImageResourceError';
    this.path = path;
  }
}

/**
 * 把 SDK 抛出的异常归类为 ProviderError 的某个子类
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const classified = classifier.classify(error, { component: `llm:${provider}` });
  const options = {
    category: classified.category,
    userMessage: classified.message,
    cause: error,
  };

  switch (classified.category) {
    case ErrorCategory.CONFIGURATION:
      return new ProviderConfigError(provider, `${provider} 认证或配置失败: ${classified.originalMessage}`, options);
    case ErrorCategory.USER_INPUT:
      return new ProviderResponseError(provider, `${provider} 响应无法解析: ${classified.originalMessage}`, options);
    default:
      return new ProviderTransportError(provider, `${provider} 请求失败: ${classified.originalMessage}`, {
        ...options,
        status: classified.status,
      });
  }
}
