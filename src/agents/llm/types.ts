// src/agents/llm/types.ts

import type { ChatResult, Message } from '../../types.js';
import type { LLMProvider } from '../../config/schema.js';
import type { ToolSchema } from '../tools/types.js';

export interface ChatOptions {
  signal?: AbortSignal;
  timeoutMs?: number;  // 覆盖配置中的 timeoutMs
}

/**
 * 统一的模型客户端接口，Agent 只依赖这一层
 */
export interface LLMClient {
  readonly provider: LLMProvider;
  readonly model: string;

  chat(messages: Message[], tools?: ToolSchema[], options?: ChatOptions): Promise<ChatResult>;

  /**
   * 文本增量流：惰性、有限、不可重放
   */
  chatStream(messages: Message[], tools?: ToolSchema[], options?: ChatOptions): AsyncIterable<string>;
}
