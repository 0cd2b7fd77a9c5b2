// src/agents/conversation.ts

import type { Message } from '../types.js';

/**
 * 一次对话的消息记录：第一条永远是 system 消息
 */
export class ConversationContext {
  private messages: Message[];
  private epochCounter = 0;
  readonly metadata: Map<string, unknown> = new Map();

  constructor(private systemPrompt: string) {
    this.messages = [{ role: 'system', content: systemPrompt }];
  }

  /**
   * 每次 reset 递增，用于识别在回合进行中被清空的对话
   */
  get epoch(): number {
    return this.epochCounter;
  }

  get length(): number {
    return this.messages.length;
  }

  append(message: Message): void {
    if (message.role === 'system') {
      throw new Error('system 消息只能出现在对话开头');
    }
    this.messages.push(message);
  }

  all(): Message[] {
    return [...this.messages];
  }

  /**
   * 除 system 消息外的全部历史
   */
  history(): Message[] {
    return this.messages.slice(1);
  }

  /**
   * 最近 n 条非 system 消息；窗口向前扩展，避免以孤立的 tool 消息开头
   */
  recent(n: number): Message[] {
    const history = this.history();
    let start = Math.max(0, history.length - Math.max(0, n));
    while (start > 0 && start < history.length && history[start].role === 'tool') {
      start--;
    }
    return history.slice(start);
  }

  reset(): void {
    this.messages = [{ role: 'system', content: this.systemPrompt }];
    this.metadata.clear();
    this.epochCounter++;
  }
}
