// src/agents/errors.ts

/**
 * 回合被取消（AbortSignal 触发或对话在回合中被重置），该回合的结果全部丢弃
 */
export class TurnAbortedError extends Error {
  constructor(message = '当前回合已取消') {
    super(message);
    this.name = 'TurnAbortedError';
  }
}
