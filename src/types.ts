// src/types.ts

// Conversation types
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImagePart {
  type: 'image';
  path: string;  // 本地路径、http(s) URL 或 data URL
}

export type ContentPart = TextPart | ImagePart;

export type MessageContent = string | ContentPart[];

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;  // 原始 JSON 字符串
}

export interface Message {
  role: MessageRole;
  content: MessageContent;
  toolName?: string;       // 仅 tool 角色
  toolCallId?: string;     // 仅 tool 角色
  toolCalls?: ToolCall[];  // 仅 assistant 角色
}

// LLM types
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ChatResult {
  content: string | null;
  toolCalls: ToolCall[];
  usage: TokenUsage;
}

/**
 * 取出消息中的纯文本部分（多模态内容只拼接 text part）
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .filter((part): part is TextPart => part.type === 'text')
    .map(part => part.text)
    .join('\n');
}
