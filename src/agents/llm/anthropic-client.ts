// src/agents/llm/anthropic-client.ts

import Anthropic from '@anthropic-ai/sdk';
import type { LLMConfig } from '../../config/schema.js';
import { contentToText, type ChatResult, type Message, type ToolCall } from '../../types.js';
import type { ToolSchema } from '../tools/types.js';
import { createLogger } from '../../utils/logger.js';
import { toProviderError } from './errors.js';
import { missingImageNote, tryResolveImage } from './image-inline.js';
import type { ChatOptions, LLMClient } from './types.js';

const log = createLogger('LLM');

type AnthropicBlock = Exclude<Anthropic.MessageParam['content'], string>[number];
type ToolResultBlock = Extract<AnthropicBlock, { type: 'tool_result' }>;

export interface AnthropicRequest {
  system?: string;
  messages: Anthropic.MessageParam[];
}

async function toAnthropicUserContent(content: Message['content']): Promise<string | AnthropicBlock[]> {
  if (typeof content === 'string') {
    return content;
  }

  const blocks: AnthropicBlock[] = [];
  for (const part of content) {
    if (part.type === 'text') {
      blocks.push({ type: 'text', text: part.text });
      continue;
    }
    const image = await tryResolveImage(part.path);
    if (!image) {
      blocks.push({ type: 'text', text: missingImageNote(part.path) });
    } else if (image.kind === 'base64') {
      blocks.push({
        type: 'image',
        source: { type: 'base64', media_type: image.mediaType, data: image.data },
      });
    } else {
      // 远程 URL 无法作为图片块发送，降级为文本说明
      log.warn('Anthropic does not accept image URLs, sending as text:', image.url);
      blocks.push({ type: 'text', text: `[图片: ${image.url}]` });
    }
  }
  return blocks;
}

function parseToolInput(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    log.warn('Tool call arguments are not valid JSON, sending empty input:', error);
  }
  return {};
}

/**
 * 规范消息 → Messages API 请求体
 * system 消息提取到 system 字段；连续的 tool 结果合并到同一条 user 消息
 */
export async function toAnthropicRequest(messages: Message[]): Promise<AnthropicRequest> {
  const systemParts: string[] = [];
  const result: Anthropic.MessageParam[] = [];
  let pendingResults: ToolResultBlock[] | null = null;

  for (const msg of messages) {
    if (msg.role === 'tool') {
      const block: ToolResultBlock = {
        type: 'tool_result',
        tool_use_id: msg.toolCallId ?? '',
        content: contentToText(msg.content),
      };
      if (pendingResults) {
        pendingResults.push(block);
      } else {
        pendingResults = [block];
        result.push({ role: 'user', content: pendingResults });
      }
      continue;
    }
    pendingResults = null;

    switch (msg.role) {
      case 'system':
        systemParts.push(contentToText(msg.content));
        break;

      case 'user':
        result.push({ role: 'user', content: await toAnthropicUserContent(msg.content) });
        break;

      case 'assistant': {
        const text = contentToText(msg.content);
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          const blocks: AnthropicBlock[] = [];
          if (text) {
            blocks.push({ type: 'text', text });
          }
          for (const tc of msg.toolCalls) {
            blocks.push({ type: 'tool_use', id: tc.id, name: tc.name, input: parseToolInput(tc.arguments) });
          }
          result.push({ role: 'assistant', content: blocks });
        } else {
          result.push({ role: 'assistant', content: text });
        }
        break;
      }
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    messages: result,
  };
}

export function toAnthropicTool(schema: ToolSchema): Anthropic.Tool {
  const { properties, required } = schema.function.parameters;
  return {
    name: schema.function.name,
    description: schema.function.description,
    input_schema: { type: 'object', properties, required },
  };
}

// Message 中解析时用到的字段
export interface AnthropicResponseLike {
  content: Array<
    | { type: 'text'; text: string }
    | { type: 'tool_use'; id: string; name: string; input: unknown }
  >;
  usage?: { input_tokens: number; output_tokens: number };
}

export function parseAnthropicResponse(message: AnthropicResponseLike): ChatResult {
  let text = '';
  const toolCalls: ToolCall[] = [];

  for (const block of message.content) {
    if (block.type === 'text') {
      text += block.text;
    } else if (block.type === 'tool_use') {
      toolCalls.push({
        id: block.id,
        name: block.name,
        arguments: JSON.stringify(block.input ?? {}),
      });
    }
  }

  return {
    content: text.length > 0 ? text : null,
    toolCalls,
    usage: {
      promptTokens: message.usage?.input_tokens ?? 0,
      completionTokens: message.usage?.output_tokens ?? 0,
    },
  };
}

export async function* anthropicTextDeltas(
  stream: AsyncIterable<Anthropic.RawMessageStreamEvent>
): AsyncGenerator<string> {
  for await (const event of stream) {
    if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
      yield event.delta.text;
    }
  }
}

export class AnthropicClient implements LLMClient {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;

  constructor(private config: LLMConfig, client?: Anthropic) {
    this.model = config.model;
    this.client = client ?? new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
    log.debug(`Created anthropic client: model=${config.model}`);
  }

  private requestOptions(options?: ChatOptions) {
    return {
      signal: options?.signal,
      timeout: options?.timeoutMs ?? this.config.timeoutMs,
    };
  }

  async chat(messages: Message[], tools?: ToolSchema[], options?: ChatOptions): Promise<ChatResult> {
    const request = await toAnthropicRequest(messages);
    log.debug(`anthropic chat: messages=${request.messages.length}, tools=${tools?.length ?? 0}`);

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: request.system,
        messages: request.messages,
        tools: tools && tools.length > 0 ? tools.map(toAnthropicTool) : undefined,
      }, this.requestOptions(options));
      return parseAnthropicResponse(response);
    } catch (error) {
      throw toProviderError(this.provider, error);
    }
  }

  async *chatStream(messages: Message[], tools?: ToolSchema[], options?: ChatOptions): AsyncGenerator<string> {
    const request = await toAnthropicRequest(messages);

    try {
      const stream = await this.client.messages.create({
        model: this.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: request.system,
        messages: request.messages,
        tools: tools && tools.length > 0 ? tools.map(toAnthropicTool) : undefined,
        stream: true,
      }, this.requestOptions(options));
      yield* anthropicTextDeltas(stream);
    } catch (error) {
      throw toProviderError(this.provider, error);
    }
  }
}
