// src/agents/llm/openai-client.ts
// OpenAI 协议客户端：openai / deepseek / qwen / zhipu 共用

import OpenAI from 'openai';
import type { LLMConfig } from '../../config/schema.js';
import { contentToText, type ChatResult, type Message } from '../../types.js';
import type { ToolSchema } from '../tools/types.js';
import { createLogger } from '../../utils/logger.js';
import { ProviderResponseError, toProviderError } from './errors.js';
import { missingImageNote, toDataUrl, tryResolveImage } from './image-inline.js';
import type { ChatOptions, LLMClient } from './types.js';

const log = createLogger('LLM');

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;
type OpenAIContentPart = OpenAI.Chat.ChatCompletionContentPart;

async function toOpenAIUserContent(content: Message['content']): Promise<string | OpenAIContentPart[]> {
  if (typeof content === 'string') {
    return content;
  }

  const parts: OpenAIContentPart[] = [];
  for (const part of content) {
    if (part.type === 'text') {
      parts.push({ type: 'text', text: part.text });
    } else {
      const image = await tryResolveImage(part.path);
      parts.push(image
        ? { type: 'image_url', image_url: { url: toDataUrl(image) } }
        : { type: 'text', text: missingImageNote(part.path) });
    }
  }
  return parts;
}

/**
 * 规范消息 → Chat Completions 消息；system 消息保留在列表中
 */
export async function toOpenAIMessages(messages: Message[]): Promise<OpenAIMessage[]> {
  const result: OpenAIMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        result.push({ role: 'system', content: contentToText(msg.content) });
        break;

      case 'user':
        result.push({ role: 'user', content: await toOpenAIUserContent(msg.content) });
        break;

      case 'assistant': {
        const text = contentToText(msg.content);
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          result.push({
            role: 'assistant',
            content: text || null,
            tool_calls: msg.toolCalls.map(tc => ({
              id: tc.id,
              type: 'function' as const,
              function: { name: tc.name, arguments: tc.arguments },
            })),
          });
        } else {
          result.push({ role: 'assistant', content: text });
        }
        break;
      }

      case 'tool':
        result.push({
          role: 'tool',
          tool_call_id: msg.toolCallId ?? '',
          content: contentToText(msg.content),
        });
        break;
    }
  }

  return result;
}

export function toOpenAITool(schema: ToolSchema): OpenAI.Chat.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: schema.function.name,
      description: schema.function.description,
      parameters: schema.function.parameters,
    },
  };
}

// ChatCompletion / ChatCompletionChunk 中解析时用到的字段
export interface OpenAICompletionLike {
  choices: Array<{
    message: {
      content: string | null;
      tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
    };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
}

export interface OpenAIChunkLike {
  choices: Array<{ delta?: { content?: string | null } }>;
}

export function parseOpenAIResponse(provider: string, completion: OpenAICompletionLike): ChatResult {
  const message = completion.choices[0]?.message;
  if (!message) {
    throw new ProviderResponseError(provider, `${provider} 响应中没有 choices`);
  }

  const toolCalls = (message.tool_calls ?? []).map((tc, index) => ({
    id: tc.id || `call_${index}`,
    name: tc.function.name,
    arguments: tc.function.arguments || '{}',
  }));

  return {
    content: message.content ?? null,
    toolCalls,
    usage: {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
    },
  };
}

export async function* openAITextDeltas(
  stream: AsyncIterable<OpenAIChunkLike>
): AsyncGenerator<string> {
  for await (const chunk of stream) {
    const delta = chunk.choices[0]?.delta?.content;
    if (delta) {
      yield delta;
    }
  }
}

export class OpenAICompatClient implements LLMClient {
  readonly provider: LLMConfig['provider'];
  readonly model: string;
  private client: OpenAI;

  constructor(private config: LLMConfig, client?: OpenAI) {
    this.provider = config.provider;
    this.model = config.model;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries,
    });
    log.debug(`Created ${config.provider} client: model=${config.model}, baseURL=${config.baseURL ?? 'default'}`);
  }

  private async buildParams(
    messages: Message[],
    tools?: ToolSchema[]
  ): Promise<OpenAI.Chat.ChatCompletionCreateParamsNonStreaming> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: await toOpenAIMessages(messages),
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
    };
    if (tools && tools.length > 0) {
      params.tools = tools.map(toOpenAITool);
      params.tool_choice = 'auto';
    }
    return params;
  }

  private requestOptions(options?: ChatOptions) {
    return {
      signal: options?.signal,
      timeout: options?.timeoutMs ?? this.config.timeoutMs,
    };
  }

  async chat(messages: Message[], tools?: ToolSchema[], options?: ChatOptions): Promise<ChatResult> {
    const params = await this.buildParams(messages, tools);
    log.debug(`${this.provider} chat: messages=${params.messages.length}, tools=${tools?.length ?? 0}`);

    try {
      const completion = await this.client.chat.completions.create(params, this.requestOptions(options));
      return parseOpenAIResponse(this.provider, completion);
    } catch (error) {
      throw toProviderError(this.provider, error);
    }
  }

  async *chatStream(messages: Message[], tools?: ToolSchema[], options?: ChatOptions): AsyncGenerator<string> {
    const params = await this.buildParams(messages, tools);

    try {
      const stream = await this.client.chat.completions.create(
        { ...params, stream: true },
        this.requestOptions(options)
      );
      yield* openAITextDeltas(stream);
    } catch (error) {
      throw toProviderError(this.provider, error);
    }
  }
}
