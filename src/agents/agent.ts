// src/agents/agent.ts
// 多轮对话 Agent：记忆召回 → 调用模型 → 循环执行工具 → 生成回复 → 提取记忆

import type { ChatResult, Message, MessageContent } from '../types.js';
import type { MemoryItem, MemoryKind, UserProfile } from '../memory/types.js';
import type { MemoryManager } from '../memory/manager.js';
import { patternClassifier, type MemoryClassifier } from '../memory/classifier.js';
import { createLogger } from '../utils/logger.js';
import { buildMessageContent, parseImageMarker } from './content.js';
import { ConversationContext } from './conversation.js';
import { TurnAbortedError } from './errors.js';
import type { LLMClient } from './llm/types.js';
import type { ToolSchema } from './tools/types.js';
import type { ToolRegistry } from './tools/registry.js';

const log = createLogger('Agent');

// 单个回合最多执行的工具轮数
export const MAX_TOOL_ITERATIONS = 5;

export const FALLBACK_REPLY = '抱歉，我无法生成回复。';

export const DEFAULT_SYSTEM_PROMPT = `你是一个智能助手，能够帮助用户解答问题、完成任务。

你的特点：
1. 友好、专业、有帮助
2. 可以使用工具来获取信息或执行操作
3. 会记住用户的偏好和相关信息
4. 回答简洁明了，重点突出
5. 支持多模态：能够理解图片内容，并能生成或搜索图片

当你需要查找信息时，请使用搜索工具。
当用户分享个人信息时，请记住这些信息以便后续使用。
当用户询问图片相关内容或需要视觉素材时，使用图片工具。
`;

export interface ToolHooks {
  onToolCall?: (name: string, args: string) => void;
  onToolResult?: (name: string, result: string) => void;
}

export interface AgentOptions {
  client: LLMClient;
  tools?: ToolRegistry;
  memory?: MemoryManager;
  classifier?: MemoryClassifier;
  systemPrompt?: string;
  historyLimit?: number;
  toolsEnabled?: boolean;
  multimodalEnabled?: boolean;
  hooks?: ToolHooks;
}

export interface ChatTurnOptions {
  imagePath?: string;
  signal?: AbortSignal;
}

export interface HistoryEntry {
  role: Message['role'];
  content: MessageContent;
}


export class Agent {
  readonly context: ConversationContext;
  readonly systemPrompt: string;
  private client: LLMClient;
  private tools?: ToolRegistry;
  private memory?: MemoryManager;
  private classifier: MemoryClassifier;
  private historyLimit: number;
  private toolsEnabled: boolean;
  private multimodalEnabled: boolean;
  private hooks: ToolHooks;

  constructor(options: AgentOptions) {
    this.client = options.client;
    this.tools = options.tools;
    this.memory = options.memory;
    this.classifier = options.classifier ?? patternClassifier;
    this.systemPrompt = options.systemPrompt || DEFAULT_SYSTEM_PROMPT;
    this.historyLimit = options.historyLimit ?? 10;
    this.toolsEnabled = options.toolsEnabled ?? true;
    this.multimodalEnabled = options.multimodalEnabled ?? true;
    this.hooks = options.hooks ?? {};
    this.context = new ConversationContext(this.systemPrompt);
  }

  get model(): string {
    return this.client.model;
  }

  get memoryEnabled(): boolean {
    return this.memory !== undefined;
  }

  setToolHooks(hooks: ToolHooks): void {
    this.hooks = hooks;
  }

  private toolSchemas(): ToolSchema[] | undefined {
    if (!this.toolsEnabled || !this.tools || this.tools.size === 0) {
      return undefined;
    }
    return this.tools.getDefinitions();
  }

  private buildRequest(memoryContext: string): Message[] {
    const system = memoryContext
      ? `${this.systemPrompt}\n\n${memoryContext}`
      : this.systemPrompt;

    return [
      { role: 'system', content: system },
      ...this.context.recent(this.historyLimit),
    ];
  }

  /**
   * 进行一轮对话，返回最终回复
   */
  async chat(input: string, options: ChatTurnOptions = {}): Promise<string> {
    const { signal } = options;
    const epoch = this.context.epoch;
    const ensureActive = (): void => {
      if (signal?.aborted || this.context.epoch !== epoch) {
        throw new TurnAbortedError();
      }
    };
    ensureActive();

    let text = input;
    let imagePath = options.imagePath;
    if (!imagePath) {
      const parsed = parseImageMarker(input);
      text = parsed.text;
      imagePath = parsed.imagePath;
    }

    this.context.append({
      role: 'user',
      content: buildMessageContent(text, imagePath, { enabled: this.multimodalEnabled }),
    });

    const memoryContext = this.memory ? await this.memory.formatForContext(text) : '';
    ensureActive();

    const tools = this.toolSchemas();
    const callModel = async (): Promise<ChatResult> => {
      try {
        const result = await this.client.chat(this.buildRequest(memoryContext), tools, { signal });
        ensureActive();
        return result;
      } catch (error) {
        if (error instanceof TurnAbortedError) throw error;
        ensureActive();
        throw error;
      }
    };

    let result = await callModel();
    let iteration = 0;

    while (result.toolCalls.length > 0 && iteration < MAX_TOOL_ITERATIONS) {
      iteration++;
      log.debug(`Tool round ${iteration}:`, result.toolCalls.map(tc => tc.name));

      // 整批工具执行完才写入上下文，取消时不会留下没有结果的 tool_calls
      const batch: Message[] = [{
        role: 'assistant',
        content: result.content ?? '',
        toolCalls: result.toolCalls,
      }];

      for (const call of result.toolCalls) {
        this.hooks.onToolCall?.(call.name, call.arguments);
        const output = this.tools
          ? await this.tools.execute(call.name, call.arguments)
          : `错误: 工具 '${call.name}' 不存在`;
        ensureActive();
        this.hooks.onToolResult?.(call.name, output);

        batch.push({
          role: 'tool',
          content: output,
          toolName: call.name,
          toolCallId: call.id,
        });
      }

      ensureActive();
      for (const message of batch) {
        this.context.append(message);
      }

      result = await callModel();
    }

    if (result.toolCalls.length > 0) {
      log.warn(`Tool iteration limit (${MAX_TOOL_ITERATIONS}) reached, finalizing turn`);
    }

    const reply = result.content || FALLBACK_REPLY;
    this.context.append({ role: 'assistant', content: reply });

    await this.extractMemory(text, reply);
    return reply;
  }

  private async extractMemory(userMessage: string, reply: string): Promise<void> {
    if (!this.memory) return;

    try {
      const fragments = this.classifier(userMessage);
      if (Object.keys(fragments).length > 0) {
        await this.memory.extractAndSave(userMessage, reply, fragments);
      }
    } catch (error) {
      log.warn('Memory extraction failed:', error);
    }
  }

  async addMemory(content: string, kind: MemoryKind = 'fact', importance = 0.5): Promise<MemoryItem | null> {
    if (!this.memory) return null;
    return this.memory.addMemory(content, kind, importance);
  }

  async getUserProfile(): Promise<UserProfile> {
    if (!this.memory) return { preferences: [], info: [], interests: [], facts: [] };
    return this.memory.getUserProfile();
  }

  resetConversation(): void {
    this.context.reset();
  }

  getConversationHistory(): HistoryEntry[] {
    return this.context.history().map(msg => ({ role: msg.role, content: msg.content }));
  }
}
