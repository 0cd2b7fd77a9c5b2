// src/memory/manager.ts

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { FileMemoryStore } from './file-store.js';
import {
  MemoryKindSchema,
  type ClassifiedFragments,
  type MemoryItem,
  type MemoryKind,
  type MemoryStore,
  type UserProfile,
} from './types.js';

const log = createLogger('Memory');

// 自动提取的记忆统一使用的重要性
const EXTRACTED_IMPORTANCE = 0.6;

export const MEMORY_CONTEXT_HEADER = '[用户相关记忆]';

export class MemoryManager {
  private idCounter = 0;

  constructor(private readonly store: MemoryStore) {}

  private generateId(): string {
    this.idCounter += 1;
    return `mem_${Date.now()}_${this.idCounter}_${uuidv4().slice(0, 8)}`;
  }

  async addMemory(
    content: string,
    kind: MemoryKind = 'fact',
    importance = 0.5,
    metadata: Record<string, unknown> = {}
  ): Promise<MemoryItem> {
    const now = new Date().toISOString();
    const item: MemoryItem = {
      id: this.generateId(),
      kind,
      content,
      metadata,
      createdAt: now,
      updatedAt: now,
      importance: Math.min(1, Math.max(0, importance)),
      accessCount: 0,
    };

    const saved = await this.store.save(item);
    if (!saved) {
      log.warn('Memory was not persisted:', item.id);
    }
    log.debug('Saved memory:', { id: item.id, kind, preview: content.slice(0, 50) });
    return item;
  }

  /**
   * 根据查询回忆相关记忆
   */
  async recall(query: string, topK = 5): Promise<MemoryItem[]> {
    return this.store.search(query, topK);
  }

  async getUserProfile(): Promise<UserProfile> {
    const contents = async (kind: MemoryKind) =>
      (await this.store.getByKind(kind)).map(item => item.content);

    return {
      preferences: await contents('user_preference'),
      info: await contents('user_info'),
      interests: await contents('topic_interest'),
      facts: await contents('fact'),
    };
  }

  /**
   * 保存分类好的记忆片段，跳过无法识别的类型标签
   */
  async extractAndSave(
    userMessage: string,
    _assistantResponse: string,
    fragments: ClassifiedFragments = {}
  ): Promise<MemoryItem[]> {
    const saved: MemoryItem[] = [];

    for (const [tag, contents] of Object.entries(fragments)) {
      const kind = MemoryKindSchema.safeParse(tag);
      if (!kind.success) {
        log.debug(`Skipping unknown memory kind: ${tag}`);
        continue;
      }
      for (const content of contents) {
        saved.push(await this.addMemory(content, kind.data, EXTRACTED_IMPORTANCE, {
          sourceUserMessage: userMessage.slice(0, 100),
        }));
      }
    }

    return saved;
  }

  /**
   * 将相关记忆格式化为系统提示词中的上下文块，无结果时返回空字符串
   */
  async formatForContext(query: string, maxItems = 5): Promise<string> {
    const memories = await this.recall(query, maxItems);
    if (memories.length === 0) {
      return '';
    }

    const lines = [MEMORY_CONTEXT_HEADER];
    for (const mem of memories) {
      lines.push(`- [${mem.kind}] ${mem.content}`);
    }
    return lines.join('\n');
  }

  async deleteMemory(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async listAll(): Promise<MemoryItem[]> {
    return this.store.listAll();
  }
}

export function createMemoryManager(storagePath: string): MemoryManager {
  return new MemoryManager(new FileMemoryStore(storagePath));
}
