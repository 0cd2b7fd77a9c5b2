// src/memory/file-store.ts

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { scoreRelevance } from '../utils/relevance.js';
import { MemoryItemSchema, type MemoryItem, type MemoryKind, type MemoryStore } from './types.js';

const log = createLogger('Memory');

const MemoryFileSchema = z.record(z.string(), MemoryItemSchema);

// 缓存中的条目只由存储修改，对外一律返回副本
function snapshot(item: MemoryItem): MemoryItem {
  return { ...item, metadata: { ...item.metadata } };
}

/**
 * 本地 JSON 文件存储：<storagePath>/memories.json，以 id 为 key
 */
export class FileMemoryStore implements MemoryStore {
  private cache: Map<string, MemoryItem> = new Map();
  readonly memoryFile: string;

  constructor(private readonly storagePath: string) {
    this.memoryFile = join(storagePath, 'memories.json');
    this.ensureStorage();
    this.load();
  }

  private ensureStorage(): void {
    if (!existsSync(this.storagePath)) {
      mkdirSync(this.storagePath, { recursive: true });
    }
    if (!existsSync(this.memoryFile)) {
      writeFileSync(this.memoryFile, '{}', 'utf-8');
    }
  }

  private load(): void {
    try {
      const parsed = MemoryFileSchema.parse(JSON.parse(readFileSync(this.memoryFile, 'utf-8')));
      this.cache = new Map(Object.entries(parsed));
      log.debug(`Loaded ${this.cache.size} memories from ${this.memoryFile}`);
    } catch (error) {
      log.warn('Failed to load memories, starting empty:', error);
      this.cache = new Map();
    }
  }

  private persist(): boolean {
    try {
      const data = Object.fromEntries(this.cache);
      writeFileSync(this.memoryFile, JSON.stringify(data, null, 2), 'utf-8');
      return true;
    } catch (error) {
      log.error('Failed to save memories:', error);
      return false;
    }
  }

  async save(item: MemoryItem): Promise<boolean> {
    this.cache.set(item.id, snapshot(item));
    return this.persist();
  }

  async get(id: string): Promise<MemoryItem | undefined> {
    const item = this.cache.get(id);
    if (item) {
      item.accessCount += 1;
      this.persist();
    }
    return item && snapshot(item);
  }

  /**
   * 关键词检索：相关性 × 重要性，分数相同时保持插入顺序
   */
  async search(query: string, topK = 5): Promise<MemoryItem[]> {
    const scored: { item: MemoryItem; score: number }[] = [];

    for (const item of this.cache.values()) {
      const score = scoreRelevance(query, item.content) * item.importance;
      if (score > 0) {
        scored.push({ item, score });
      }
    }

    // Array.prototype.sort 是稳定排序
    const results = scored
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(r => r.item);

    if (results.length > 0) {
      for (const item of results) {
        item.accessCount += 1;
      }
      this.persist();
    }

    return results.map(snapshot);
  }

  async getByKind(kind: MemoryKind): Promise<MemoryItem[]> {
    return Array.from(this.cache.values())
      .filter(item => item.kind === kind)
      .map(snapshot);
  }

  async delete(id: string): Promise<boolean> {
    if (!this.cache.delete(id)) {
      return false;
    }
    return this.persist();
  }

  async listAll(): Promise<MemoryItem[]> {
    return Array.from(this.cache.values(), snapshot);
  }
}
