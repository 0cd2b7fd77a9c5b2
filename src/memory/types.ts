// src/memory/types.ts

import { z } from 'zod';

export const MemoryKindSchema = z.enum([
  'user_preference',  // 用户偏好
  'user_info',        // 用户基本信息
  'topic_interest',   // 话题兴趣
  'interaction',      // 交互记录
  'fact',             // 用户相关事实
]);

export type MemoryKind = z.infer<typeof MemoryKindSchema>;

export const MemoryItemSchema = z.object({
  id: z.string(),
  kind: MemoryKindSchema,
  content: z.string(),
  metadata: z.record(z.string(), z.unknown()).default({}),
  createdAt: z.string(),
  updatedAt: z.string(),
  importance: z.number().min(0).max(1).default(0.5),
  accessCount: z.number().int().min(0).default(0),
});

export type MemoryItem = z.infer<typeof MemoryItemSchema>;

/**
 * 分类后的记忆片段：key 为记忆类型标签，未识别的标签在保存时被跳过
 */
export type ClassifiedFragments = Record<string, string[]>;

/**
 * 记忆存储接口，持久化介质由实现决定
 */
export interface MemoryStore {
  save(item: MemoryItem): Promise<boolean>;
  get(id: string): Promise<MemoryItem | undefined>;
  search(query: string, topK: number): Promise<MemoryItem[]>;
  getByKind(kind: MemoryKind): Promise<MemoryItem[]>;
  delete(id: string): Promise<boolean>;
  listAll(): Promise<MemoryItem[]>;
}

export interface UserProfile {
  preferences: string[];
  info: string[];
  interests: string[];
  facts: string[];
}
