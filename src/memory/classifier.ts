// src/memory/classifier.ts
// 基于触发词的记忆分类：把用户发言切成片段，按触发词归类。
// 结果有损，只用于尽力而为的记忆捕获。

import type { ClassifiedFragments, MemoryKind } from './types.js';

export type MemoryClassifier = (userMessage: string) => ClassifiedFragments;

export interface MemoryTrigger {
  pattern: string | RegExp;
  kind: MemoryKind;
}

export const DEFAULT_MEMORY_TRIGGERS: MemoryTrigger[] = [
  { pattern: '喜欢', kind: 'user_preference' },
  { pattern: '偏好', kind: 'user_preference' },
  { pattern: '我是', kind: 'user_info' },
  { pattern: '我叫', kind: 'user_info' },
  { pattern: '我的名字', kind: 'user_info' },
  { pattern: /对.+感兴趣/, kind: 'topic_interest' },
];

const FRAGMENT_SEPARATORS = /[。！？!?；;，,\n]/;

function matches(trigger: MemoryTrigger, fragment: string): boolean {
  return typeof trigger.pattern === 'string'
    ? fragment.includes(trigger.pattern)
    : trigger.pattern.test(fragment);
}

export function splitFragments(text: string): string[] {
  return text
    .split(FRAGMENT_SEPARATORS)
    .map(s => s.trim())
    .filter(Boolean);
}

export function createPatternClassifier(
  triggers: MemoryTrigger[] = DEFAULT_MEMORY_TRIGGERS
): MemoryClassifier {
  return (userMessage) => {
    const extracted: ClassifiedFragments = {};

    for (const fragment of splitFragments(userMessage)) {
      for (const trigger of triggers) {
        if (!matches(trigger, fragment)) continue;
        const bucket = extracted[trigger.kind] ?? (extracted[trigger.kind] = []);
        if (!bucket.includes(fragment)) {
          bucket.push(fragment);
        }
      }
    }

    return extracted;
  };
}

export const patternClassifier: MemoryClassifier = createPatternClassifier();
