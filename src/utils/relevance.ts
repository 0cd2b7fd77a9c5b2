// src/utils/relevance.ts
// 关键词相关性评分：完整匹配 + 词重叠率 + 词频

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export interface RelevanceWeights {
  exactMatch: number;
  overlap: number;
  frequencyStep: number;
  frequencyCap: number;
}

export const DEFAULT_RELEVANCE_WEIGHTS: RelevanceWeights = {
  exactMatch: 2.0,
  overlap: 1.5,
  frequencyStep: 0.1,
  frequencyCap: 0.5,
};

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let pos = haystack.indexOf(needle);
  while (pos !== -1) {
    count++;
    pos = haystack.indexOf(needle, pos + needle.length);
  }
  return count;
}

export function scoreRelevance(
  query: string,
  content: string,
  weights: RelevanceWeights = DEFAULT_RELEVANCE_WEIGHTS
): number {
  const queryLower = query.trim().toLowerCase();
  if (!queryLower) return 0;
  const contentLower = content.toLowerCase();

  let score = 0;

  if (contentLower.includes(queryLower)) {
    score += weights.exactMatch;
  }

  const queryWords = tokenize(queryLower);
  if (queryWords.length > 0) {
    const contentWords = new Set(tokenize(contentLower));
    const matched = queryWords.filter(w => contentWords.has(w)).length;
    score += (matched / queryWords.length) * weights.overlap;
  }

  for (const word of queryWords) {
    const count = countOccurrences(contentLower, word);
    score += Math.min(count * weights.frequencyStep, weights.frequencyCap);
  }

  return score;
}
