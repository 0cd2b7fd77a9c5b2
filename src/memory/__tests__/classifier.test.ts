import { describe, test, expect } from 'vitest';
import { createPatternClassifier, patternClassifier, splitFragments } from '../classifier.js';

describe('splitFragments', () => {
  test('should split on Chinese and ASCII punctuation and drop blanks', () => {
    expect(splitFragments('你好。我叫小明，今天天气不错！\n  好的; ok?')).toEqual([
      '你好',
      '我叫小明',
      '今天天气不错',
      '好的',
      'ok',
    ]);
  });
});

describe('patternClassifier', () => {
  test('should tag name and preference fragments separately', () => {
    expect(patternClassifier('我叫小明，我喜欢爬山')).toEqual({
      user_info: ['我叫小明'],
      user_preference: ['我喜欢爬山'],
    });
  });

  test('should recognize topic interests', () => {
    expect(patternClassifier('我最近对机器学习很感兴趣。')).toEqual({
      topic_interest: ['我最近对机器学习很感兴趣'],
    });
  });

  test('should not duplicate a fragment within a kind', () => {
    expect(patternClassifier('我喜欢偏好清单')).toEqual({
      user_preference: ['我喜欢偏好清单'],
    });
  });

  test('should return nothing for ordinary chatter', () => {
    expect(patternClassifier('2+2 等于几？')).toEqual({});
  });

  test('should accept custom triggers', () => {
    const classify = createPatternClassifier([{ pattern: /住在/, kind: 'fact' }]);
    expect(classify('我住在杭州。我喜欢茶')).toEqual({ fact: ['我住在杭州'] });
  });
});
