import { describe, test, expect } from 'vitest';
import { ConversationContext } from '../conversation.js';
import type { Message } from '../../types.js';

const user = (content: string): Message => ({ role: 'user', content });
const assistant = (content: string): Message => ({ role: 'assistant', content });

describe('ConversationContext', () => {
  test('should always start with the system message', () => {
    const context = new ConversationContext('be helpful');
    context.append(user('hi'));
    expect(context.all()[0]).toEqual({ role: 'system', content: 'be helpful' });
    expect(context.length).toBe(2);
  });

  test('should refuse additional system messages', () => {
    const context = new ConversationContext('be helpful');
    expect(() => context.append({ role: 'system', content: 'override' })).toThrow();
    expect(context.length).toBe(1);
  });

  test('should return the most recent non-system messages', () => {
    const context = new ConversationContext('sys');
    ['a', 'b', 'c'].forEach(text => context.append(user(text)));
    expect(context.recent(2)).toEqual([user('b'), user('c')]);
    expect(context.recent(10)).toEqual([user('a'), user('b'), user('c')]);
    expect(context.recent(0)).toEqual([]);
  });

  test('should widen the window so it never starts with a tool result', () => {
    const context = new ConversationContext('sys');
    const call: Message = {
      role: 'assistant',
      content: '',
      toolCalls: [
        { id: 'c1', name: 'calculator', arguments: '{}' },
        { id: 'c2', name: 'calculator', arguments: '{}' },
      ],
    };
    const result1: Message = { role: 'tool', content: 'r1', toolName: 'calculator', toolCallId: 'c1' };
    const result2: Message = { role: 'tool', content: 'r2', toolName: 'calculator', toolCallId: 'c2' };
    context.append(user('q'));
    context.append(call);
    context.append(result1);
    context.append(result2);

    expect(context.recent(1)).toEqual([call, result1, result2]);
    expect(context.recent(3)).toEqual([call, result1, result2]);
  });

  test('should reset to the system message and bump the epoch', () => {
    const context = new ConversationContext('sys');
    context.append(user('hi'));
    context.append(assistant('hello'));
    context.metadata.set('topic', 'greeting');

    context.reset();

    expect(context.all()).toEqual([{ role: 'system', content: 'sys' }]);
    expect(context.epoch).toBe(1);
    expect(context.metadata.size).toBe(0);
  });
});
