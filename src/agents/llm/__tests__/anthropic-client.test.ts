import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  anthropicTextDeltas,
  parseAnthropicResponse,
  toAnthropicRequest,
  toAnthropicTool,
} from '../anthropic-client.js';
import { toToolSchema } from '../../tools/types.js';
import type { Message } from '../../../types.js';

describe('toAnthropicRequest', () => {
  let dir: string;
  let image: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'conversa-anthropic-'));
    image = join(dir, 'pic.jpg');
    writeFileSync(image, 'abc');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should lift system text and merge consecutive tool results', async () => {
    const messages: Message[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
      {
        role: 'assistant',
        content: 'let me check',
        toolCalls: [
          { id: 'c1', name: 'calculator', arguments: '{"expression":"1+1"}' },
          { id: 'c2', name: 'datetime', arguments: '{"action":"now"}' },
        ],
      },
      { role: 'tool', content: 'r1', toolName: 'calculator', toolCallId: 'c1' },
      { role: 'tool', content: 'r2', toolName: 'datetime', toolCallId: 'c2' },
      { role: 'assistant', content: 'done' },
      { role: 'user', content: 'thanks' },
    ];

    expect(await toAnthropicRequest(messages)).toEqual({
      system: 'sys',
      messages: [
        { role: 'user', content: 'q' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'let me check' },
            { type: 'tool_use', id: 'c1', name: 'calculator', input: { expression: '1+1' } },
            { type: 'tool_use', id: 'c2', name: 'datetime', input: { action: 'now' } },
          ],
        },
        {
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'c1', content: 'r1' },
            { type: 'tool_result', tool_use_id: 'c2', content: 'r2' },
          ],
        },
        { role: 'assistant', content: 'done' },
        { role: 'user', content: 'thanks' },
      ],
    });
  });

  test('should leave system undefined when there is none', async () => {
    const request = await toAnthropicRequest([{ role: 'user', content: 'hi' }]);
    expect(request.system).toBeUndefined();
  });

  test('should send empty input for unparseable tool arguments', async () => {
    const request = await toAnthropicRequest([
      { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'echo', arguments: 'not json' }] },
    ]);
    expect(request.messages[0].content).toEqual([{ type: 'tool_use', id: 'c1', name: 'echo', input: {} }]);
  });

  test('should inline local images as base64 sources', async () => {
    const request = await toAnthropicRequest([
      { role: 'user', content: [{ type: 'text', text: 'what' }, { type: 'image', path: image }] },
    ]);
    expect(request.messages[0].content).toEqual([
      { type: 'text', text: 'what' },
      { type: 'image', source: { type: 'base64', media_type: 'image/jpeg', data: 'YWJj' } },
    ]);
  });

  test('should send a note instead of an unreadable image', async () => {
    const missing = join(dir, 'gone.jpg');
    const request = await toAnthropicRequest([
      { role: 'user', content: [{ type: 'image', path: missing }] },
    ]);
    expect(request.messages[0].content).toEqual([{ type: 'text', text: `[注意: 图片文件不存在: ${missing}]` }]);
  });

  test('should describe remote image URLs as text', async () => {
    const request = await toAnthropicRequest([
      { role: 'user', content: [{ type: 'image', path: 'https://images.test/cat.png' }] },
    ]);
    expect(request.messages[0].content).toEqual([{ type: 'text', text: '[图片: https://images.test/cat.png]' }]);
  });
});

describe('toAnthropicTool', () => {
  test('should translate the parameter schema to input_schema', () => {
    const tool = toAnthropicTool(toToolSchema({
      name: 'echo',
      description: 'echo text',
      parameters: [{ name: 'text', type: 'string', description: 'text' }],
    }));

    expect(tool).toEqual({
      name: 'echo',
      description: 'echo text',
      input_schema: {
        type: 'object',
        properties: { text: { type: 'string', description: 'text' } },
        required: ['text'],
      },
    });
  });
});

describe('parseAnthropicResponse', () => {
  test('should join text blocks and serialize tool inputs', () => {
    const result = parseAnthropicResponse({
      content: [
        { type: 'text', text: 'Let me ' },
        { type: 'text', text: 'calculate.' },
        { type: 'tool_use', id: 'toolu_1', name: 'calculator', input: { expression: '2+2' } },
      ],
      usage: { input_tokens: 20, output_tokens: 7 },
    });

    expect(result).toEqual({
      content: 'Let me calculate.',
      toolCalls: [{ id: 'toolu_1', name: 'calculator', arguments: '{"expression":"2+2"}' }],
      usage: { promptTokens: 20, completionTokens: 7 },
    });
  });

  test('should report missing text as null content', () => {
    const result = parseAnthropicResponse({
      content: [{ type: 'tool_use', id: 'toolu_2', name: 'datetime', input: {} }],
    });
    expect(result.content).toBeNull();
    expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0 });
  });
});

describe('anthropicTextDeltas', () => {
  test('should yield only text deltas', async () => {
    async function* events(): AsyncGenerator<Anthropic.RawMessageStreamEvent> {
      yield { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hel' } };
      yield { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"a"' } };
      yield { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'lo' } };
      yield { type: 'message_stop' };
    }

    const deltas: string[] = [];
    for await (const delta of anthropicTextDeltas(events())) {
      deltas.push(delta);
    }
    expect(deltas).toEqual(['Hel', 'lo']);
  });
});
