import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  openAITextDeltas,
  parseOpenAIResponse,
  toOpenAIMessages,
  toOpenAITool,
  type OpenAIChunkLike,
} from '../openai-client.js';
import { ProviderResponseError } from '../errors.js';
import { toToolSchema } from '../../tools/types.js';
import type { Message } from '../../../types.js';

describe('toOpenAIMessages', () => {
  let dir: string;
  let image: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'conversa-openai-'));
    image = join(dir, 'pic.png');
    writeFileSync(image, 'abc');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should keep system messages and map tool calls and results', async () => {
    const messages: Message[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'c1', name: 'calculator', arguments: '{"expression":"1+1"}' }],
      },
      { role: 'tool', content: '计算结果: 1+1 = 2', toolName: 'calculator', toolCallId: 'c1' },
      { role: 'assistant', content: 'two' },
    ];

    expect(await toOpenAIMessages(messages)).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'calculator', arguments: '{"expression":"1+1"}' } }],
      },
      { role: 'tool', tool_call_id: 'c1', content: '计算结果: 1+1 = 2' },
      { role: 'assistant', content: 'two' },
    ]);
  });

  test('should inline local images as data URLs', async () => {
    const [converted] = await toOpenAIMessages([
      { role: 'user', content: [{ type: 'text', text: 'what' }, { type: 'image', path: image }] },
    ]);

    expect(converted).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'what' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,YWJj' } },
      ],
    });
  });

  test('should pass remote image URLs through', async () => {
    const [converted] = await toOpenAIMessages([
      { role: 'user', content: [{ type: 'image', path: 'https://images.test/cat.jpg' }] },
    ]);

    expect(converted).toEqual({
      role: 'user',
      content: [{ type: 'image_url', image_url: { url: 'https://images.test/cat.jpg' } }],
    });
  });

  test('should send a note instead of an image that disappeared', async () => {
    const missing = join(dir, 'gone.png');
    const [converted] = await toOpenAIMessages([
      { role: 'user', content: [{ type: 'text', text: 'what' }, { type: 'image', path: missing }] },
    ]);

    expect(converted).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'what' },
        { type: 'text', text: `[注意: 图片文件不存在: ${missing}]` },
      ],
    });
  });

  test('should send a note when the image path is a directory', async () => {
    const [converted] = await toOpenAIMessages([{ role: 'user', content: [{ type: 'image', path: dir }] }]);
    expect(converted).toEqual({
      role: 'user',
      content: [{ type: 'text', text: `[注意: 图片文件不存在: ${dir}]` }],
    });
  });
});

describe('toOpenAITool', () => {
  test('should wrap the parameter schema as a function declaration', () => {
    const tool = toOpenAITool(toToolSchema({
      name: 'echo',
      description: 'echo text',
      parameters: [{ name: 'text', type: 'string', description: 'text' }],
    }));

    expect(tool).toEqual({
      type: 'function',
      function: {
        name: 'echo',
        description: 'echo text',
        parameters: {
          type: 'object',
          properties: { text: { type: 'string', description: 'text' } },
          required: ['text'],
        },
      },
    });
  });
});

describe('parseOpenAIResponse', () => {
  test('should extract content, tool calls and usage', () => {
    const result = parseOpenAIResponse('openai', {
      choices: [{
        message: {
          content: null,
          tool_calls: [{ id: 'call_9', function: { name: 'calculator', arguments: '{"expression":"2+2"}' } }],
        },
      }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });

    expect(result).toEqual({
      content: null,
      toolCalls: [{ id: 'call_9', name: 'calculator', arguments: '{"expression":"2+2"}' }],
      usage: { promptTokens: 12, completionTokens: 3 },
    });
  });

  test('should default missing usage to zero', () => {
    const result = parseOpenAIResponse('deepseek', { choices: [{ message: { content: 'hello' } }] });
    expect(result).toEqual({ content: 'hello', toolCalls: [], usage: { promptTokens: 0, completionTokens: 0 } });
  });

  test('should reject responses without choices', () => {
    expect(() => parseOpenAIResponse('qwen', { choices: [] })).toThrow(ProviderResponseError);
  });
});

describe('openAITextDeltas', () => {
  test('should yield non-empty content deltas in order', async () => {
    async function* chunks(): AsyncGenerator<OpenAIChunkLike> {
      yield { choices: [{ delta: { content: 'Hel' } }] };
      yield { choices: [{ delta: {} }] };
      yield { choices: [] };
      yield { choices: [{ delta: { content: 'lo' } }] };
    }

    const deltas: string[] = [];
    for await (const delta of openAITextDeltas(chunks())) {
      deltas.push(delta);
    }
    expect(deltas).toEqual(['Hel', 'lo']);
  });
});
