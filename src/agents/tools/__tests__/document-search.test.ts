import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DocumentSearchTool, extractSnippet } from '../document-search.js';

describe('DocumentSearchTool', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'conversa-docs-'));
    writeFileSync(join(dir, 'typescript.md'), 'TypeScript 指南\nTypeScript adds static types to JavaScript.');
    writeFileSync(join(dir, 'cooking.txt'), 'Pasta recipe\nBoil water and add salt.');
    writeFileSync(join(dir, 'ignored.bin'), 'typescript');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should load only supported extensions', () => {
    const tool = new DocumentSearchTool(dir);
    expect(tool.documentCount).toBe(2);
  });

  test('should rank matching documents and drop non-matching ones', () => {
    const results = new DocumentSearchTool(dir).search('typescript', 3);
    expect(results).toHaveLength(1);
    expect(results[0].source).toBe('typescript.md');
    expect(results[0].title).toBe('TypeScript 指南');
    expect(results[0].score).toBeCloseTo(3.7);
  });

  test('should format hits for the model', async () => {
    const output = await new DocumentSearchTool(dir).execute({ query: 'typescript' });
    const lines = output.split('\n');
    expect(lines[0]).toBe('找到 1 条相关结果:');
    expect(lines[2]).toBe('【结果 1】');
    expect(lines[3]).toBe('来源: typescript.md');
    expect(lines[4]).toBe('标题: TypeScript 指南');
  });

  test('should say so when nothing matches', async () => {
    const output = await new DocumentSearchTool(dir).execute({ query: 'quantum' });
    expect(output).toBe("未找到与 'quantum' 相关的文档。");
  });

  test('should create a missing docs directory and report an empty corpus', async () => {
    const missing = join(dir, 'not-yet');
    const tool = new DocumentSearchTool(missing);
    expect(existsSync(missing)).toBe(true);
    expect(await tool.execute({ query: 'anything' })).toBe('没有可搜索的文档。请确保文档目录存在且包含文档文件。');
  });

  test('should pick up new files on reload, including subdirectories', () => {
    const tool = new DocumentSearchTool(dir);
    mkdirSync(join(dir, 'sub'));
    writeFileSync(join(dir, 'sub', 'deep.md'), 'Deep notes about vitest');
    expect(tool.reload()).toBe(3);
    expect(tool.search('vitest', 3)[0].source).toBe(join('sub', 'deep.md'));
  });
});

describe('extractSnippet', () => {
  test('should return short content unchanged when nothing matches', () => {
    expect(extractSnippet('zzz', 'short text')).toBe('short text');
  });

  test('should center the window around the first hit', () => {
    const content = 'x'.repeat(100) + 'needle' + 'y'.repeat(200);
    expect(extractSnippet('needle', content)).toBe(`...${'x'.repeat(50)}needle${'y'.repeat(144)}...`);
  });
});
