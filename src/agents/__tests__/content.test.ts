import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildMessageContent, parseImageMarker } from '../content.js';

describe('parseImageMarker', () => {
  test('should return text unchanged when there is no marker', () => {
    expect(parseImageMarker('just text')).toEqual({ text: 'just text' });
  });

  test('should take the first marker and strip all of them', () => {
    expect(parseImageMarker('[image:/a.png] 这是什么 <image:/b.png>')).toEqual({
      text: '这是什么',
      imagePath: '/a.png',
    });
  });

  test('should accept angle bracket markers and trim the path', () => {
    expect(parseImageMarker('describe <image: ./photo.jpg >')).toEqual({
      text: 'describe',
      imagePath: './photo.jpg',
    });
  });
});

describe('buildMessageContent', () => {
  let dir: string;
  let image: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'conversa-content-'));
    image = join(dir, 'photo.png');
    writeFileSync(image, 'png-bytes');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should return plain text without an image', () => {
    expect(buildMessageContent('hello', undefined, { enabled: true })).toBe('hello');
  });

  test('should ignore images when multimodal input is disabled', () => {
    expect(buildMessageContent('hello', image, { enabled: false })).toBe('hello');
  });

  test('should build text and image parts for an existing file', () => {
    expect(buildMessageContent('what is this?', image, { enabled: true })).toEqual([
      { type: 'text', text: 'what is this?' },
      { type: 'image', path: image },
    ]);
  });

  test('should omit the text part when the text is empty', () => {
    expect(buildMessageContent('', image, { enabled: true })).toEqual([{ type: 'image', path: image }]);
  });

  test('should degrade to a warning when the file is missing', () => {
    const missing = join(dir, 'missing.png');
    expect(buildMessageContent('look', missing, { enabled: true })).toBe(`look\n[注意: 图片文件不存在: ${missing}]`);
  });

  test('should treat a directory as a missing image', () => {
    expect(buildMessageContent('look', dir, { enabled: true })).toBe(`look\n[注意: 图片文件不存在: ${dir}]`);
  });

  test('should not check remote references on disk', () => {
    expect(buildMessageContent('look', 'https://images.test/cat.png', { enabled: true })).toEqual([
      { type: 'text', text: 'look' },
      { type: 'image', path: 'https://images.test/cat.png' },
    ]);
  });
});
