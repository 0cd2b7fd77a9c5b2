// src/agents/content.ts
// 用户输入 → 消息内容：解析图片标记，必要时构建多模态内容

import { statSync } from 'fs';
import type { ContentPart, MessageContent } from '../types.js';
import { isRemoteImage, missingImageNote } from './llm/image-inline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Agent');

// [image:路径] 或 <image:路径>
const IMAGE_MARKER = /[[<]image:([^\]>]+)[\]>]/;
const IMAGE_MARKER_GLOBAL = new RegExp(IMAGE_MARKER.source, 'g');

export interface ParsedInput {
  text: string;
  imagePath?: string;
}

/**
 * 取第一个图片标记的路径，并从文本中去掉所有标记
 */
export function parseImageMarker(input: string): ParsedInput {
  const match = IMAGE_MARKER.exec(input);
  if (!match) {
    return { text: input };
  }

  return {
    text: input.replace(IMAGE_MARKER_GLOBAL, '').trim(),
    imagePath: match[1].trim(),
  };
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export interface BuildContentOptions {
  enabled: boolean;
}

export function buildMessageContent(
  text: string,
  imagePath: string | undefined,
  options: BuildContentOptions
): MessageContent {
  if (!imagePath || !options.enabled) {
    return text;
  }

  if (!isRemoteImage(imagePath) && !isFile(imagePath)) {
    log.warn('Image file not found:', imagePath);
    return `${text}\n${missingImageNote(imagePath)}`;
  }

  const parts: ContentPart[] = [];
  if (text) {
    parts.push({ type: 'text', text });
  }
  parts.push({ type: 'image', path: imagePath });
  return parts;
}
