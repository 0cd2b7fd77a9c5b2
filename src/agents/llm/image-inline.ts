// src/agents/llm/image-inline.ts
// 图片引用 → 可发送的形式；本地路径一律读成 base64，绝不把裸路径发给模型

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { createLogger } from '../../utils/logger.js';
import { ImageResourceError } from './errors.js';

const log = createLogger('LLM');

export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export type ResolvedImage =
  | { kind: 'url'; url: string }
  | { kind: 'base64'; mediaType: ImageMediaType; data: string };

const MEDIA_TYPES: Record<string, ImageMediaType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

function isImageMediaType(value: string): value is ImageMediaType {
  return Object.values(MEDIA_TYPES).some(type => type === value);
}

export function mediaTypeFor(path: string): ImageMediaType {
  return MEDIA_TYPES[extname(path).toLowerCase()] ?? 'image/jpeg';
}

/**
 * 本地图片不可读时代替图片内容的文本说明
 */
export function missingImageNote(path: string): string {
  return `[注意: 图片文件不存在: ${path}]`;
}

export function isRemoteImage(ref: string): boolean {
  return /^https?:\/\//i.test(ref) || ref.startsWith('data:');
}

export async function resolveImage(ref: string): Promise<ResolvedImage> {
  if (/^https?:\/\//i.test(ref)) {
    return { kind: 'url', url: ref };
  }

  if (ref.startsWith('data:')) {
    const match = DATA_URL_PATTERN.exec(ref);
    if (match && isImageMediaType(match[1])) {
      return { kind: 'base64', mediaType: match[1], data: match[2] };
    }
    return { kind: 'url', url: ref };
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(ref);
  } catch (error) {
    throw new ImageResourceError(ref, { cause: error });
  }
  return { kind: 'base64', mediaType: mediaTypeFor(ref), data: buffer.toString('base64') };
}

/**
 * 同 resolveImage，但本地图片不可读（已删除、是目录等）时返回 null
 */
export async function tryResolveImage(ref: string): Promise<ResolvedImage | null> {
  try {
    return await resolveImage(ref);
  } catch (error) {
    if (error instanceof ImageResourceError) {
      log.warn('Image no longer readable, sending a note instead:', ref);
      return null;
    }
    throw error;
  }
}

export function toDataUrl(image: ResolvedImage): string {
  return image.kind === 'url' ? image.url : `data:${image.mediaType};base64,${image.data}`;
}
