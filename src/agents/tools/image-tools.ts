// src/agents/tools/image-tools.ts
// 多模态工具：图片搜索、图片生成、图片分析

import axios, { type AxiosInstance } from 'axios';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createLogger } from '../../utils/logger.js';
import { defineTool, stringArg, type Tool, type ToolArguments, type ToolParameter } from './types.js';

const log = createLogger('ImageTools');

const DASHSCOPE_BASE_URL = 'https://dashscope.aliyuncs.com/api/v1';
const IMAGE_STYLES = ['auto', 'photography', 'portrait', '3d', 'anime', 'oil painting', 'watercolor', 'sketch'];

export const imageSearchTool: Tool = defineTool(
  {
    name: 'search_images',
    description: '搜索图片。当用户想要看图片、查找图片或需要视觉内容时使用。',
    parameters: [
      { name: 'query', type: 'string', description: '图片搜索关键词', required: true },
      { name: 'count', type: 'number', description: '返回结果数量，默认3', required: false, default: 3 },
    ],
  },
  (args) => {
    const query = stringArg(args, 'query', '') ?? '';
    return [
      `图片搜索结果 (关键词: ${query}):`,
      '',
      '【模拟结果】',
      '图片搜索需要接入第三方 API（Bing Image Search、Unsplash、Pexels 等）并配置相应的 API Key。',
      '',
      '当前你可以通过以下方式查看图片：',
      '- 直接提供图片路径，让Agent分析图片内容',
      '- 使用图片生成工具创建新图片',
    ].join('\n');
  }
);

export const imageAnalysisTool: Tool = defineTool(
  {
    name: 'analyze_image',
    description: '分析图片内容。当用户提供图片路径并询问图片相关问题时使用。注意：实际分析由多模态模型完成。',
    parameters: [
      { name: 'image_path', type: 'string', description: '图片文件路径', required: true },
      { name: 'question', type: 'string', description: '关于图片的问题', required: false, default: '请描述这张图片' },
    ],
  },
  (args) => {
    const imagePath = stringArg(args, 'image_path', '') ?? '';
    if (!existsSync(imagePath)) {
      return `❌ 图片文件不存在: ${imagePath}`;
    }
    return [
      '📷 图片分析请求已接收',
      '',
      `图片路径: ${imagePath}`,
      `分析问题: ${stringArg(args, 'question', '请描述这张图片')}`,
      '',
      '提示：实际的图片分析将由多模态模型完成。',
      '如果当前模型不支持视觉理解，请切换到支持的模型（如 qwen-vl-plus）。',
    ].join('\n');
  }
);

// wanx-v1 的风格参数需要尖括号包裹
function toWanxStyle(style: string): string {
  if (style === '3d') return '<3d cartoon>';
  return IMAGE_STYLES.includes(style) ? `<${style}>` : '<auto>';
}

interface DashScopeTaskResponse {
  output?: {
    task_id?: string;
    task_status?: 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'UNKNOWN';
    results?: { url?: string }[];
    message?: string;
  };
  message?: string;
}

export interface ImageGenerationOptions {
  apiKey?: string;
  saveDir: string;
  http?: AxiosInstance;
  pollIntervalMs?: number;
  maxPolls?: number;
}

/**
 * 图片生成工具（通义万相 wanx-v1，异步任务 + 轮询）
 */
export class ImageGenerationTool implements Tool {
  readonly name = 'generate_image';
  readonly description = '生成图片。当用户想要创建、画图、生成视觉内容时使用。';
  readonly parameters: ToolParameter[] = [
    { name: 'prompt', type: 'string', description: '图片生成的描述提示词，越详细越好', required: true },
    { name: 'style', type: 'string', description: '图片风格', required: false, enum: IMAGE_STYLES, default: 'auto' },
  ];

  private readonly http: AxiosInstance;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;

  constructor(private readonly options: ImageGenerationOptions) {
    this.http = options.http ?? axios.create({ timeout: 60000 });
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxPolls = options.maxPolls ?? 30;
  }

  async execute(args: ToolArguments): Promise<string> {
    const { apiKey } = this.options;
    if (!apiKey) {
      return [
        '❌ 图片生成功能未配置',
        '',
        '要使用图片生成功能，请：',
        '1. 获取通义万相API Key: https://dashscope.aliyun.com/',
        '2. 设置环境变量: DASHSCOPE_API_KEY=your_api_key',
      ].join('\n');
    }

    const prompt = stringArg(args, 'prompt', '') ?? '';
    const style = stringArg(args, 'style', 'auto') ?? 'auto';

    try {
      const imageUrl = await this.runTask(apiKey, prompt, style);
      const filepath = await this.download(imageUrl);
      return [
        '✅ 图片生成成功！',
        '',
        `提示词: ${prompt}`,
        `风格: ${style}`,
        `图片已保存至: ${filepath}`,
        '',
        '你可以查看该图片，或让我分析这张图片的内容。',
      ].join('\n');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Image generation failed:', message);
      return `❌ 图片生成出错: ${message}`;
    }
  }

  private async runTask(apiKey: string, prompt: string, style: string): Promise<string> {
    const headers = {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    };

    const created = await this.http.post<DashScopeTaskResponse>(
      `${DASHSCOPE_BASE_URL}/services/aigc/text2image/image-synthesis`,
      {
        model: 'wanx-v1',
        input: { prompt },
        parameters: {
          style: toWanxStyle(style),
          size: '1024*1024',
          n: 1,
        },
      },
      { headers: { ...headers, 'X-DashScope-Async': 'enable' } }
    );

    const taskId = created.data.output?.task_id;
    if (!taskId) {
      throw new Error(created.data.message || '未返回任务 ID');
    }

    for (let attempt = 0; attempt < this.maxPolls; attempt++) {
      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
      const task = await this.http.get<DashScopeTaskResponse>(`${DASHSCOPE_BASE_URL}/tasks/${taskId}`, { headers });
      const output = task.data.output;

      if (output?.task_status === 'SUCCEEDED') {
        const url = output.results?.[0]?.url;
        if (!url) throw new Error('任务成功但未返回图片地址');
        return url;
      }
      if (output?.task_status === 'FAILED' || output?.task_status === 'UNKNOWN') {
        throw new Error(output.message || '图片生成任务失败');
      }
    }

    throw new Error('图片生成超时');
  }

  private async download(url: string): Promise<string> {
    const response = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    mkdirSync(this.options.saveDir, { recursive: true });
    const filepath = join(this.options.saveDir, `generated_${Date.now()}.png`);
    writeFileSync(filepath, Buffer.from(response.data));
    return filepath;
  }
}

export interface MultimodalToolOptions {
  enableSearch?: boolean;
  enableGeneration?: boolean;
  apiKey?: string;
  saveDir: string;
}

export function createMultimodalTools(options: MultimodalToolOptions): Tool[] {
  const tools: Tool[] = [];
  if (options.enableSearch !== false) {
    tools.push(imageSearchTool);
  }
  if (options.enableGeneration !== false) {
    tools.push(new ImageGenerationTool({ apiKey: options.apiKey, saveDir: options.saveDir }));
  }
  tools.push(imageAnalysisTool);
  return tools;
}
