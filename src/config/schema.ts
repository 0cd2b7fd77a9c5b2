// src/config/schema.ts

import { z } from 'zod';

// 支持的 LLM 提供商
export const LLMProviderSchema = z.enum([
  'openai',     // OpenAI 官方
  'anthropic',  // Anthropic (Claude)
  'deepseek',   // DeepSeek
  'zhipu',      // 智谱 AI (GLM)
  'qwen',       // 通义千问
]);

export type LLMProvider = z.infer<typeof LLMProviderSchema>;

// 模型协议：决定使用哪个 SDK
export type ModelProtocol = 'openai' | 'anthropic';

// 提供商默认配置：环境变量前缀、默认模型、默认端点
export const PROVIDER_DEFAULTS: Record<LLMProvider, {
  envPrefix: string;
  defaultModel: string;
  baseURL?: string;
  protocol: ModelProtocol;
}> = {
  openai: {
    envPrefix: 'OPENAI',
    defaultModel: 'gpt-4o-mini',
    protocol: 'openai',
  },
  anthropic: {
    envPrefix: 'ANTHROPIC',
    defaultModel: 'claude-3-5-sonnet-20241022',
    protocol: 'anthropic',
  },
  deepseek: {
    envPrefix: 'DEEPSEEK',
    defaultModel: 'deepseek-chat',
    baseURL: 'https://api.deepseek.com',
    protocol: 'openai',
  },
  zhipu: {
    envPrefix: 'ZHIPU',
    defaultModel: 'glm-4',
    baseURL: 'https://open.bigmodel.cn/api/paas/v4',
    protocol: 'openai',
  },
  qwen: {
    envPrefix: 'QWEN',
    defaultModel: 'qwen-turbo',
    baseURL: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
    protocol: 'openai',
  },
};

export const LLMConfigSchema = z.object({
  provider: LLMProviderSchema,
  apiKey: z.string().min(1),
  model: z.string().min(1),
  baseURL: z.string().url().optional(),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0.7),
  // 单次请求的超时（毫秒），由 SDK 的网络层执行
  timeoutMs: z.number().int().positive().default(60000),
  maxRetries: z.number().int().min(0).default(2),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

export const AgentSettingsSchema = z.object({
  // 对话历史保留条数（不含 system 消息）
  historyLimit: z.number().int().positive().default(10),
  systemPrompt: z.string().optional(),

  // 记忆
  memoryEnabled: z.boolean().default(true),
  memoryStoragePath: z.string().default('./data/memory'),

  // 文档搜索
  searchEnabled: z.boolean().default(true),
  searchDocsPath: z.string().default('./data/docs'),
  searchTopK: z.number().int().positive().default(3),
  webSearchEnabled: z.boolean().default(false),

  // 工具与多模态
  toolsEnabled: z.boolean().default(true),
  multimodalEnabled: z.boolean().default(true),
  generatedImagesPath: z.string().default('./data/generated_images'),

  defaultProvider: LLMProviderSchema.default('openai'),
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

export const ConfigSchema = z.object({
  agent: AgentSettingsSchema.default({}),
  llm: z.array(LLMConfigSchema).default([]),
  // 通义万相图片生成
  dashscopeApiKey: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

// 配置文件格式：只允许覆盖 agent 设置和追加模型配置
export const ConfigFileSchema = z.object({
  agent: AgentSettingsSchema.partial().optional(),
  llm: z.array(LLMConfigSchema).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
