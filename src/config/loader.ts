// src/config/loader.ts

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import {
  ConfigFileSchema,
  ConfigSchema,
  LLMProviderSchema,
  PROVIDER_DEFAULTS,
  type Config,
  type ConfigFile,
  type LLMConfig,
  type LLMProvider,
} from './schema.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Config');

const DEFAULT_CONFIG_PATH = 'config/config.json';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

/**
 * 从环境变量读取各提供商的模型配置（只收录配置了 API Key 的提供商）
 */
export function providersFromEnv(env: NodeJS.ProcessEnv): LLMConfig[] {
  const configs: LLMConfig[] = [];

  for (const provider of LLMProviderSchema.options) {
    const defaults = PROVIDER_DEFAULTS[provider];
    const apiKey = env[`${defaults.envPrefix}_API_KEY`];
    if (!apiKey) continue;

    // 只有 OpenAI 允许通过环境变量改写端点，其余使用提供商默认端点
    const baseURL = provider === 'openai'
      ? env.OPENAI_BASE_URL || undefined
      : defaults.baseURL;

    configs.push({
      provider,
      apiKey,
      model: env[`${defaults.envPrefix}_MODEL`] || defaults.defaultModel,
      baseURL,
      maxTokens: 4096,
      temperature: 0.7,
      timeoutMs: 60000,
      maxRetries: 2,
    });
  }

  return configs;
}

function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) {
    return {};
  }
  try {
    const parsed = ConfigFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
    log.info('Loaded config file:', path);
    return parsed;
  } catch (error) {
    log.warn('Failed to load config file, using defaults:', error);
    return {};
  }
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const path = resolve(options.configPath || env.CONVERSA_CONFIG || DEFAULT_CONFIG_PATH);
  const file = readConfigFile(path);

  // 环境变量中的提供商覆盖配置文件里的同名提供商
  const envProviders = providersFromEnv(env);
  const envNames = new Set(envProviders.map(c => c.provider));
  const llm = [
    ...(file.llm ?? []).filter(c => !envNames.has(c.provider)),
    ...envProviders,
  ];

  const agent: Record<string, unknown> = { ...file.agent };
  const defaultProvider = env.DEFAULT_LLM_PROVIDER;
  if (defaultProvider) {
    const parsed = LLMProviderSchema.safeParse(defaultProvider);
    if (parsed.success) {
      agent.defaultProvider = parsed.data;
    } else {
      log.warn(`Ignoring unknown DEFAULT_LLM_PROVIDER: ${defaultProvider}`);
    }
  }

  return ConfigSchema.parse({
    agent,
    llm,
    dashscopeApiKey: env.DASHSCOPE_API_KEY || env.QWEN_API_KEY || undefined,
  });
}

export function getLLMConfig(config: Config, provider?: LLMProvider): LLMConfig | undefined {
  const target = provider ?? config.agent.defaultProvider;
  return config.llm.find(c => c.provider === target);
}

export function listAvailableProviders(config: Config): LLMProvider[] {
  return config.llm.map(c => c.provider);
}
