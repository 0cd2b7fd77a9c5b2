// src/agents/llm/manager.ts

import type { Config, LLMConfig, LLMProvider } from '../../config/schema.js';
import { PROVIDER_DEFAULTS } from '../../config/schema.js';
import { getLLMConfig, listAvailableProviders } from '../../config/loader.js';
import { createLogger } from '../../utils/logger.js';
import { AnthropicClient } from './anthropic-client.js';
import { ProviderConfigError } from './errors.js';
import { OpenAICompatClient } from './openai-client.js';
import type { LLMClient } from './types.js';

const log = createLogger('LLM');

export type LLMClientFactory = (config: LLMConfig) => LLMClient;

/**
 * 按协议选择客户端实现
 */
export function createLLMClient(config: LLMConfig): LLMClient {
  switch (PROVIDER_DEFAULTS[config.provider].protocol) {
    case 'anthropic':
      return new AnthropicClient(config);
    case 'openai':
      return new OpenAICompatClient(config);
  }
}

/**
 * 每个提供商惰性创建一个客户端并缓存
 */
export class LLMManager {
  private clients: Map<LLMProvider, LLMClient> = new Map();

  constructor(
    private config: Config,
    private factory: LLMClientFactory = createLLMClient
  ) {}

  get defaultProvider(): LLMProvider {
    return this.config.agent.defaultProvider;
  }

  getClient(provider: LLMProvider = this.defaultProvider): LLMClient {
    const cached = this.clients.get(provider);
    if (cached) {
      return cached;
    }

    const llmConfig = getLLMConfig(this.config, provider);
    if (!llmConfig) {
      throw new ProviderConfigError(
        provider,
        `LLM 提供商 '${provider}' 未配置，请设置 ${PROVIDER_DEFAULTS[provider].envPrefix}_API_KEY`
      );
    }

    log.info(`Using ${provider} model: ${llmConfig.model}`);
    const client = this.factory(llmConfig);
    this.clients.set(provider, client);
    return client;
  }

  listAvailable(): LLMProvider[] {
    return listAvailableProviders(this.config);
  }
}
