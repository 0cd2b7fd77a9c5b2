import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getLLMConfig, listAvailableProviders, loadConfig, providersFromEnv } from '../loader.js';

describe('providersFromEnv', () => {
  test('should only include providers with an API key', () => {
    const configs = providersFromEnv({ OPENAI_API_KEY: 'test-key', ZHIPU_API_KEY: '' });
    expect(configs.map(c => c.provider)).toEqual(['openai']);
    expect(configs[0]).toMatchObject({ apiKey: 'test-key', model: 'gpt-4o-mini', baseURL: undefined });
  });

  test('should apply model overrides and provider endpoints', () => {
    const configs = providersFromEnv({
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'https://proxy.test/v1',
      QWEN_API_KEY: 'test-key',
      QWEN_MODEL: 'qwen-vl-plus',
    });

    expect(configs.map(c => [c.provider, c.model, c.baseURL])).toEqual([
      ['openai', 'gpt-4o-mini', 'https://proxy.test/v1'],
      ['qwen', 'qwen-vl-plus', 'https://dashscope.aliyuncs.com/compatible-mode/v1'],
    ]);
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'conversa-config-'));
    configPath = join(dir, 'config.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should fill agent defaults without a config file', () => {
    const config = loadConfig({ env: { ANTHROPIC_API_KEY: 'test-key' }, configPath });

    expect(config.agent.historyLimit).toBe(10);
    expect(config.agent.defaultProvider).toBe('openai');
    expect(listAvailableProviders(config)).toEqual(['anthropic']);
    expect(getLLMConfig(config)).toBeUndefined();
    expect(getLLMConfig(config, 'anthropic')?.model).toBe('claude-3-5-sonnet-20241022');
  });

  test('should merge the config file with environment providers', () => {
    writeFileSync(configPath, JSON.stringify({
      agent: { historyLimit: 4, searchEnabled: false },
      llm: [
        { provider: 'deepseek', apiKey: 'file-key', model: 'deepseek-coder' },
        { provider: 'zhipu', apiKey: 'file-key', model: 'glm-4-flash' },
      ],
    }));

    const config = loadConfig({
      env: { DEEPSEEK_API_KEY: 'test-key', DEFAULT_LLM_PROVIDER: 'zhipu' },
      configPath,
    });

    expect(config.agent.historyLimit).toBe(4);
    expect(config.agent.searchEnabled).toBe(false);
    expect(config.agent.defaultProvider).toBe('zhipu');
    expect(config.llm.map(c => [c.provider, c.apiKey, c.model])).toEqual([
      ['zhipu', 'file-key', 'glm-4-flash'],
      ['deepseek', 'test-key', 'deepseek-chat'],
    ]);
  });

  test('should ignore an unknown default provider', () => {
    const config = loadConfig({ env: { DEFAULT_LLM_PROVIDER: 'bogus' }, configPath });
    expect(config.agent.defaultProvider).toBe('openai');
  });

  test('should fall back to defaults when the config file is invalid', () => {
    writeFileSync(configPath, '{ not json');
    const config = loadConfig({ env: {}, configPath });

    expect(config.llm).toEqual([]);
    expect(config.agent.memoryEnabled).toBe(true);
  });

  test('should reuse the Qwen key for image generation', () => {
    expect(loadConfig({ env: { QWEN_API_KEY: 'test-key' }, configPath }).dashscopeApiKey).toBe('test-key');
    expect(loadConfig({ env: { QWEN_API_KEY: 'test-key', DASHSCOPE_API_KEY: 'image-key' }, configPath }).dashscopeApiKey)
      .toBe('image-key');
  });
});
