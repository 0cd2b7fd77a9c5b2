// src/app-context.ts
// 按配置组装应用：工具注册表、模型管理器、记忆管理器和 Agent

import type { Config, LLMProvider } from './config/schema.js';
import { listAvailableProviders } from './config/loader.js';
import { Agent, type ToolHooks } from './agents/agent.js';
import { LLMManager, type LLMClientFactory } from './agents/llm/manager.js';
import { ToolRegistry } from './agents/tools/registry.js';
import { calculatorTool } from './agents/tools/calculator.js';
import { dateTimeTool } from './agents/tools/datetime.js';
import { DocumentSearchTool } from './agents/tools/document-search.js';
import { webSearchTool } from './agents/tools/web-search.js';
import { createMultimodalTools } from './agents/tools/image-tools.js';
import { createMemoryManager, type MemoryManager } from './memory/manager.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Agent');

export interface AppOverrides {
  provider?: LLMProvider;
  docsPath?: string;
  memoryEnabled?: boolean;
  toolsEnabled?: boolean;
  hooks?: ToolHooks;
  clientFactory?: LLMClientFactory;
}

export interface AppContext {
  config: Config;
  provider: LLMProvider;
  llm: LLMManager;
  tools: ToolRegistry;
  documents?: DocumentSearchTool;
  memory?: MemoryManager;
  agent: Agent;
}

/**
 * 选择本次使用的提供商：显式指定 > 默认提供商 > 第一个已配置的提供商
 * 返回 undefined 表示没有可用的提供商（或指定的提供商未配置）
 */
export function pickProvider(config: Config, requested?: LLMProvider): LLMProvider | undefined {
  const available = listAvailableProviders(config);
  if (requested) {
    return available.includes(requested) ? requested : undefined;
  }
  if (available.includes(config.agent.defaultProvider)) {
    return config.agent.defaultProvider;
  }
  return available[0];
}

export function createToolRegistry(config: Config, docsPath: string): {
  tools: ToolRegistry;
  documents?: DocumentSearchTool;
} {
  const settings = config.agent;
  const tools = new ToolRegistry([calculatorTool, dateTimeTool]);

  let documents: DocumentSearchTool | undefined;
  if (settings.searchEnabled) {
    documents = new DocumentSearchTool(docsPath, undefined, settings.searchTopK);
    tools.register(documents);
  }
  if (settings.webSearchEnabled) {
    tools.register(webSearchTool);
  }
  if (settings.multimodalEnabled) {
    for (const tool of createMultimodalTools({
      apiKey: config.dashscopeApiKey,
      saveDir: settings.generatedImagesPath,
    })) {
      tools.register(tool);
    }
  }

  return { tools, documents };
}

export function createAppContext(config: Config, overrides: AppOverrides = {}): AppContext {
  const settings = config.agent;
  const toolsEnabled = overrides.toolsEnabled ?? settings.toolsEnabled;
  const memoryEnabled = overrides.memoryEnabled ?? settings.memoryEnabled;

  const llm = new LLMManager(config, overrides.clientFactory);
  const provider = pickProvider(config, overrides.provider) ?? overrides.provider ?? settings.defaultProvider;
  // 未配置时由 getClient 抛出 ProviderConfigError
  const client = llm.getClient(provider);

  const { tools, documents } = toolsEnabled
    ? createToolRegistry(config, overrides.docsPath ?? settings.searchDocsPath)
    : { tools: new ToolRegistry(), documents: undefined };

  const memory = memoryEnabled ? createMemoryManager(settings.memoryStoragePath) : undefined;

  const agent = new Agent({
    client,
    tools,
    memory,
    systemPrompt: settings.systemPrompt,
    historyLimit: settings.historyLimit,
    toolsEnabled,
    multimodalEnabled: settings.multimodalEnabled,
    hooks: overrides.hooks,
  });

  log.info(`App ready: provider=${provider}, tools=${tools.size}, memory=${memoryEnabled}`);
  return { config, provider, llm, tools, documents, memory, agent };
}
