// src/index.ts

export * from './types.js';
export { Agent, DEFAULT_SYSTEM_PROMPT, FALLBACK_REPLY, MAX_TOOL_ITERATIONS } from './agents/agent.js';
export type { AgentOptions, ChatTurnOptions, HistoryEntry, ToolHooks } from './agents/agent.js';
export { ConversationContext } from './agents/conversation.js';
export { buildMessageContent, parseImageMarker } from './agents/content.js';
export { TurnAbortedError } from './agents/errors.js';

export type { ChatOptions, LLMClient } from './agents/llm/types.js';
export { LLMManager, createLLMClient } from './agents/llm/manager.js';
export { OpenAICompatClient } from './agents/llm/openai-client.js';
export { AnthropicClient } from './agents/llm/anthropic-client.js';
export {
  ImageResourceError,
  ProviderConfigError,
  ProviderError,
  ProviderResponseError,
  ProviderTransportError,
  toProviderError,
} from './agents/llm/errors.js';

export { ToolRegistry } from './agents/tools/registry.js';
export { defineTool, toToolSchema } from './agents/tools/types.js';
export type { Tool, ToolArguments, ToolDefinition, ToolParameter, ToolSchema } from './agents/tools/types.js';
export { calculatorTool, evaluateExpression } from './agents/tools/calculator.js';
export { dateTimeTool } from './agents/tools/datetime.js';
export { DocumentSearchTool } from './agents/tools/document-search.js';
export { webSearchTool } from './agents/tools/web-search.js';
export { createMultimodalTools, ImageGenerationTool } from './agents/tools/image-tools.js';

export { MemoryManager, createMemoryManager } from './memory/manager.js';
export { FileMemoryStore } from './memory/file-store.js';
export { createPatternClassifier, patternClassifier } from './memory/classifier.js';
export type { MemoryClassifier } from './memory/classifier.js';
export type { MemoryItem, MemoryKind, MemoryStore, UserProfile } from './memory/types.js';

export { loadConfig, getLLMConfig, listAvailableProviders } from './config/loader.js';
export type { Config, LLMConfig, LLMProvider, AgentSettings } from './config/schema.js';

export { ErrorClassifier } from './reliability/error-classifier.js';
export { ErrorCategory } from './reliability/types.js';

export { createAppContext, pickProvider } from './app-context.js';
export type { AppContext, AppOverrides } from './app-context.js';
