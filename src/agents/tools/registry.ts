// src/agents/tools/registry.ts

import { createLogger } from '../../utils/logger.js';
import {
  toToolSchema,
  type Tool,
  type ToolArguments,
  type ToolDefinition,
  type ToolSchema,
} from './types.js';

const log = createLogger('Tools');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isPlainObject(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ArgumentError extends Error {}

/**
 * 工具注册表
 *
 * 由应用入口创建并注入到 Agent，同名工具后注册者覆盖先注册者。
 * execute 永远返回字符串：工具的任何失败都会变成一段可以交给模型的文本。
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      log.debug(`Replacing tool: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  listDefinitions(): ToolDefinition[] {
    return this.list().map(t => ({
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    }));
  }

  /**
   * 获取所有工具声明（function calling 格式）
   */
  getDefinitions(): ToolSchema[] {
    return this.list().map(t => toToolSchema(t));
  }

  get size(): number {
    return this.tools.size;
  }

  clear(): void {
    this.tools.clear();
  }

  async execute(name: string, args: string | ToolArguments): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      log.warn(`Tool not found: ${name}`);
      return `错误: 工具 '${name}' 不存在`;
    }

    let bound: ToolArguments;
    try {
      bound = this.bindArguments(tool, this.parseArguments(args));
    } catch (error) {
      log.warn(`Invalid arguments for ${name}:`, errorMessage(error));
      return `错误: 参数解析失败 - ${errorMessage(error)}`;
    }

    const startTime = Date.now();
    try {
      const result = await tool.execute(bound);
      log.debug(`Tool ${name} completed in ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      log.error(`Tool ${name} failed after ${Date.now() - startTime}ms:`, errorMessage(error));
      return `错误: 工具执行失败 - ${errorMessage(error)}`;
    }
  }

  private parseArguments(args: string | ToolArguments): ToolArguments {
    if (typeof args !== 'string') {
      return args;
    }
    if (args.trim() === '') {
      return {};
    }
    const parsed: unknown = JSON.parse(args);
    if (!isPlainObject(parsed)) {
      throw new ArgumentError('参数必须是 JSON 对象');
    }
    return parsed;
  }

  /**
   * 补齐可选参数的默认值，检查必需参数
   */
  private bindArguments(tool: Tool, args: ToolArguments): ToolArguments {
    const bound: ToolArguments = { ...args };
    const missing: string[] = [];

    for (const param of tool.parameters) {
      if (bound[param.name] !== undefined && bound[param.name] !== null) continue;

      if (param.default !== undefined) {
        bound[param.name] = param.default;
      } else if (param.required !== false) {
        missing.push(param.name);
      }
    }

    if (missing.length > 0) {
      throw new ArgumentError(`缺少必需参数: ${missing.join(', ')}`);
    }
    return bound;
  }
}
