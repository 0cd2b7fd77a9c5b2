// src/agents/tools/types.ts

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required?: boolean;  // 默认为 true
  enum?: string[];
  default?: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export type ToolArguments = Record<string, unknown>;

export interface Tool extends ToolDefinition {
  execute: (args: ToolArguments) => Promise<string>;
}

// function calling 格式的工具声明
export interface ToolSchemaProperty {
  type: ToolParameterType;
  description: string;
  enum?: string[];
}

export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, ToolSchemaProperty>;
      required: string[];
    };
  };
}

export function toToolSchema(definition: ToolDefinition): ToolSchema {
  const properties: Record<string, ToolSchemaProperty> = {};
  const required: string[] = [];

  for (const param of definition.parameters) {
    const prop: ToolSchemaProperty = {
      type: param.type,
      description: param.description,
    };
    if (param.enum && param.enum.length > 0) {
      prop.enum = param.enum;
    }
    properties[param.name] = prop;

    if (param.required !== false) {
      required.push(param.name);
    }
  }

  return {
    type: 'function',
    function: {
      name: definition.name,
      description: definition.description,
      parameters: {
        type: 'object',
        properties,
        required,
      },
    },
  };
}

/**
 * 用普通函数快速构建工具，非字符串结果会被序列化
 */
export function defineTool(
  definition: ToolDefinition,
  fn: (args: ToolArguments) => unknown
): Tool {
  return {
    ...definition,
    execute: async (args) => {
      const result = await fn(args);
      if (typeof result === 'string') return result;
      if (result === undefined) return '';
      return JSON.stringify(result);
    },
  };
}

export function stringArg(args: ToolArguments, key: string, fallback?: string): string | undefined {
  const value = args[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function numberArg(args: ToolArguments, key: string, fallback: number): number {
  const value = args[key];
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : fallback;
}
