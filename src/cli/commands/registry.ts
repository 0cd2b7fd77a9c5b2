// src/cli/commands/registry.ts

import type { Agent } from '../../agents/agent.js';
import type { DocumentSearchTool } from '../../agents/tools/document-search.js';

export interface CommandContext {
  agent: Agent;
  documents?: DocumentSearchTool;
  exit: () => void;
}

export interface Command {
  name: string;
  description: string;
  aliases: string[];
  handler: (args: string[], context: CommandContext) => Promise<string>;
}

/**
 * 斜杠命令表：命令按注册顺序保存，别名单独映射到命令名
 */
export class CommandRegistry {
  private commands: Map<string, Command> = new Map();
  private aliases: Map<string, string> = new Map();

  register(command: Command): void {
    this.commands.set(command.name, command);
    for (const alias of command.aliases) {
      this.aliases.set(alias, command.name);
    }
  }

  resolve(name: string): Command | undefined {
    const key = name.toLowerCase();
    return this.commands.get(key) ?? this.commands.get(this.aliases.get(key) ?? '');
  }

  list(): Command[] {
    return [...this.commands.values()];
  }

  /**
   * 执行一条以 / 开头的命令；普通消息返回 null
   */
  async dispatch(message: string, context: CommandContext): Promise<string | null> {
    const trimmed = message.trim();
    if (!trimmed.startsWith('/')) {
      return null;
    }

    const [name, ...args] = trimmed.slice(1).split(/\s+/);
    const command = this.resolve(name);
    if (!command) {
      return `❓ 未知命令: ${trimmed}\n输入 /help 查看可用命令`;
    }
    return command.handler(args, context);
  }
}
