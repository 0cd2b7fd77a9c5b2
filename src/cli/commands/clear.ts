// src/cli/commands/clear.ts

import type { CommandRegistry } from './registry.js';

/**
 * 注册 /clear 命令
 *
 * 只清空对话历史，长期记忆不受影响
 */
export function registerClearCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'clear',
    description: '清空当前对话历史，开始新对话',
    aliases: ['reset', 'new'],
    handler: async (_args, context) => {
      context.agent.resetConversation();
      return '✅ 对话历史已清空';
    },
  });
}
