// src/cli/commands/reload.ts

import type { CommandRegistry } from './registry.js';

export function registerReloadCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'reload',
    description: '重新加载文档',
    aliases: [],
    handler: async (_args, context) => {
      if (!context.documents) {
        return '❌ 搜索工具未启用';
      }
      const count = context.documents.reload();
      return `✅ 文档已重新加载（共 ${count} 个文档）`;
    },
  });
}
