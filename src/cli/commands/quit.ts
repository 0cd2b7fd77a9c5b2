// src/cli/commands/quit.ts

import type { CommandRegistry } from './registry.js';

export function registerQuitCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'quit',
    description: '退出程序',
    aliases: ['exit', 'q'],
    handler: async (_args, context) => {
      context.exit();
      return '再见！👋';
    },
  });
}
