// src/cli/commands/help.ts

import type { CommandRegistry } from './registry.js';

export function registerHelpCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'help',
    description: '显示此帮助信息',
    aliases: ['h', '?'],
    async handler() {
      const commands = registry.list();
      const helpText = commands
        .map(c => `  /${c.name.padEnd(9)}${c.description}`)
        .join('\n');

      return [
        '可用命令：',
        helpText,
        '',
        '提示：',
        '  - 可以询问任何问题，Agent 会尝试回答',
        '  - 当需要查找信息时，Agent 会自动搜索本地文档',
        '  - 分享你的偏好，Agent 会记住它们',
        '  - 用 [image:图片路径] 附带一张图片',
      ].join('\n');
    },
  });
}
