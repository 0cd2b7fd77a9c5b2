// src/cli/commands/history.ts

import type { CommandRegistry } from './registry.js';
import { contentToText } from '../../types.js';

const PREVIEW_LENGTH = 100;

const ROLE_LABELS: Record<string, string> = {
  user: '👤 用户',
  assistant: '🤖 助手',
  tool: '🔧 工具',
};

export function registerHistoryCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'history',
    description: '显示当前对话历史',
    aliases: [],
    handler: async (_args, context) => {
      const history = context.agent.getConversationHistory();
      const lines = ['📜 对话历史：'];

      if (history.length === 0) {
        lines.push('  (暂无历史)');
      }
      for (const entry of history) {
        const text = contentToText(entry.content);
        const preview = text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
        lines.push(`  ${ROLE_LABELS[entry.role] ?? entry.role}: ${preview}`);
      }

      return lines.join('\n');
    },
  });
}
