// src/cli/commands/memory.ts

import type { CommandRegistry } from './registry.js';
import type { MemoryKind, UserProfile } from '../../memory/types.js';

const PROFILE_LABELS: Record<keyof UserProfile, string> = {
  preferences: '偏好',
  info: '基本信息',
  interests: '兴趣',
  facts: '事实',
};

const PROFILE_KEYS: Array<keyof UserProfile> = ['preferences', 'info', 'interests', 'facts'];

const KIND_PREFIXES: Record<string, MemoryKind> = {
  pref: 'user_preference',
  preference: 'user_preference',
  info: 'user_info',
  interest: 'topic_interest',
  fact: 'fact',
};

export function formatProfile(profile: UserProfile): string {
  const lines = ['📝 用户记忆：'];
  let empty = true;

  for (const key of PROFILE_KEYS) {
    const values = profile[key];
    if (values.length === 0) continue;
    empty = false;
    lines.push(`  ${PROFILE_LABELS[key]}:`);
    for (const value of values) {
      lines.push(`    - ${value}`);
    }
  }

  if (empty) {
    lines.push('  (暂无记忆)');
  }
  return lines.join('\n');
}

/**
 * 注册 /memory 命令
 *
 * 用法：
 *   /memory              → 显示已保存的用户记忆
 *   /memory <内容>       → 保存为事实
 *   /memory pref <内容>  → 保存为用户偏好（也支持 info / interest / fact）
 */
export function registerMemoryCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'memory',
    description: '显示已保存的用户记忆，或用 /memory <内容> 手动保存',
    aliases: ['mem', 'remember'],
    handler: async (args, context) => {
      if (!context.agent.memoryEnabled) {
        return '❌ 记忆功能未启用';
      }

      if (args.length === 0) {
        return formatProfile(await context.agent.getUserProfile());
      }

      let kind: MemoryKind = 'fact';
      let contentArgs = args;
      const prefixed = KIND_PREFIXES[args[0].toLowerCase()];
      if (args.length > 1 && prefixed) {
        kind = prefixed;
        contentArgs = args.slice(1);
      }

      const content = contentArgs.join(' ');
      const item = await context.agent.addMemory(content, kind);
      return item
        ? `📌 已保存到长期记忆\n内容：${content}\n类型：${kind}`
        : '❌ 保存失败';
    },
  });
}
