import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Agent } from '../../agents/agent.js';
import type { LLMClient } from '../../agents/llm/types.js';
import { DocumentSearchTool } from '../../agents/tools/document-search.js';
import { createMemoryManager } from '../../memory/manager.js';
import type { ChatResult } from '../../types.js';
import { createCommandRegistry, type CommandContext } from '../commands/index.js';
import { formatProfile } from '../commands/memory.js';

class EchoClient implements LLMClient {
  readonly provider = 'openai' as const;
  readonly model = 'echo-model';

  async chat(): Promise<ChatResult> {
    return { content: 'hi there', toolCalls: [], usage: { promptTokens: 0, completionTokens: 0 } };
  }

  async *chatStream(): AsyncGenerator<string> {
    yield 'hi there';
  }
}

describe('CLI commands', () => {
  const registry = createCommandRegistry();
  let dir: string;
  let context: CommandContext;
  let exit: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'conversa-cli-'));
    exit = vi.fn();
    context = {
      agent: new Agent({ client: new EchoClient(), memory: createMemoryManager(join(dir, 'memory')) }),
      exit,
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should ignore plain messages', async () => {
    expect(await registry.dispatch('hello', context)).toBeNull();
  });

  test('should report unknown commands', async () => {
    expect(await registry.dispatch('/bogus now', context)).toBe('❓ 未知命令: /bogus now\n输入 /help 查看可用命令');
  });

  test('should list every command once in help', async () => {
    const help = await registry.dispatch('/?', context);
    expect(help?.split('\n').filter(line => line.startsWith('  /'))).toHaveLength(6);
    expect(help).toContain('  /quit     退出程序');
  });

  test('should show and clear history', async () => {
    await context.agent.chat('hello');

    expect(await registry.dispatch('/history', context)).toBe('📜 对话历史：\n  👤 用户: hello\n  🤖 助手: hi there');
    expect(await registry.dispatch('/reset', context)).toBe('✅ 对话历史已清空');
    expect(await registry.dispatch('/history', context)).toBe('📜 对话历史：\n  (暂无历史)');
  });

  test('should save and show memories', async () => {
    expect(await registry.dispatch('/memory', context)).toBe('📝 用户记忆：\n  (暂无记忆)');
    expect(await registry.dispatch('/memory pref 喜欢 Python', context))
      .toBe('📌 已保存到长期记忆\n内容：喜欢 Python\n类型：user_preference');
    expect(await registry.dispatch('/memory 住在杭州', context))
      .toBe('📌 已保存到长期记忆\n内容：住在杭州\n类型：fact');
    expect(await registry.dispatch('/mem', context))
      .toBe('📝 用户记忆：\n  偏好:\n    - 喜欢 Python\n  事实:\n    - 住在杭州');
  });

  test('should refuse memory commands when memory is disabled', async () => {
    const noMemory: CommandContext = { agent: new Agent({ client: new EchoClient() }), exit };
    expect(await registry.dispatch('/memory', noMemory)).toBe('❌ 记忆功能未启用');
  });

  test('should reload documents', async () => {
    const docs = join(dir, 'docs');
    const documents = new DocumentSearchTool(docs);
    expect(await registry.dispatch('/reload', context)).toBe('❌ 搜索工具未启用');

    writeFileSync(join(docs, 'a.md'), '# A');
    expect(await registry.dispatch('/reload', { ...context, documents })).toBe('✅ 文档已重新加载（共 1 个文档）');
  });

  test('should resolve names and aliases case-insensitively', () => {
    expect(registry.resolve('EXIT')?.name).toBe('quit');
    expect(registry.resolve('Reset')?.name).toBe('clear');
    expect(registry.resolve('nope')).toBeUndefined();
    expect(registry.list().map(c => c.name)).toEqual(['clear', 'memory', 'history', 'reload', 'help', 'quit']);
  });

  test('should exit on quit aliases', async () => {
    expect(await registry.dispatch('/Q', context)).toBe('再见！👋');
    expect(exit).toHaveBeenCalledTimes(1);
  });
});

describe('formatProfile', () => {
  test('should skip empty sections', () => {
    expect(formatProfile({ preferences: [], info: ['我是学生'], interests: ['对AI感兴趣'], facts: [] }))
      .toBe('📝 用户记忆：\n  基本信息:\n    - 我是学生\n  兴趣:\n    - 对AI感兴趣');
  });
});
