// src/cli/repl.ts

import { createInterface } from 'node:readline';
import type { AppContext } from '../app-context.js';
import { ProviderError } from '../agents/llm/errors.js';
import { createCommandRegistry, type CommandContext } from './commands/index.js';

const TOOL_RESULT_PREVIEW = 200;

export const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║                    🤖 通用对话 Agent                           ║
║                                                               ║
║  功能特性:                                                     ║
║  • 多轮对话 - 保持上下文连贯                                    ║
║  • 智能搜索 - 自动检索本地文档                                  ║
║  • 记忆系统 - 记住用户偏好和信息                                ║
║  • 工具调用 - 计算器、日期时间等                                ║
║                                                               ║
║  命令:                                                         ║
║  • /clear  - 清空对话历史                                      ║
║  • /memory - 查看记忆内容                                      ║
║  • /help   - 显示帮助                                          ║
║  • /quit   - 退出程序                                          ║
╚═══════════════════════════════════════════════════════════════╝
`;

export function truncateToolResult(result: string, max = TOOL_RESULT_PREVIEW): string {
  return result.length > max ? `${result.slice(0, max)}...` : result;
}

export function describeError(error: unknown): string {
  if (error instanceof ProviderError) {
    return `${error.userMessage} (${error.message})`;
  }
  return error instanceof Error ? error.message : String(error);
}

export interface ReplIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * 交互式对话循环，输入结束（EOF / Ctrl-C / /quit）时返回
 */
export async function runRepl(app: AppContext, io: ReplIO = { input: process.stdin, output: process.stdout }): Promise<void> {
  const print = (text = ''): void => {
    io.output.write(`${text}\n`);
  };

  app.agent.setToolHooks({
    onToolCall: (name) => print(`\n🔧 调用工具: ${name}`),
    onToolResult: (_name, result) => print(`📋 工具结果: ${truncateToolResult(result)}\n`),
  });

  const rl = createInterface({ input: io.input, output: io.output, terminal: io.input === process.stdin && Boolean(process.stdin.isTTY) });
  const commands = createCommandRegistry();
  let running = true;
  const context: CommandContext = {
    agent: app.agent,
    documents: app.documents,
    exit: () => {
      running = false;
    },
  };

  rl.on('SIGINT', () => {
    print('\n\n再见！👋');
    running = false;
    rl.close();
  });

  rl.setPrompt('👤 你: ');
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (input) {
      try {
        const reply = await commands.dispatch(input, context);
        if (reply !== null) {
          print(`\n${reply}\n`);
        } else {
          io.output.write('\n🤖 助手: ');
          print(await app.agent.chat(input));
          print();
        }
      } catch (error) {
        print(`\n❌ 发生错误: ${describeError(error)}`);
        print('请重试或输入 /quit 退出\n');
      }
    }

    if (!running) {
      rl.close();
      break;
    }
    rl.prompt();
  }
}
