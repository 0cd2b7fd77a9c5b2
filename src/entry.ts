#!/usr/bin/env node
// src/entry.ts

// 加载 .env 环境变量文件
import dotenv from 'dotenv';
dotenv.config();

import { realpathSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, getLLMConfig, listAvailableProviders } from './config/loader.js';
import { LLMProviderSchema, PROVIDER_DEFAULTS } from './config/schema.js';
import { createAppContext, pickProvider } from './app-context.js';
import { CliUsageError, USAGE, parseCliArgs, type CliOptions } from './cli/args.js';
import { BANNER, describeError, runRepl } from './cli/repl.js';

/**
 * 启动命令行对话，返回进程退出码
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`❌ ${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const available = listAvailableProviders(config);

  if (available.length === 0) {
    console.error('\n❌ 错误: 未配置任何LLM API Key');
    console.error('请设置以下环境变量之一：');
    for (const provider of LLMProviderSchema.options) {
      console.error(`  - ${PROVIDER_DEFAULTS[provider].envPrefix}_API_KEY`);
    }
    return 1;
  }

  const provider = pickProvider(config, options.provider);
  if (!provider) {
    console.error(`\n❌ 错误: ${options.provider} 未配置API Key`);
    console.error(`可用的Provider: ${available.join(', ')}`);
    return 1;
  }

  const docsPath = options.docs ?? config.agent.searchDocsPath;
  const memoryEnabled = options.memory && config.agent.memoryEnabled;
  const toolsEnabled = options.tools && config.agent.toolsEnabled;

  console.log(BANNER);
  console.log(`当前模型: ${provider} (${getLLMConfig(config, provider)?.model ?? '未知'})`);
  console.log(`文档路径: ${docsPath}`);
  console.log(`记忆功能: ${memoryEnabled ? '启用' : '禁用'}`);
  console.log(`工具功能: ${toolsEnabled ? '启用' : '禁用'}`);
  console.log(`\n${'='.repeat(60)}\n`);

  const app = createAppContext(config, { provider, docsPath, memoryEnabled, toolsEnabled });
  await runRepl(app);
  return 0;
}

// Run if called directly
const __filename = fileURLToPath(import.meta.url);
if (process.argv[1] && path.resolve(__filename) === realpathSync(path.resolve(process.argv[1]))) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(`❌ 启动失败: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
