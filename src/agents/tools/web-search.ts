// src/agents/tools/web-search.ts
// 网络搜索工具 - 占位实现，接入真实搜索 API 前返回模拟结果

import { defineTool, stringArg, type Tool } from './types.js';

export const webSearchTool: Tool = defineTool(
  {
    name: 'web_search',
    description: '在互联网上搜索信息。当用户询问最新新闻、实时信息或本地知识库无法回答的问题时使用。',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: '搜索查询',
        required: true,
      },
    ],
  },
  (args) => {
    const query = stringArg(args, 'query', '') ?? '';
    return [
      '网络搜索结果 (模拟):',
      '',
      `查询: ${query}`,
      '',
      '【结果 1】',
      `标题: 关于 ${query} 的介绍`,
      '来源: example.com',
      `摘要: 这是一个关于 ${query} 的模拟搜索结果...`,
      '',
      '【结果 2】',
      `标题: ${query} 最新动态`,
      '来源: news.example.com',
      `摘要: 这是关于 ${query} 的最新新闻...`,
      '',
      '注意: 这是模拟数据，如需真实搜索结果，请配置搜索API。',
    ].join('\n');
  }
);
