// src/agents/tools/document-search.ts
// 本地文档搜索工具

import { existsSync, mkdirSync, readdirSync, readFileSync } from 'fs';
import { extname, join, relative } from 'path';
import { createLogger } from '../../utils/logger.js';
import { scoreRelevance } from '../../utils/relevance.js';
import { numberArg, stringArg, type Tool, type ToolArguments, type ToolParameter } from './types.js';

const log = createLogger('DocumentSearch');

export interface DocumentSearchResult {
  title: string;
  source: string;
  score: number;
  snippet: string;
}

export function extractSnippet(query: string, content: string, maxLength = 200): string {
  const queryLower = query.toLowerCase();
  const contentLower = content.toLowerCase();

  let pos = queryLower ? contentLower.indexOf(queryLower) : -1;
  if (pos === -1) {
    for (const word of queryLower.split(/\s+/).filter(Boolean)) {
      pos = contentLower.indexOf(word);
      if (pos !== -1) break;
    }
  }

  if (pos === -1) {
    return content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
  }

  const start = Math.max(0, pos - 50);
  const end = Math.min(content.length, pos + maxLength - 50);

  let snippet = content.slice(start, end);
  if (start > 0) snippet = `...${snippet}`;
  if (end < content.length) snippet = `${snippet}...`;
  return snippet;
}

export class DocumentSearchTool implements Tool {
  readonly name = 'search_documents';
  readonly description = '在本地知识库中搜索相关文档。当用户询问特定主题、需要查找信息或回答需要依据时使用此工具。';
  readonly parameters: ToolParameter[];

  private documents: Map<string, string> = new Map();

  constructor(
    private readonly docsPath: string,
    private readonly extensions: string[] = ['.txt', '.md', '.json'],
    defaultTopK = 3
  ) {
    this.parameters = [
      {
        name: 'query',
        type: 'string',
        description: '搜索查询关键词，可以是问题或关键词组合',
        required: true,
      },
      {
        name: 'top_k',
        type: 'number',
        description: `返回结果数量，默认为${defaultTopK}`,
        required: false,
        default: defaultTopK,
      },
    ];
    this.loadDocuments();
  }

  get documentCount(): number {
    return this.documents.size;
  }

  /**
   * 重新扫描文档目录，返回加载的文档数量
   */
  reload(): number {
    this.documents.clear();
    this.loadDocuments();
    return this.documents.size;
  }

  private loadDocuments(): void {
    if (!existsSync(this.docsPath)) {
      try {
        mkdirSync(this.docsPath, { recursive: true });
      } catch (error) {
        log.warn(`Cannot create docs directory ${this.docsPath}:`, error);
      }
      return;
    }
    this.walk(this.docsPath);
    log.info(`Loaded ${this.documents.size} documents from ${this.docsPath}`);
  }

  private walk(dir: string): void {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        this.walk(fullPath);
      } else if (entry.isFile() && this.extensions.includes(extname(entry.name).toLowerCase())) {
        try {
          this.documents.set(relative(this.docsPath, fullPath), readFileSync(fullPath, 'utf-8'));
        } catch (error) {
          log.warn(`Failed to load document ${fullPath}:`, error);
        }
      }
    }
  }

  search(query: string, topK: number): DocumentSearchResult[] {
    const results: DocumentSearchResult[] = [];

    for (const [source, content] of this.documents) {
      const score = scoreRelevance(query, content);
      if (score <= 0) continue;

      const firstLine = content.split('\n')[0].trim();
      results.push({
        title: firstLine ? firstLine.slice(0, 50) : source,
        source,
        score,
        snippet: extractSnippet(query, content),
      });
    }

    return results
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(1, Math.floor(topK)));
  }

  async execute(args: ToolArguments): Promise<string> {
    if (this.documents.size === 0) {
      return '没有可搜索的文档。请确保文档目录存在且包含文档文件。';
    }

    const query = stringArg(args, 'query', '') ?? '';
    const results = this.search(query, numberArg(args, 'top_k', 3));

    if (results.length === 0) {
      return `未找到与 '${query}' 相关的文档。`;
    }

    const lines = [`找到 ${results.length} 条相关结果:\n`];
    results.forEach((result, index) => {
      lines.push(`【结果 ${index + 1}】`);
      lines.push(`来源: ${result.source}`);
      lines.push(`标题: ${result.title}`);
      lines.push(`内容摘要: ${result.snippet}`);
      lines.push('');
    });
    return lines.join('\n');
  }
}
