import { toArticleJson } from '../core/content/htmlContentExtractor';
import type { ArticleResult } from '../core/content/types/extraction';

export const OUTPUT_FORMATS = ['json', 'markdown', 'text'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/** Renders a result the way the CLI and the MCP tool print it. */
export function formatArticle(result: ArticleResult, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toArticleJson(result), null, 2);
    case 'markdown':
      return result.markdown;
    case 'text':
      return [
        `Title: ${result.title || 'Untitled'}`,
        `Author: ${result.author ?? 'Unknown'}`,
        `Words: ${result.wordCount}`,
        '',
        result.excerpt,
      ].join('\n');
  }
}
