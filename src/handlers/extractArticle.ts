import type pino from 'pino';
import { ExtractArticleInput } from '../mcp/schemas';
import type { ExtractArticleInputType, ExtractArticleOutputType } from '../mcp/schemas';
import { extractArticle, toArticleJson } from '../core/content/htmlContentExtractor';
import type { ExtractionOptionsInput } from '../core/content/types/extraction';
import type { ResultCache } from '../core/cache/resultCache';
import { formatArticle } from '../utils/articleFormatter';
import { ExtractionError, ValidationError } from '../mcp/errors';
import { getEnvironment } from '../config/environment';
import type { HandlerContext } from '../mcp/mcpServer';

export interface ExtractArticleHandlerOptions {
  /** Overrides the process-wide result cache; `null` disables caching */
  cache?: ResultCache | null;
}

function toExtractionOptions(input: ExtractArticleInputType): ExtractionOptionsInput {
  const env = getEnvironment();
  return {
    minWordCount: input.minWordCount ?? env.PAGE_DISTILL_MIN_WORD_COUNT,
    maxOutputChars: input.maxOutputChars ?? env.PAGE_DISTILL_MAX_OUTPUT_CHARS,
    ...(input.includeImages !== undefined && { includeImages: input.includeImages }),
    ...(input.includeCode !== undefined && { includeCode: input.includeCode }),
    ...(input.languageHint !== undefined && { languageHint: input.languageHint }),
  };
}

export async function handleExtractArticle(
  args: unknown,
  logger: pino.Logger,
  context?: HandlerContext,
  handlerOptions: ExtractArticleHandlerOptions = {}
): Promise<{ content: { type: 'text'; text: string }[]; isError?: boolean }> {
  const parsed = ExtractArticleInput.safeParse(args);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')
    );
  }
  const input = parsed.data;

  logger.debug(
    { url: input.url, htmlLength: input.html.length, format: input.format },
    'Processing article extraction request'
  );

  await context?.sendProgress(0, 100, 'Extracting article...');
  const bindings = logger.bindings();
  const result = await extractArticle(input.html, {
    url: input.url,
    options: toExtractionOptions(input),
    correlationId: typeof bindings.correlationId === 'string' ? bindings.correlationId : undefined,
    ...(handlerOptions.cache !== undefined && { cache: handlerOptions.cache }),
  });
  await context?.sendProgress(100, 100, 'Extraction complete');

  if (!result.success && input.format !== 'json') {
    throw new ExtractionError(result.error ?? 'unknown error', input.url);
  }

  const output: ExtractArticleOutputType = toArticleJson(result);
  logger.info(
    { success: output.success, wordCount: output.word_count, warnings: output.warnings.length },
    'Article extraction completed'
  );

  return {
    content: [
      {
        type: 'text',
        text: input.format === 'json' ? JSON.stringify(output, null, 2) : formatArticle(result, input.format),
      },
    ],
    ...(!result.success && { isError: true }),
  };
}
