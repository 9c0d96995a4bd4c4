import type * as cheerio from 'cheerio';
import type { Document } from 'domhandler';
import type pino from 'pino';
import { z } from 'zod';
import { assertTreeInvariants, getBody, getDocumentRoot, loadDocument, parseHtml } from './documentParser';
import { normalizeTree } from './treeNormalizer';
import { scoreCandidates } from './candidateScorer';
import { selectCandidate } from './candidateSelector';
import { cleanContent } from './contentCleaner';
import type { CleanedContent } from './contentCleaner';
import { snapshotDocumentHead } from './metadata/documentHead';
import { extractMetadata } from './metadata/metadataExtractor';
import { serializeHtml } from './serializers/htmlSerializer';
import { markdownConverter } from './serializers/markdownConverter';
import { buildExcerpt, extractVisibleText, markdownToPlainText } from './serializers/textCleaner';
import { countTextCharacters, trimTreeToTextBudget } from './serializers/outputBudget';
import { collectVisibleText, countWords } from './domUtils';
import { computeFingerprint } from './hasher';
import { TreeInvariantError, describeError } from './errors';
import { createExtractionOptions } from './types/extraction';
import type {
  ArticleJson,
  ArticleResult,
  ExtractionOptions,
  ExtractionOptionsInput,
  ExtractionRequest,
} from './types/extraction';
import { getDefaultResultCache } from '../cache/resultCache';
import type { ResultCache } from '../cache/resultCache';
import { createChildLogger, generateCorrelationId, withTiming, withTimingSync } from '../../utils/logger';

export interface ExtractArticleRequest extends ExtractionRequest {
  /** Cache to consult; `null` bypasses caching, omitted uses the process-wide cache */
  cache?: ResultCache | null;
}

export interface DocumentExtractionRequest {
  url?: string;
  options?: ExtractionOptionsInput;
  correlationId?: string;
}

interface Serialized {
  content: string;
  markdown: string;
}

const MAX_BUDGET_PASSES = 8;

/**
 * Extracts the article from raw HTML. Results are memoized by a fingerprint
 * of the HTML, the options and the URL; concurrent calls for the same
 * fingerprint share one computation. Invalid options produce a failed
 * result instead of a rejection.
 */
export async function extractArticle(html: string, request: ExtractArticleRequest = {}): Promise<ArticleResult> {
  const correlationId = request.correlationId || generateCorrelationId();
  const logger = createChildLogger(correlationId);
  const parsed = parseOptions(request.options, request.url, logger);
  if (!parsed.ok) return parsed.failure;
  const options = parsed.options;
  const fingerprint = computeFingerprint(html, options, request.url);
  const cache = request.cache === undefined ? getDefaultResultCache() : request.cache;

  logger.info(
    {
      event: 'extraction_start',
      url: request.url,
      htmlLength: html.length,
      fingerprint: fingerprint.slice(0, 16),
      cached: cache?.has(fingerprint) ?? false,
    },
    'Starting article extraction'
  );

  const compute = (): ArticleResult => extractFromHtml(html, options, request.url, logger);

  const result = await withTiming(
    logger,
    'article_extraction',
    () => (cache ? cache.getOrCompute(fingerprint, compute) : Promise.resolve(compute())),
    { fingerprint: fingerprint.slice(0, 16) }
  );

  logger.info(
    {
      event: 'extraction_complete',
      success: result.success,
      wordCount: result.wordCount,
      warnings: result.warnings.length,
    },
    result.success ? 'Article extracted' : 'Article extraction failed'
  );
  return result;
}

/**
 * Runs the pipeline over a tree the caller already parsed. The tree is
 * mutated in place. Throws TreeInvariantError when the tree is cyclic or
 * its parent links are inconsistent; never caches.
 */
export function extractArticleFromDocument(root: Document, request: DocumentExtractionRequest = {}): ArticleResult {
  const logger = createChildLogger(request.correlationId || generateCorrelationId());
  const parsed = parseOptions(request.options, request.url, logger);
  if (!parsed.ok) return parsed.failure;
  assertTreeInvariants(root);
  return runPipeline(loadDocument(root), parsed.options, request.url, logger);
}

type ParsedOptions = { ok: true; options: ExtractionOptions } | { ok: false; failure: ArticleResult };

function parseOptions(
  input: ExtractionOptionsInput | undefined,
  url: string | undefined,
  logger: pino.Logger
): ParsedOptions {
  try {
    return { ok: true, options: createExtractionOptions(input) };
  } catch (error) {
    if (!(error instanceof z.ZodError)) throw error;
    const issues = error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`).join('; ');
    logger.warn({ event: 'invalid_options', issues }, 'Rejected extraction options');
    return { ok: false, failure: createFailureResult(url, `Invalid options: ${issues}`, []) };
  }
}

function extractFromHtml(
  html: string,
  options: ExtractionOptions,
  url: string | undefined,
  logger: pino.Logger
): ArticleResult {
  try {
    const $ = withTimingSync(logger, 'parse', () => parseHtml(html), { htmlLength: html.length });
    return runPipeline($, options, url, logger);
  } catch (error) {
    if (error instanceof TreeInvariantError) throw error;
    logger.error({ event: 'parse_failed', error: describeError(error) }, 'Failed to parse HTML');
    return createFailureResult(url, `Failed to parse HTML: ${describeError(error)}`, []);
  }
}

function runPipeline(
  $: cheerio.CheerioAPI,
  options: ExtractionOptions,
  url: string | undefined,
  logger: pino.Logger
): ArticleResult {
  const warnings: string[] = [];

  try {
    const head = snapshotDocumentHead($);
    withTimingSync(logger, 'normalize', () => normalizeTree($, logger));

    const root = getDocumentRoot($);
    const scope = getBody($) ?? root;
    const scores = withTimingSync(logger, 'score', () => scoreCandidates(scope, logger));
    const selection = selectCandidate(root, scores, options, logger);
    if (!selection) {
      return createFailureResult(url, 'No content candidates found in document', warnings);
    }
    warnings.push(...selection.warnings);

    const cleaned = withTimingSync(logger, 'clean', () =>
      cleanContent(selection.element, options, { requestUrl: url, baseHref: head.baseHref }, logger)
    );
    warnings.push(...cleaned.warnings);

    const metadata = extractMetadata(
      {
        head,
        winner: selection.element,
        content: cleaned.root,
        text: collectVisibleText(cleaned.root),
        languageHint: options.languageHint,
      },
      logger
    );
    warnings.push(...metadata.warnings);

    const serialized = withTimingSync(logger, 'serialize', () => serializeWithinBudget(cleaned, options, warnings));
    const excerpt = buildExcerpt(extractVisibleText(serialized.content));
    const wordCount = countWords(markdownToPlainText(serialized.markdown));

    return Object.freeze({
      url: url ?? '',
      title: metadata.metadata.title ?? '',
      content: serialized.content,
      markdown: serialized.markdown,
      excerpt,
      wordCount,
      success: true,
      ...(metadata.metadata.author ? { author: metadata.metadata.author } : {}),
      ...(metadata.metadata.datePublished ? { datePublished: metadata.metadata.datePublished } : {}),
      ...(metadata.metadata.language ? { language: metadata.metadata.language } : {}),
      warnings: Object.freeze([...warnings]),
    });
  } catch (error) {
    if (error instanceof TreeInvariantError) throw error;
    logger.error({ event: 'pipeline_failed', error: describeError(error) }, 'Extraction pipeline failed');
    return createFailureResult(url, `Extraction failed: ${describeError(error)}`, warnings);
  }
}

function serialize(cleaned: CleanedContent, options: ExtractionOptions): Serialized {
  const content = serializeHtml(cleaned.$, cleaned.root);
  const markdownSource = options.safeMarkdown ? content : cleaned.$.html(cleaned.root);
  return { content, markdown: markdownConverter.convertToMarkdown(markdownSource) };
}

/**
 * Serializes the cleaned tree and, when the result exceeds maxOutputChars,
 * trims trailing text from the tree and serializes again. A budget of 0
 * means unlimited.
 */
function serializeWithinBudget(cleaned: CleanedContent, options: ExtractionOptions, warnings: string[]): Serialized {
  const budget = options.maxOutputChars;
  let serialized = serialize(cleaned, options);
  if (budget === 0 || outputSize(serialized) <= budget) return serialized;

  const originalSize = outputSize(serialized);
  let textBudget = countTextCharacters(cleaned.root);

  for (let pass = 0; pass < MAX_BUDGET_PASSES && outputSize(serialized) > budget && textBudget > 0; pass++) {
    textBudget = Math.max(0, textBudget - (outputSize(serialized) - budget));
    trimTreeToTextBudget(cleaned.$, cleaned.root, textBudget);
    serialized = serialize(cleaned, options);
  }

  if (outputSize(serialized) > budget) {
    serialized = { content: '', markdown: '' };
  }
  warnings.push(`Output truncated from ${originalSize} to ${outputSize(serialized)} characters (maxOutputChars ${budget})`);
  return serialized;
}

function outputSize(serialized: Serialized): number {
  return Math.max(serialized.content.length, serialized.markdown.length);
}

function createFailureResult(url: string | undefined, error: string, warnings: readonly string[]): ArticleResult {
  return Object.freeze({
    url: url ?? '',
    title: '',
    content: '',
    markdown: '',
    excerpt: '',
    wordCount: 0,
    success: false,
    error,
    warnings: Object.freeze([...warnings]),
  });
}

/** Fixed snake_case field set shared by the CLI and MCP surfaces. */
export function toArticleJson(result: ArticleResult): ArticleJson {
  return {
    title: result.title,
    content: result.content,
    markdown: result.markdown,
    excerpt: result.excerpt,
    word_count: result.wordCount,
    success: result.success,
    error: result.error ?? null,
    url: result.url,
    author: result.author ?? null,
    date_published: result.datePublished ?? null,
    language: result.language ?? null,
    warnings: [...result.warnings],
  };
}
