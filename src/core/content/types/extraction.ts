import { z } from 'zod';
import type { Element } from 'domhandler';
import { DEFAULT_EXTRACTION_OPTIONS } from '../../../config/constants';

export const ExtractionOptionsSchema = z
  .object({
    minWordCount: z.number().int().min(0).default(DEFAULT_EXTRACTION_OPTIONS.minWordCount),
    includeImages: z.boolean().default(DEFAULT_EXTRACTION_OPTIONS.includeImages),
    includeCode: z.boolean().default(DEFAULT_EXTRACTION_OPTIONS.includeCode),
    maxOutputChars: z.number().int().min(0).default(DEFAULT_EXTRACTION_OPTIONS.maxOutputChars),
    languageHint: z.string().trim().min(1).optional(),
    safeMarkdown: z.boolean().default(DEFAULT_EXTRACTION_OPTIONS.safeMarkdown),
    stripNestedNoise: z.boolean().default(DEFAULT_EXTRACTION_OPTIONS.stripNestedNoise),
    resolveUrls: z.boolean().default(DEFAULT_EXTRACTION_OPTIONS.resolveUrls),
    normalizeHeadings: z.boolean().default(DEFAULT_EXTRACTION_OPTIONS.normalizeHeadings),
  })
  .strict();

export type ExtractionOptions = Readonly<z.output<typeof ExtractionOptionsSchema>>;
export type ExtractionOptionsInput = z.input<typeof ExtractionOptionsSchema>;

/**
 * Validates caller input and returns a frozen options value. Constructed once
 * per request and never mutated afterwards.
 */
export function createExtractionOptions(input: ExtractionOptionsInput = {}): ExtractionOptions {
  return Object.freeze(ExtractionOptionsSchema.parse(input));
}

export interface ArticleResult {
  readonly url: string;
  readonly title: string;
  /** Sanitized HTML of the selected content region */
  readonly content: string;
  readonly markdown: string;
  readonly excerpt: string;
  readonly wordCount: number;
  readonly success: boolean;
  readonly error?: string;
  readonly author?: string;
  readonly datePublished?: string;
  readonly language?: string;
  readonly warnings: readonly string[];
}

/** Wire shape shared by the CLI and MCP surfaces. */
export interface ArticleJson {
  title: string;
  content: string;
  markdown: string;
  excerpt: string;
  word_count: number;
  success: boolean;
  error: string | null;
  url: string;
  author: string | null;
  date_published: string | null;
  language: string | null;
  warnings: string[];
}

export interface CandidateScore {
  /** base + propagated */
  total: number;
  base: number;
  textDensity: number;
  linkDensity: number;
  tagBonus: number;
  classWeight: number;
  paragraphBonus: number;
  commaBonus: number;
  propagated: number;
  textLength: number;
  wordCount: number;
  /** Pre-order position in the document, used for the final tie-break */
  order: number;
}

export type ScoreTable = ReadonlyMap<Element, Readonly<CandidateScore>>;

export interface ExtractedMetadata {
  title?: string;
  author?: string;
  datePublished?: string;
  language?: string;
}

export interface ExtractionRequest {
  /** Page URL; used as the base for resolving relative links */
  url?: string;
  options?: ExtractionOptionsInput;
  correlationId?: string;
}
