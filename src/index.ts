export {
  extractArticle,
  extractArticleFromDocument,
  toArticleJson,
} from './core/content/htmlContentExtractor';
export type {
  ExtractArticleRequest,
  DocumentExtractionRequest,
} from './core/content/htmlContentExtractor';
export { createExtractionOptions, ExtractionOptionsSchema } from './core/content/types/extraction';
export type {
  ArticleJson,
  ArticleResult,
  CandidateScore,
  ExtractionOptions,
  ExtractionOptionsInput,
  ScoreTable,
} from './core/content/types/extraction';
export { ResultCache, getDefaultResultCache } from './core/cache/resultCache';
export type { ResultCacheStats } from './core/cache/resultCache';
export { computeFingerprint } from './core/content/hasher';
export { parseHtml } from './core/content/documentParser';
export { TreeInvariantError } from './core/content/errors';
export { SCORING_RULES } from './core/content/scoringRules';
export type { ScoringRule } from './core/content/scoringRules';
export { formatArticle } from './utils/articleFormatter';
export type { OutputFormat } from './utils/articleFormatter';
export { PageDistillServer } from './server';
