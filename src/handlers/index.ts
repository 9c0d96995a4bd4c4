export { handleExtractArticle } from './extractArticle';
export type { ExtractArticleHandlerOptions } from './extractArticle';
