import { getEnvironment, validateEnvironment } from '../config/environment';
import { getDefaultResultCache } from '../core/cache/resultCache';
import { getLogger } from '../utils/logger';
import { ConfigurationError } from '../mcp/errors';

export class InitializationService {
  async initialize(): Promise<void> {
    const logger = getLogger();
    try {
      logger.info('Validating environment configuration');
      validateEnvironment();

      const env = getEnvironment();
      const cache = getDefaultResultCache();
      logger.info(
        {
          cacheSize: cache.stats().maxEntries,
          minWordCount: env.PAGE_DISTILL_MIN_WORD_COUNT,
          maxOutputChars: env.PAGE_DISTILL_MAX_OUTPUT_CHARS,
        },
        'Application initialized successfully'
      );
    } catch (error) {
      logger.error({ error }, 'Failed to initialize application');
      throw new ConfigurationError(error instanceof Error ? error.message : String(error));
    }
  }
}
