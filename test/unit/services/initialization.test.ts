import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { InitializationService } from '../../../src/services/initialization';
import { clearEnvironmentCache } from '../../../src/config/environment';
import { getDefaultResultCache, resetDefaultResultCache } from '../../../src/core/cache/resultCache';
import { ConfigurationError } from '../../../src/mcp/errors';

describe('Initialization Service', () => {
  let initService: InitializationService;
  const originalEnv = process.env;

  beforeEach(() => {
    initService = new InitializationService();
    process.env = { ...originalEnv };
    delete process.env.PAGE_DISTILL_CACHE_SIZE;
    clearEnvironmentCache();
    resetDefaultResultCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearEnvironmentCache();
    resetDefaultResultCache();
  });

  test('should initialize successfully with the default environment', async () => {
    await expect(initService.initialize()).resolves.toBeUndefined();
  });

  test('should size the shared result cache from the environment', async () => {
    process.env.PAGE_DISTILL_CACHE_SIZE = '12';
    await initService.initialize();
    expect(getDefaultResultCache().stats().maxEntries).toBe(12);
  });

  test('should fail initialization with an invalid cache size', async () => {
    process.env.PAGE_DISTILL_CACHE_SIZE = '-1';
    const failure = initService.initialize();
    await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
    await expect(failure).rejects.toThrow('Configuration error: Environment validation failed');
  });
});
