import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import type { ArticleResult } from '../content/types/extraction';

export interface CacheEntry<T> {
  result: T;
  createdAt: number;
  lastAccessedAt: number;
  hitCount: number;
}

export interface ResultCacheStats {
  hits: number;
  misses: number;
  /** Callers that joined a computation already in flight */
  shared: number;
  evictions: number;
  inFlight: number;
  size: number;
  maxEntries: number;
}

export interface ResultCacheOptions {
  maxEntries: number;
  logger?: pino.Logger;
}

/**
 * Fingerprint-keyed LRU with in-flight sharing. Map insertion order is the
 * recency order: a hit re-inserts the entry, eviction drops the first key.
 * With `maxEntries` 0 nothing is stored but concurrent callers still share
 * one computation. Failed computations are never stored.
 */
export class ResultCache<T = ArticleResult> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();
  private readonly maxEntries: number;
  private readonly logger?: pino.Logger;
  private hits = 0;
  private misses = 0;
  private shared = 0;
  private evictions = 0;
  // Bumped by clear(); computations from an earlier generation are not stored
  private generation = 0;

  constructor(options: ResultCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${options.maxEntries}`);
    }
    this.maxEntries = options.maxEntries;
    this.logger = options.logger;
  }

  getOrCompute(fingerprint: string, compute: () => T | Promise<T>): Promise<T> {
    const entry = this.entries.get(fingerprint);
    if (entry) {
      this.hits += 1;
      entry.hitCount += 1;
      entry.lastAccessedAt = Date.now();
      this.entries.delete(fingerprint);
      this.entries.set(fingerprint, entry);
      return Promise.resolve(entry.result);
    }

    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      this.shared += 1;
      return pending;
    }

    this.misses += 1;
    const generation = this.generation;
    const computation = Promise.resolve()
      .then(compute)
      .then(result => {
        if (generation === this.generation) this.store(fingerprint, result);
        return result;
      })
      .finally(() => {
        this.inFlight.delete(fingerprint);
      });

    this.inFlight.set(fingerprint, computation);
    return computation;
  }

  /** Stored result without touching recency or counters. */
  peek(fingerprint: string): T | undefined {
    return this.entries.get(fingerprint)?.result;
  }

  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  stats(): ResultCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      shared: this.shared,
      evictions: this.evictions,
      inFlight: this.inFlight.size,
      size: this.entries.size,
      maxEntries: this.maxEntries,
    };
  }

  /**
   * Drops stored entries and counters. Computations in flight still settle
   * for their waiters but their results are not stored.
   */
  clear(): void {
    this.generation += 1;
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.shared = 0;
    this.evictions = 0;
  }

  private store(fingerprint: string, result: T): void {
    if (this.maxEntries === 0) return;

    const now = Date.now();
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, { result, createdAt: now, lastAccessedAt: now, hitCount: 0 });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions += 1;
      this.logger?.debug({ event: 'cache_evicted', fingerprint: oldest.value }, 'Evicted cached result');
    }
  }
}

let defaultCache: ResultCache | undefined;

/** Process-wide cache sized by PAGE_DISTILL_CACHE_SIZE. */
export function getDefaultResultCache(): ResultCache {
  if (!defaultCache) {
    defaultCache = new ResultCache({ maxEntries: getEnvironment().PAGE_DISTILL_CACHE_SIZE });
  }
  return defaultCache;
}

export function resetDefaultResultCache(): void {
  defaultCache = undefined;
}
