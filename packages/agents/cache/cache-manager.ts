// Cache Manager — TTL-bounded key/value access in front of expensive lookups.
// An entry older than its TTL is never returned as fresh; callers that get
// `miss` or `expired` re-fetch and put.

import { createHash } from 'node:crypto';
import type { z } from 'zod';
import type { CacheEntry, CacheStore } from './cache-store.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('Cache');

const DAY_MS = 86_400_000;

export type CacheLookup<T> =
  | { status: 'hit'; value: T; createdAt: Date }
  | { status: 'miss' }
  | { status: 'expired'; createdAt: Date };

export interface CacheManagerOptions {
  ttlDays: number;
  now?: () => number;
}

/** Schema a cached value is re-validated against on read (JSON loses Dates). */
export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface LoadOptions {
  forceRefresh?: boolean;
  ttlDays?: number;
}

export class CacheManager {
  private readonly ttlDays: number;
  private readonly now: () => number;

  constructor(private readonly store: CacheStore, options: CacheManagerOptions) {
    this.ttlDays = options.ttlDays;
    this.now = options.now ?? Date.now;
  }

  async get<T>(key: string, schema: CacheSchema<T>): Promise<CacheLookup<T>> {
    const entry = await this.store.read(key);
    if (!entry) return { status: 'miss' };
    if (this.isExpired(entry)) {
      return { status: 'expired', createdAt: new Date(entry.createdAt) };
    }
    const parsed = schema.safeParse(entry.value);
    if (!parsed.success) {
      log.warn('Cached value failed validation, treating as miss', { key });
      return { status: 'miss' };
    }
    return { status: 'hit', value: parsed.data, createdAt: new Date(entry.createdAt) };
  }

  async put<T>(key: string, value: T, ttlDays = this.ttlDays): Promise<void> {
    await this.store.write({ key, value, createdAt: this.now(), ttlDays });
  }

  async invalidate(key: string): Promise<void> {
    await this.store.delete(key);
  }

  /**
   * Return the cached value when fresh, otherwise run `loader` and store its
   * result. A failed write is logged; the loaded value is still returned.
   */
  async getOrLoad<T>(
    key: string,
    schema: CacheSchema<T>,
    loader: () => Promise<T>,
    options: LoadOptions = {},
  ): Promise<T> {
    if (!options.forceRefresh) {
      const lookup = await this.get(key, schema);
      if (lookup.status === 'hit') return lookup.value;
    }

    const value = await loader();
    try {
      await this.put(key, value, options.ttlDays);
    } catch (err) {
      log.warn('Cache write failed', { key, error: errorMessage(err) });
    }
    return value;
  }

  /** Remove every expired entry; returns the number removed. */
  async prune(): Promise<number> {
    let removed = 0;
    for (const key of await this.store.keys()) {
      const entry = await this.store.read(key);
      if (entry && this.isExpired(entry)) {
        await this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt > entry.ttlDays * DAY_MS;
  }
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function companySlug(company: string): string {
  return company.trim().toLowerCase().replace(/\s+/g, '-').replace(/[^a-z0-9_-]+/g, '');
}

/** `company:kind:paramsHash` — parameter order does not affect the key. */
export function cacheKey(company: string, kind: string, params: Record<string, unknown> = {}): string {
  const hash = createHash('sha256').update(stableStringify(params)).digest('hex').slice(0, 16);
  return `${companySlug(company)}:${kind}:${hash}`;
}
