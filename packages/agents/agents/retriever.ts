// Retriever agent — runs sub-queries against the document corpus and web
// search, corpus first, and returns a deduplicated candidate snippet set.
// Never touches the knowledge base.

import { randomUUID } from 'node:crypto';
import type { Snippet } from '../types/knowledge.js';
import type { EventBus } from '../types/events.js';
import { createEvent } from '../types/events.js';
import type { SourceAdapter } from '../sources/types.js';
import { SnippetListSchema } from '../sources/snippet.js';
import type { CacheManager } from '../cache/cache-manager.js';
import { cacheKey } from '../cache/cache-manager.js';
import { DisabledError, TimeoutError } from '../llm/errors.js';
import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('Retriever');

export interface RetrieverOptions {
  minCorpusResults: number;
  resultsPerQuery: number;
  maxSnippets: number;
  adapterTimeoutMs: number;
  cache?: CacheManager;
  events?: EventBus;
}

export interface RetrievalContext {
  company: string;
  forceRefresh?: boolean;
}

export interface RetrievalResult {
  snippets: Snippet[];
  corpusCount: number;
  webCount: number;
  /** Adapters that reported themselves unconfigured */
  disabled: string[];
  failures: string[];
}

/** Keep the first snippet per source id, in order, up to `max`. */
export function dedupeSnippets(snippets: readonly Snippet[], max = Infinity): Snippet[] {
  const seen = new Set<string>();
  const out: Snippet[] = [];
  for (const s of snippets) {
    if (seen.has(s.sourceId)) continue;
    seen.add(s.sourceId);
    out.push(s);
    if (out.length >= max) break;
  }
  return out;
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export class RetrieverAgent {
  readonly agentId = randomUUID();

  constructor(
    private readonly corpus: SourceAdapter,
    private readonly web: SourceAdapter,
    private readonly options: RetrieverOptions,
  ) {}

  async retrieve(subQueries: readonly string[], ctx: RetrievalContext): Promise<RetrievalResult> {
    const collected: Snippet[] = [];
    const disabled = new Set<string>();
    const failures: string[] = [];
    let corpusCount = 0;
    let webCount = 0;

    for (const query of subQueries) {
      const corpusHits = await this.settle(this.corpus, query, ctx, disabled, failures);
      collected.push(...corpusHits);
      corpusCount += corpusHits.length;

      // Web search only tops up a thin corpus result
      if (corpusHits.length < this.options.minCorpusResults) {
        const webHits = await this.settle(this.web, query, ctx, disabled, failures);
        collected.push(...webHits);
        webCount += webHits.length;
      }
    }

    const snippets = dedupeSnippets(collected, this.options.maxSnippets);
    log.debug('Retrieval finished', {
      subQueries: subQueries.length, corpusCount, webCount, kept: snippets.length,
    });
    return { snippets, corpusCount, webCount, disabled: [...disabled], failures };
  }

  private search(adapter: SourceAdapter, query: string, ctx: RetrievalContext): Promise<Snippet[]> {
    const max = this.options.resultsPerQuery;
    const run = (): Promise<Snippet[]> => withTimeout(adapter.search(query, max), this.options.adapterTimeoutMs);
    const { cache } = this.options;
    if (!cache) return run();

    const key = cacheKey(ctx.company, `search:${adapter.name}`, { query: query.toLowerCase(), max });
    return cache.getOrLoad(key, SnippetListSchema, run, { forceRefresh: ctx.forceRefresh });
  }

  private async settle(
    adapter: SourceAdapter,
    query: string,
    ctx: RetrievalContext,
    disabled: Set<string>,
    failures: string[],
  ): Promise<Snippet[]> {
    try {
      return await this.search(adapter, query, ctx);
    } catch (err) {
      return this.recordFailure(adapter, err, disabled, failures);
    }
  }

  private recordFailure(adapter: SourceAdapter, err: unknown, disabled: Set<string>, failures: string[]): Snippet[] {
    if (err instanceof DisabledError) {
      if (!disabled.has(adapter.name)) {
        disabled.add(adapter.name);
        log.info('Adapter disabled, treating as zero results', { adapter: adapter.name, reason: err.message });
        this.options.events?.emit(createEvent('AdapterDisabled', 'retriever', { adapter: adapter.name, reason: err.message }));
      }
      return [];
    }

    const message = errorMessage(err);
    failures.push(`${adapter.name}: ${message}`);
    log.warn('Adapter search failed', { adapter: adapter.name, error: message });
    return [];
  }
}
