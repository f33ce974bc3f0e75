// Web search adapters — SerpAPI (Google engine) and Google Custom Search,
// both over fetch with a request timeout

import { z } from 'zod';
import type { Snippet } from '../types/knowledge.js';
import type { SearchSettings } from '../config/settings.js';
import type { WebSearchAdapter } from './types.js';
import { createSnippet } from './snippet.js';
import { DisabledError } from '../llm/errors.js';

const SERPAPI_ENDPOINT = 'https://serpapi.com/search.json';
const GOOGLE_CSE_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';

// Both providers cap a page at 10 results
const MAX_PAGE = 10;

const SerpApiResponseSchema = z.object({
  organic_results: z.array(z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
  })).optional(),
  error: z.string().optional(),
});

const GoogleCseResponseSchema = z.object({
  items: z.array(z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
  })).optional(),
});

interface RawResult {
  title?: string;
  link?: string;
  snippet?: string;
}

export interface WebSearchOptions {
  timeoutMs?: number;
}

async function getJson(url: URL, provider: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url.toString(), {
      headers: { 'Accept': 'application/json' },
      signal: controller.signal,
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      if (res.status === 401 || res.status === 403) throw new Error(`${provider}: Invalid API key or quota exhausted`);
      if (res.status === 429) throw new Error(`${provider}: Rate limited by server`);
      throw new Error(`${provider}: HTTP ${res.status} - ${body.slice(0, 200)}`);
    }

    return await res.json();
  } finally {
    clearTimeout(timeout);
  }
}

function toSnippets(items: RawResult[], maxResults: number): Snippet[] {
  const usable = items.filter((item): item is RawResult & { link: string } => Boolean(item.link?.trim()));
  const n = Math.min(usable.length, maxResults);
  return usable.slice(0, n).map((item, rank) => createSnippet({
    sourceId: item.link,
    sourceKind: 'web',
    title: item.title,
    text: item.snippet ?? item.title ?? '',
    score: 1 - rank / Math.max(n, 1),
  }));
}

export class SerpApiSearch implements WebSearchAdapter {
  readonly name = 'serpapi';
  private readonly timeoutMs: number;

  constructor(private readonly apiKey: string | undefined, options: WebSearchOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  async search(query: string, maxResults: number): Promise<Snippet[]> {
    if (!this.apiKey) throw new DisabledError(this.name, 'SERPAPI_API_KEY is not set');

    const url = new URL(SERPAPI_ENDPOINT);
    url.searchParams.set('engine', 'google');
    url.searchParams.set('q', query);
    url.searchParams.set('num', String(Math.min(MAX_PAGE, maxResults)));
    url.searchParams.set('api_key', this.apiKey);

    const data = SerpApiResponseSchema.parse(await getJson(url, 'SerpAPI', this.timeoutMs));
    if (data.error) throw new Error(`SerpAPI: ${data.error}`);
    return toSnippets(data.organic_results ?? [], maxResults);
  }
}

export class GoogleCseSearch implements WebSearchAdapter {
  readonly name = 'google_cse';
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly cx: string | undefined,
    options: WebSearchOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  async search(query: string, maxResults: number): Promise<Snippet[]> {
    if (!this.apiKey || !this.cx) {
      throw new DisabledError(this.name, 'GOOGLE_CSE_API_KEY and GOOGLE_CSE_CX are required');
    }

    const url = new URL(GOOGLE_CSE_ENDPOINT);
    url.searchParams.set('q', query);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('cx', this.cx);
    url.searchParams.set('num', String(Math.min(MAX_PAGE, maxResults)));

    const data = GoogleCseResponseSchema.parse(await getJson(url, 'Google CSE', this.timeoutMs));
    return toSnippets(data.items ?? [], maxResults);
  }
}

export function createWebSearchAdapter(settings: SearchSettings, options: WebSearchOptions = {}): WebSearchAdapter {
  return settings.provider === 'google_cse'
    ? new GoogleCseSearch(settings.googleApiKey, settings.googleCx, options)
    : new SerpApiSearch(settings.serpApiKey, options);
}
