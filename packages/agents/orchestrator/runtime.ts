// Runtime wiring — builds the shared collaborators (LLM gateway, source
// adapters, cache, event bus) from settings and hands out one orchestrator
// session per company

import type { Settings } from '../config/settings.js';
import { ConfigError } from '../config/settings.js';
import type { DomainEventType, EventBus } from '../types/events.js';
import { ALL_EVENT_TYPES, SimpleEventBus } from '../types/events.js';
import { LlmGateway } from '../llm/gateway.js';
import type { LlmBackend } from '../llm/gateway.js';
import { AnthropicBackend } from '../bridge/anthropic-backend.js';
import type { SourceAdapter } from '../sources/types.js';
import { DocumentCorpus } from '../sources/document-corpus.js';
import { createWebSearchAdapter } from '../sources/web-search.js';
import { CacheManager, companySlug } from '../cache/cache-manager.js';
import { FileCacheStore } from '../cache/cache-store.js';
import type { Clock } from './timebox.js';
import { Orchestrator } from './orchestrator.js';

export interface Runtime {
  settings: Readonly<Settings>;
  gateway: LlmGateway;
  corpus: SourceAdapter;
  web: SourceAdapter;
  cache: CacheManager;
  events: EventBus;
  clock?: Clock;
}

export interface RuntimeOverrides {
  backend?: LlmBackend;
  corpus?: SourceAdapter;
  web?: SourceAdapter;
  cache?: CacheManager;
  clock?: Clock;
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
}

export async function createRuntime(settings: Readonly<Settings>, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const events = new SimpleEventBus();
  if (overrides.onEvent) {
    const handler = overrides.onEvent;
    for (const type of ALL_EVENT_TYPES) {
      events.on(type, (e) => handler({ type: e.type, payload: e.payload }));
    }
  }

  let backend = overrides.backend;
  if (!backend) {
    if (!settings.llm.apiKey) {
      throw new ConfigError('ANTHROPIC_API_KEY is not set', ['ANTHROPIC_API_KEY: required']);
    }
    backend = new AnthropicBackend({ apiKey: settings.llm.apiKey });
  }

  const gateway = new LlmGateway(backend, { ...settings.llm, events });

  const corpus = overrides.corpus
    ?? (settings.corpusDir ? await DocumentCorpus.fromDirectory(settings.corpusDir) : new DocumentCorpus());
  const web = overrides.web
    ?? createWebSearchAdapter(settings.search, { timeoutMs: settings.retrieval.adapterTimeoutMs });
  const cache = overrides.cache
    ?? new CacheManager(new FileCacheStore(settings.cache.dir), { ttlDays: settings.cache.ttlDays });

  return { settings, gateway, corpus, web, cache, events, clock: overrides.clock };
}

export function createOrchestrator(runtime: Runtime, company: string): Orchestrator {
  return new Orchestrator({
    company,
    settings: runtime.settings,
    gateway: runtime.gateway,
    corpus: runtime.corpus,
    web: runtime.web,
    cache: runtime.cache,
    events: runtime.events,
    clock: runtime.clock,
  });
}

/** One orchestrator (and knowledge base) per company. */
export class SessionRegistry {
  private sessions = new Map<string, Orchestrator>();

  constructor(private readonly runtime: Runtime) {}

  get(company: string): Orchestrator {
    const name = company.trim();
    const key = companySlug(name);
    if (key === '') throw new Error('Company name is required');

    let session = this.sessions.get(key);
    if (!session) {
      session = createOrchestrator(this.runtime, name);
      this.sessions.set(key, session);
    }
    return session;
  }

  get size(): number {
    return this.sessions.size;
  }

  companies(): string[] {
    return [...this.sessions.values()].map((s) => s.company);
  }
}
