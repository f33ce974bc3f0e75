// Shared test doubles: scripted LLM backend, static source adapters, snapshots

import type { CompletionRequest, GatewayOptions, LlmBackend } from '../llm/gateway.js';
import { LlmGateway } from '../llm/gateway.js';
import type { SourceAdapter } from '../sources/types.js';
import { createSnippet } from '../sources/snippet.js';
import type { FinancialFact, KnowledgeSnapshot, Snippet, SourceKind } from '../types/knowledge.js';

export const NOW = Date.parse('2025-06-01T00:00:00.000Z');
export const DAY = 86_400_000;

export type Responder = (request: CompletionRequest) => string | Promise<string>;

export class FakeBackend implements LlmBackend {
  readonly name = 'fake';
  readonly calls: CompletionRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.calls.push(request);
    return this.respond(request);
  }
}

export const GATEWAY_OPTIONS: GatewayOptions = {
  models: ['model-a'],
  maxAttempts: 1,
  temperature: 0.1,
  structuredTemperature: 0.2,
  temperatureStep: 0.05,
  timeoutMs: 1_000,
  maxTokens: 512,
};

export function fakeGateway(respond: Responder, options: Partial<GatewayOptions> = {}) {
  const backend = new FakeBackend(respond);
  return { backend, gateway: new LlmGateway(backend, { ...GATEWAY_OPTIONS, ...options }) };
}

/** Prompts the planner sends start with this line. */
export function isPlannerPrompt(request: CompletionRequest): boolean {
  return request.prompt.startsWith('Derive up to');
}

export function isStructuredPrompt(request: CompletionRequest): boolean {
  return request.prompt.startsWith('Create a structured account plan');
}

export class StaticAdapter implements SourceAdapter {
  readonly queries: string[] = [];

  constructor(
    readonly name: string,
    private readonly results: (query: string) => Snippet[] | Promise<Snippet[]>,
  ) {}

  async search(query: string, maxResults: number): Promise<Snippet[]> {
    this.queries.push(query);
    return (await this.results(query)).slice(0, maxResults);
  }
}

export function snippet(
  sourceId: string,
  text: string,
  sourceKind: SourceKind = 'corpus',
  retrievedAt = new Date(NOW - DAY),
): Snippet {
  return createSnippet({ sourceId, sourceKind, text, score: 0.8, retrievedAt });
}

export function fact(year: number, value: number, sourceKind: SourceKind = 'corpus', sourceId = `doc-${year}`): FinancialFact {
  return { year, value, currency: 'USD', unit: 'billion', sourceId, sourceKind, raw: `Revenue ${value} in ${year}` };
}

export function knowledge(partial: Partial<KnowledgeSnapshot> = {}): KnowledgeSnapshot {
  return {
    company: 'Nokia',
    snippets: [],
    overview: '',
    facts: [],
    updatedAt: null,
    version: 0,
    ...partial,
  };
}
