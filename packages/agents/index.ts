// Account plan agents — Planner, Retriever, Synthesizer and Critic agents
// coordinated by a per-company orchestrator session

export { Orchestrator, BlockedInputError, KnowledgeBase, Timebox } from './orchestrator/index.js';
export type { OrchestratorConfig, AskResult, DeepResearchResult, RequestOptions } from './orchestrator/index.js';
export { createRuntime, createOrchestrator, SessionRegistry } from './orchestrator/index.js';
export type { Runtime, RuntimeOverrides } from './orchestrator/index.js';

export { PlannerAgent } from './agents/planner.js';
export { RetrieverAgent } from './agents/retriever.js';
export { SynthesizerAgent, StructuredReportSchema, EvidenceCardSchema } from './agents/synthesizer.js';
export type { StructuredReport } from './agents/synthesizer.js';
export { CriticAgent } from './agents/critic.js';

export { LlmGateway, UnavailableError, DisabledError, TimeoutError } from './llm/index.js';
export type { LlmBackend, CompletionRequest, StructuredResult, AttemptRecord } from './llm/index.js';
export { AnthropicBackend } from './bridge/anthropic-backend.js';

export { CacheManager, MemoryCacheStore, FileCacheStore, cacheKey } from './cache/index.js';
export type { CacheLookup, CacheStore, CacheEntry } from './cache/index.js';

export { DocumentCorpus, SerpApiSearch, GoogleCseSearch, createWebSearchAdapter, createSnippet } from './sources/index.js';
export type { SourceAdapter, DocumentCorpusAdapter, WebSearchAdapter } from './sources/index.js';

export { loadSettings, ConfigError } from './config/settings.js';
export type { Settings } from './config/settings.js';

export { renderReportMarkdown } from './utils/report-markdown.js';
export { createLogger, setLogLevel } from './utils/logger.js';

export * from './types/index.js';
