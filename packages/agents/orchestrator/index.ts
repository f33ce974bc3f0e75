export { Orchestrator, BlockedInputError } from './orchestrator.js';
export type { OrchestratorConfig, AskResult, DeepResearchResult, RequestOptions } from './orchestrator.js';
export { KnowledgeBase, preferFact } from './knowledge-base.js';
export { Timebox } from './timebox.js';
export type { Clock } from './timebox.js';
export {
  assembleReport,
  revenueSeries,
  sectionsFromStructured,
  topProductsFromMarkdown,
  topProductsFromStructured,
} from './report-assembler.js';
export { createRuntime, createOrchestrator, SessionRegistry } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
