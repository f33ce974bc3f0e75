export { LlmGateway } from './gateway.js';
export type {
  CompletionRequest,
  GatewayOptions,
  GenerateOptions,
  LlmBackend,
  OutputSchema,
  StructuredResult,
} from './gateway.js';
export { UnavailableError, DisabledError, TimeoutError } from './errors.js';
export type { AttemptRecord } from './errors.js';
export { extractJsonObject } from './json.js';
