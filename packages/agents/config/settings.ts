// Runtime settings — read once from the environment, validated, then frozen
// for the lifetime of the process

import { z } from 'zod';

const csv = z
  .string()
  .transform((value) => value.split(',').map((s) => s.trim()).filter(Boolean));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

export const SettingsSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  LLM_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  LLM_FALLBACK_MODELS: csv.default('claude-sonnet-4-5-20250929,claude-3-5-haiku-20241022'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),
  LLM_STRUCTURED_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
  LLM_TEMPERATURE_STEP: z.coerce.number().min(0).max(1).default(0.05),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  CACHE_DIR: z.string().min(1).default('data/cache'),
  CACHE_TTL_DAYS: z.coerce.number().positive().default(7),
  RESEARCH_TIMEBOX_MINUTES: z.coerce.number().positive().default(5),
  CRITIC_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  PLANNER_MAX_SUBQUERIES: z.coerce.number().int().min(1).max(8).default(4),
  RETRIEVER_MIN_CORPUS_RESULTS: z.coerce.number().int().min(0).default(2),
  RETRIEVER_RESULTS_PER_QUERY: z.coerce.number().int().positive().default(6),
  RETRIEVER_MAX_SNIPPETS: z.coerce.number().int().positive().default(20),
  ADAPTER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SEARCH_PROVIDER: z
    .string()
    .default('serpapi')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['serpapi', 'google_cse', 'google'])),
  SERPAPI_API_KEY: optionalString,
  GOOGLE_CSE_API_KEY: optionalString,
  GOOGLE_CSE_CX: optionalString,
  REPORT_CURRENCY: z.enum(['USD', 'EUR']).default('USD'),
  EURUSD_RATE: z.coerce.number().positive().default(1.08),
  CORPUS_DIR: optionalString,
});

export type RawSettings = z.infer<typeof SettingsSchema>;

export interface LlmSettings {
  apiKey?: string;
  models: string[];
  temperature: number;
  structuredTemperature: number;
  temperatureStep: number;
  maxAttempts: number;
  timeoutMs: number;
  maxTokens: number;
}

export interface RetrievalSettings {
  minCorpusResults: number;
  resultsPerQuery: number;
  maxSnippets: number;
  adapterTimeoutMs: number;
}

export interface SearchSettings {
  provider: 'serpapi' | 'google_cse';
  serpApiKey?: string;
  googleApiKey?: string;
  googleCx?: string;
}

export interface Settings {
  llm: LlmSettings;
  cache: { dir: string; ttlDays: number };
  research: { timeboxMinutes: number; criticMaxRetries: number; maxSubQueries: number };
  retrieval: RetrievalSettings;
  search: SearchSettings;
  currency: { report: 'USD' | 'EUR'; eurUsdRate: number };
  corpusDir?: string;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Parse settings from an environment map. Unknown variables are ignored;
 * invalid values raise a ConfigError listing every offending variable.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Readonly<Settings> {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const raw = parsed.data;

  const models = [raw.LLM_MODEL, ...raw.LLM_FALLBACK_MODELS.filter((m) => m !== raw.LLM_MODEL)];

  return deepFreeze<Settings>({
    llm: {
      apiKey: raw.ANTHROPIC_API_KEY,
      models,
      temperature: raw.LLM_TEMPERATURE,
      structuredTemperature: raw.LLM_STRUCTURED_TEMPERATURE,
      temperatureStep: raw.LLM_TEMPERATURE_STEP,
      maxAttempts: raw.LLM_MAX_ATTEMPTS,
      timeoutMs: raw.LLM_TIMEOUT_MS,
      maxTokens: raw.LLM_MAX_TOKENS,
    },
    cache: { dir: raw.CACHE_DIR, ttlDays: raw.CACHE_TTL_DAYS },
    research: {
      timeboxMinutes: raw.RESEARCH_TIMEBOX_MINUTES,
      criticMaxRetries: raw.CRITIC_MAX_RETRIES,
      maxSubQueries: raw.PLANNER_MAX_SUBQUERIES,
    },
    retrieval: {
      minCorpusResults: raw.RETRIEVER_MIN_CORPUS_RESULTS,
      resultsPerQuery: raw.RETRIEVER_RESULTS_PER_QUERY,
      maxSnippets: raw.RETRIEVER_MAX_SNIPPETS,
      adapterTimeoutMs: raw.ADAPTER_TIMEOUT_MS,
    },
    search: {
      provider: raw.SEARCH_PROVIDER === 'serpapi' ? 'serpapi' : 'google_cse',
      serpApiKey: raw.SERPAPI_API_KEY,
      googleApiKey: raw.GOOGLE_CSE_API_KEY,
      googleCx: raw.GOOGLE_CSE_CX,
    },
    currency: { report: raw.REPORT_CURRENCY, eurUsdRate: raw.EURUSD_RATE },
    corpusDir: raw.CORPUS_DIR,
  });
}
