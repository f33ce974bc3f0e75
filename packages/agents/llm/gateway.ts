// LLM Gateway — free-form and schema-constrained generation over a pluggable
// backend. Owns the retry policy: model fallback plus temperature backoff,
// every call bounded by a wall-clock timeout.

import type { z } from 'zod';
import type { EventBus } from '../types/events.js';
import { createEvent } from '../types/events.js';
import { cleanText } from '../utils/text.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { TimeoutError, UnavailableError } from './errors.js';
import type { AttemptRecord } from './errors.js';
import { extractJsonObject } from './json.js';

const log = createLogger('LlmGateway');

// ── Backend seam ─────────────────────────────────────────────────────

export interface CompletionRequest {
  model: string;
  prompt: string;
  system?: string;
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

export interface LlmBackend {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

// ── Results ──────────────────────────────────────────────────────────

export type StructuredResult<T> =
  | { kind: 'success'; value: T; raw: string }
  | { kind: 'validation_failure'; reason: string; raw: string };

export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface GenerateOptions {
  temperature?: number;
  system?: string;
  maxTokens?: number;
}

export interface GatewayOptions {
  /** Priority-ordered; attempt i uses models[i % models.length] */
  models: readonly string[];
  maxAttempts: number;
  temperature: number;
  structuredTemperature: number;
  temperatureStep: number;
  timeoutMs: number;
  maxTokens: number;
  events?: EventBus;
}

const JSON_SYSTEM = 'You are a precise analyst. Respond with a single JSON object only. '
  + 'Do not add commentary or code fences.';

export class LlmGateway {
  constructor(
    private readonly backend: LlmBackend,
    private readonly options: GatewayOptions,
  ) {
    if (options.models.length === 0) {
      throw new Error('LlmGateway requires at least one model');
    }
  }

  get models(): readonly string[] {
    return this.options.models;
  }

  /** Free-form completion. Throws UnavailableError once every attempt fails. */
  async generateText(prompt: string, opts: GenerateOptions = {}): Promise<string> {
    const raw = await this.complete(prompt, opts.temperature ?? this.options.temperature, opts);
    return cleanText(raw);
  }

  /**
   * Schema-constrained completion. Output that does not parse or validate is a
   * `validation_failure` result and is not retried here.
   */
  async generateStructured<T>(
    prompt: string,
    schema: OutputSchema<T>,
    opts: GenerateOptions = {},
  ): Promise<StructuredResult<T>> {
    const raw = await this.complete(prompt, opts.temperature ?? this.options.structuredTemperature, {
      ...opts,
      system: opts.system ?? JSON_SYSTEM,
    });

    const extracted = extractJsonObject(raw);
    if (!extracted.ok) {
      return { kind: 'validation_failure', reason: extracted.reason, raw };
    }

    const parsed = schema.safeParse(extracted.value);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .slice(0, 5)
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      return { kind: 'validation_failure', reason, raw };
    }
    return { kind: 'success', value: parsed.data, raw };
  }

  temperatureFor(attempt: number, base: number): number {
    const t = base - attempt * this.options.temperatureStep;
    return Math.max(0, Math.round(t * 1000) / 1000);
  }

  modelFor(attempt: number): string {
    const { models } = this.options;
    return models[attempt % models.length];
  }

  // ── Retry loop ─────────────────────────────────────────────────────

  private async complete(prompt: string, baseTemperature: number, opts: GenerateOptions): Promise<string> {
    const attempts: AttemptRecord[] = [];

    for (let attempt = 0; attempt < this.options.maxAttempts; attempt++) {
      const model = this.modelFor(attempt);
      const temperature = this.temperatureFor(attempt, baseTemperature);

      if (attempt > 0) {
        const previous = attempts[attempts.length - 1];
        this.options.events?.emit(createEvent('ModelFallback', 'llm', {
          attempt,
          fromModel: previous.model,
          toModel: model,
          temperature,
          error: previous.error,
        }));
      }

      try {
        const text = await this.callWithTimeout({
          model,
          prompt,
          system: opts.system,
          temperature,
          maxTokens: opts.maxTokens ?? this.options.maxTokens,
        });
        if (text.trim() === '') throw new Error('Empty response');
        if (attempt > 0) log.info('Recovered after fallback', { model, attempt });
        return text;
      } catch (err) {
        const record: AttemptRecord = {
          attempt,
          model,
          temperature,
          error: errorMessage(err),
          timedOut: err instanceof TimeoutError,
        };
        attempts.push(record);
        log.warn('LLM attempt failed', { ...record });
      }
    }

    throw new UnavailableError(
      `LLM unavailable after ${attempts.length} attempt(s) across ${this.options.models.length} model(s)`,
      attempts,
    );
  }

  private async callWithTimeout(request: Omit<CompletionRequest, 'signal'>): Promise<string> {
    const controller = new AbortController();
    const { timeoutMs } = this.options;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.backend.complete({ ...request, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
