// Gateway and adapter errors

export interface AttemptRecord {
  attempt: number;
  model: string;
  temperature: number;
  error: string;
  timedOut: boolean;
}

/** Every configured model/attempt failed; the request cannot be served. */
export class UnavailableError extends Error {
  constructor(
    message: string,
    public readonly attempts: readonly AttemptRecord[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'UnavailableError';
  }
}

/** A source adapter is not configured; callers treat it as zero results. */
export class DisabledError extends Error {
  constructor(public readonly adapter: string, reason: string) {
    super(`${adapter} disabled: ${reason}`);
    this.name = 'DisabledError';
  }
}

/** A single backend call exceeded its wall-clock budget. */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
