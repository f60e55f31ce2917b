export interface BackoffOptions {
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

const DEFAULT_OPTIONS: Required<BackoffOptions> = {
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

/**
 * Bounded exponential backoff: 1s, 2s, 4s ... capped at `maxDelayMs`.
 * `reset()` after a success so the next outage starts from the initial delay again.
 */
export class ExponentialBackoff {
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly backoffMultiplier: number;
  private delayMs: number;
  private attempt = 0;

  constructor(options: BackoffOptions = {}) {
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
    this.backoffMultiplier = options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier;
    this.delayMs = this.initialDelayMs;
  }

  get attempts(): number {
    return this.attempt;
  }

  next(): number {
    const currentDelay = Math.min(this.delayMs, this.maxDelayMs);
    this.attempt++;
    this.delayMs = Math.min(this.delayMs * this.backoffMultiplier, this.maxDelayMs);
    return currentDelay;
  }

  reset() {
    this.attempt = 0;
    this.delayMs = this.initialDelayMs;
  }
}

/**
 * Socket-level failures that are expected while a broker restarts or the network drops.
 * These are logged as warnings and de-duplicated rather than reported as errors.
 */
export const isNetworkError = (error: unknown): boolean => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorCode = error instanceof Error && 'code' in error ? String(error.code) : '';
  const lower = errorMessage.toLowerCase();

  return (
    errorCode === 'ECONNRESET' ||
    errorCode === 'ECONNREFUSED' ||
    errorCode === 'ETIMEDOUT' ||
    errorCode === 'EHOSTUNREACH' ||
    errorCode === 'ENETUNREACH' ||
    errorCode === 'ENOTFOUND' ||
    errorCode === 'EAI_AGAIN' ||
    errorCode === 'EPIPE' ||
    lower.includes('econnrefused') ||
    lower.includes('socket') ||
    lower.includes('timeout') ||
    lower.includes('network unreachable') ||
    lower.includes('host unreachable')
  );
};
