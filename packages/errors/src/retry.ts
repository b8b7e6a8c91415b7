import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Attempts after the first one. Default: 3 */
  maxRetries?: number;
  /** Delay before the first retry, doubled for each later one. Default: 1000 */
  baseDelayMs?: number;
  /** Upper bound on a single delay. Default: 10000 */
  maxDelayMs?: number;
  /** Invoked before each backoff sleep. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULTS = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/**
 * AppErrors carry their own verdict: 5xx may succeed on a second try, 4xx
 * will not. Anything else (sockets, DNS, client internals) is assumed transient.
 */
function shouldRetry(error: unknown): boolean {
  if (AppError.isAppError(error)) {
    return error.statusCode >= 500;
  }
  return true;
}

/** Full exponential step, capped, then scaled into [50%, 100%). */
function backoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying retryable failures with jittered exponential backoff.
 * Meant for collaborator adapters; the pipelines themselves never retry.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULTS.maxRetries;
  const baseDelayMs = options?.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULTS.maxDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoff(attempt, baseDelayMs, maxDelayMs);
      options?.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}
