import { ConnectorError } from "./errors.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleep = (ms: number) => Promise<void>;

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiplier applied per attempt. */
  factor: number;
  /** Fraction of the delay added as random jitter (0 disables it). */
  jitter: number;
}

export interface RetryOptions extends Partial<BackoffPolicy> {
  maxRetries?: number;
  retryOn?: (err: unknown) => boolean;
  /** Raise the computed delay for a specific error, e.g. from Retry-After. */
  minDelayFor?: (err: unknown) => number | null;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
  random?: () => number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  factor: 2,
  jitter: 0.1,
};

/**
 * Delay before retry number `attempt` (0-based):
 * `min(base * factor^attempt, max)` plus up to `jitter` of that, never
 * exceeding the cap.
 */
export function backoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const raw = Math.min(
    policy.baseDelayMs * policy.factor ** attempt,
    policy.maxDelayMs,
  );
  const jittered = raw + raw * policy.jitter * random();
  return Math.round(Math.min(jittered, policy.maxDelayMs));
}

/** Connector errors carry their own verdict; anything else is not retried. */
export function isRetryableError(err: unknown): boolean {
  return err instanceof ConnectorError && err.retryable;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const policy: BackoffPolicy = {
    baseDelayMs: opts.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
    maxDelayMs: opts.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
    factor: opts.factor ?? DEFAULT_BACKOFF.factor,
    jitter: opts.jitter ?? DEFAULT_BACKOFF.jitter,
  };
  const retryOn = opts.retryOn ?? isRetryableError;
  const pause = opts.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      let delay = backoffDelay(attempt, policy, opts.random);
      const floor = opts.minDelayFor?.(err);
      if (floor != null && floor > delay) delay = floor;
      opts.onRetry?.(err, attempt + 1, delay);
      await pause(delay);
    }
  }
  throw lastError;
}
