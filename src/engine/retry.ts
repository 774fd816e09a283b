/**
 * Retry policy for network-facing calls.
 *
 * Network-class failures are retried with capped, jittered exponential
 * backoff. Everything else propagates on the first attempt.
 */

import { ErrorKind, PipelineError, TypedError, isErrorKind, toTypedError } from '../domain/errors';

export interface BackoffPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseMs: number;
  capMs: number;
  /** Fraction of the delay applied as +/- jitter (default 0.2). */
  jitterRatio?: number;
}

/** Kinds retried by default. */
export const NETWORK_ERROR_KINDS: readonly ErrorKind[] = [
  'RateLimited',
  'ProviderTimeout',
  'TransientNetworkError',
];

export function isNetworkClassError(err: unknown): boolean {
  return isErrorKind(err, ...NETWORK_ERROR_KINDS);
}

/**
 * Delay before retry number `attempt` (0-based):
 * min(cap, base * 2^attempt), then +/- jitter.
 */
export function computeBackoff(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(policy.capMs, policy.baseMs * Math.pow(2, attempt));
  const spread = exponential * (policy.jitterRatio ?? 0.2);
  const jittered = exponential - spread + random() * 2 * spread;
  return Math.max(0, Math.round(jittered));
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: TypedError;
}

export interface RetryOptions {
  policy: BackoffPolicy;
  /** Defaults to isNetworkClassError. */
  isRetryable?: (err: unknown) => boolean;
  /** Called before each backoff sleep. */
  onRetry?: (info: RetryAttemptInfo) => void;
  /**
   * Maps the last error to the error raised once retries are exhausted.
   * By default the last error is rethrown unchanged.
   */
  onExhausted?: (last: TypedError, attempts: number) => TypedError;
  /** Stops retrying once true; the last error propagates. */
  shouldAbort?: () => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is raised, or
 * `policy.maxRetries` retries have been spent. `fn` receives the 1-based
 * attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const isRetryable = options.isRetryable ?? isNetworkClassError;
  const pause = options.sleep ?? sleep;
  const maxAttempts = Math.max(0, options.policy.maxRetries) + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err) || options.shouldAbort?.()) {
        throw err;
      }
      const typed = toTypedError(err);
      if (attempt >= maxAttempts) {
        if (options.onExhausted) {
          throw new PipelineError(options.onExhausted(typed, attempt));
        }
        throw err;
      }

      const delayMs = retryDelay(options, attempt - 1, typed);
      options.onRetry?.({ attempt, delayMs, error: typed });
      await pause(delayMs);
    }
  }
}

/** Honour a provider's Retry-After hint, still bounded by the cap. */
function retryDelay(options: RetryOptions, retryIndex: number, error: TypedError): number {
  const computed = computeBackoff(options.policy, retryIndex, options.random);
  const hint = error.details?.['retryAfterMs'];
  if (typeof hint === 'number' && hint > computed) {
    return Math.min(options.policy.capMs, hint);
  }
  return computed;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
