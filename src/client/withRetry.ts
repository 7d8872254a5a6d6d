import { GraphApiError } from "../api/GraphApiError.js";

/**
 * Bounded exponential backoff.
 * Attempt n (1-indexed) waits `baseDelayMs * 2^(n-1)` before the next try,
 * capped at `maxDelayMs`.
 */
export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: Sleep;
  /** Called before each wait, with the attempt that just failed */
  onRetry?: (attempt: number, delayMs: number, error: GraphApiError) => void;
}

/**
 * Delay before the attempt following `attempt`.
 *
 * @example
 * backoffDelay({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 }, 2) // 1000
 */
export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

const isRetryable = (error: unknown): error is GraphApiError =>
  error instanceof GraphApiError && error.transient;

/**
 * Run `operation`, retrying transient GraphApiErrors (connection, 5xx).
 * Any other error, and the last transient one, is rethrown unchanged.
 */
export const withRetry = async <T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> => {
  const maxAttempts = Math.max(1, options.policy.maxAttempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxAttempts) {
        throw error;
      }
      const delayMs = backoffDelay(options.policy, attempt);
      options.onRetry?.(attempt, delayMs, error);
      await options.sleep(delayMs);
    }
  }
};
