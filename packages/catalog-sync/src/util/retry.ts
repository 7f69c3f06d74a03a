/**
 * Bounded retry helpers shared by the sync engine and the file fetcher.
 */

export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;

  /** Delay before the second attempt; doubles after every failure */
  baseDelayMs: number;

  /** Upper bound for a single delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
};

/**
 * Delay to wait after failed attempt number `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(policy.maxDelayMs, exponential);
}

export function validateRetryPolicy(policy: RetryPolicy): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    errors.push('maxAttempts must be an integer of at least 1');
  }
  if (policy.maxAttempts > 20) {
    errors.push('maxAttempts must not exceed 20');
  }
  if (policy.baseDelayMs < 0) {
    errors.push('baseDelayMs must not be negative');
  }
  if (policy.maxDelayMs < policy.baseDelayMs) {
    errors.push('maxDelayMs must be at least baseDelayMs');
  }
  return errors;
}

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: SleepFn;

  /** Only errors this accepts are retried; anything else is rethrown at once */
  isRetryable: (err: unknown) => boolean;

  /** Called before each backoff sleep */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Run `fn` until it succeeds, throws a non-retryable error, or the attempt
 * ceiling is reached. The last error is rethrown with the attempt count
 * attached through `RetryExhaustedError`.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<RetryOutcome<T>> {
  const { policy, sleep, isRetryable, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(), attempts: attempt };
    } catch (err) {
      if (!isRetryable(err)) {
        throw err;
      }
      if (attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(err, attempt);
      }
      const delay = backoffDelay(policy, attempt);
      onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }
}

export class RetryExhaustedError extends Error {
  public readonly lastError: unknown;
  public readonly attempts: number;

  constructor(lastError: unknown, attempts: number) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt(s): ${reason}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.lastError = lastError;
    this.attempts = attempts;
  }
}
