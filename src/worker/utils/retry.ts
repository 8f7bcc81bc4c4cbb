import { PipelineError } from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay in ms before the given retry (1 = first retry). */
  backoff: (retry: number) => number;
  isRetryable: (error: unknown) => boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export function exponentialBackoff(baseDelayMs: number, maxDelayMs = 30000): (retry: number) => number {
  return (retry) => Math.min(baseDelayMs * 2 ** (retry - 1), maxDelayMs);
}

export function isRetryablePipelineError(error: unknown): boolean {
  return error instanceof PipelineError && error.retryable;
}

/**
 * Network-bound stages: three attempts, exponential backoff.
 */
export function networkRetryPolicy(baseDelayMs: number): RetryPolicy {
  return {
    maxAttempts: 3,
    backoff: exponentialBackoff(baseDelayMs),
    isRetryable: isRetryablePipelineError
  };
}

/**
 * Local tool invocation: a single retry, transient failures only.
 */
export function localToolRetryPolicy(baseDelayMs: number): RetryPolicy {
  return {
    maxAttempts: 2,
    backoff: () => baseDelayMs,
    isRetryable: isRetryablePipelineError
  };
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: { label?: string; sleep?: Sleep } = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 1;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }

      const delay = policy.backoff(attempt);
      console.warn(
        `${options.label ?? 'operation'} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delay}ms:`,
        error instanceof Error ? error.message : error
      );
      await wait(delay);
      attempt++;
    }
  }
}
