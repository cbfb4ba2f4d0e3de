export const DEFAULT_RETRY_LIMIT = 5;
export const DEFAULT_BACKOFF_MS = 2_000;

export interface RetryPolicy {
  limit: number;
  baseDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function shouldRetry(attempt: number, limit: number): boolean {
  return attempt <= limit;
}

// Attempt n waits n * base before the next try.
export function backoffDelay(attempt: number, baseDelayMs = DEFAULT_BACKOFF_MS): number {
  return baseDelayMs * attempt;
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    limit: overrides.limit ?? DEFAULT_RETRY_LIMIT,
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_BACKOFF_MS,
    sleep: overrides.sleep ?? sleep,
  };
}
