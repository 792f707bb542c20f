export interface RetryPolicyOptions {
  /** Retries after the first attempt; 3 means at most 4 attempts. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

/**
 * Stateless exponential backoff: `failed attempt → decision`. Every error
 * kind is retried while attempts remain.
 * The delay before retry n is `baseDelayMs * 2^(n-1)`, capped at `maxDelayMs`.
 */
export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${options.maxRetries}`);
    }
  }

  /** `attempt` is the 1-based number of the attempt that just failed. */
  decide(attempt: number): RetryDecision {
    if (attempt > this.options.maxRetries) {
      return { retry: false, delayMs: 0 };
    }
    const delayMs = Math.min(this.options.baseDelayMs * 2 ** (attempt - 1), this.options.maxDelayMs);
    return { retry: true, delayMs };
  }
}
