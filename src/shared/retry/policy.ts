/**
 * Retry Policy
 *
 * Exponential backoff shared by the HTTP fetcher and the LLM client.
 * Delay before retry n (0-based) is min(baseDelayMs * 2^n, maxDelayMs),
 * stretched to a server-provided retry-after hint when one is larger.
 */

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Retries after the first attempt (total attempts = maxRetries + 1) */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000
};

/**
 * Information passed to the onRetry hook before each wait
 */
export interface RetryAttempt {
  /** 0-based retry number */
  retry: number;
  delayMs: number;
  error: unknown;
}

export interface RetryPolicyOptions extends Partial<RetryConfig> {
  /** Decides whether a failure is transient. Defaults to "never retry". */
  isRetryable?: (error: unknown) => boolean;
  /** Server hint (e.g. Retry-After) in milliseconds, if the error carries one */
  retryAfterMs?: (error: unknown) => number | undefined;
  onRetry?: (attempt: RetryAttempt) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reusable retry-with-backoff policy. Instances are immutable; counters live
 * inside each execute() call.
 */
export class RetryPolicy {
  readonly config: RetryConfig;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly retryAfterMs: (error: unknown) => number | undefined;
  private readonly onRetry?: (attempt: RetryAttempt) => void;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions = {}) {
    this.config = {
      maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs
    };
    if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.config.maxRetries}`);
    }
    this.isRetryable = options.isRetryable ?? (() => false);
    this.retryAfterMs = options.retryAfterMs ?? (() => undefined);
    this.onRetry = options.onRetry;
    this.sleepFn = options.sleep ?? sleep;
  }

  /**
   * Backoff delay before the given 0-based retry
   */
  delayFor(retry: number, error?: unknown): number {
    const exponential = Math.min(
      this.config.baseDelayMs * Math.pow(2, retry),
      this.config.maxDelayMs
    );
    const hint = error === undefined ? undefined : this.retryAfterMs(error);
    if (hint === undefined || hint <= exponential) {
      return exponential;
    }
    return Math.min(hint, this.config.maxDelayMs);
  }

  /**
   * Run the operation, retrying transient failures sequentially.
   * The last error is rethrown unchanged once retries are exhausted.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt >= this.config.maxRetries || !this.isRetryable(error)) {
          throw error;
        }
        const delayMs = this.delayFor(attempt, error);
        this.onRetry?.({ retry: attempt, delayMs, error });
        await this.sleepFn(delayMs);
      }
    }
  }
}
