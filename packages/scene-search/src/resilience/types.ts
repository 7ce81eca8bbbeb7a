/**
 * Resilience Types
 */

/**
 * Retry with bounded fixed backoff
 */
export interface RetryConfig {
  /** Total attempts including the first call */
  readonly maxAttempts: number;

  /** Delay between attempts in milliseconds (fixed, no growth) */
  readonly delayMs: number;

  /** Which errors count as transient; anything else propagates at once */
  readonly isTransient: (error: Error) => boolean;

  /** Label used in retry log lines */
  readonly operation?: string;
}

/**
 * Record of one failed attempt
 */
export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly error: Error;
  readonly retryable: boolean;
}
