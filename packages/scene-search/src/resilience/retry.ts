/**
 * Retry with Bounded Fixed Backoff
 *
 * Catalog backends fail transiently (gateway errors, throttling, dropped
 * connections). Every open and search call goes through this executor.
 *
 * DESIGN:
 * - Fixed delay between attempts (default 1s)
 * - Bounded attempt count (default 300, i.e. up to ~5 minutes blocking)
 * - Retry predicate: only errors classified as transient are retried
 * - Exhaustion re-throws the final transient error itself, unwrapped
 */

import { toError, TransientCatalogError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { RetryAttempt, RetryConfig } from './types.js';

const log = createLogger({ module: 'retry' });

export const DEFAULT_MAX_ATTEMPTS = 300;
export const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Default transient classification: catalog adapters wrap retryable backend
 * failures in TransientCatalogError
 */
export function isTransientCatalogError(error: Error): boolean {
  return error instanceof TransientCatalogError;
}

/**
 * Retry executor with fixed backoff
 *
 * @example
 * ```typescript
 * const retry = new RetryExecutor({
 *   maxAttempts: 300,
 *   delayMs: 1000,
 *   isTransient: isTransientCatalogError,
 *   operation: 'stac.search',
 * });
 *
 * const page = await retry.execute(() => client.search(body));
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private lastAttempts: readonly RetryAttempt[] = [];

  constructor(config: RetryConfig) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
    }
    if (config.delayMs < 0) {
      throw new RangeError(`delayMs must not be negative, got ${config.delayMs}`);
    }
    this.config = config;
  }

  /**
   * Failed attempts recorded by the most recent execute() call
   */
  get attempts(): readonly RetryAttempt[] {
    return this.lastAttempts;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const attempts: RetryAttempt[] = [];
    this.lastAttempts = attempts;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (thrown) {
        const error = toError(thrown);
        const retryable = this.config.isTransient(error);
        attempts.push({ attemptNumber: attempt, error, retryable });

        if (!retryable) {
          throw error;
        }
        if (attempt >= this.config.maxAttempts) {
          log.error('retries exhausted', {
            operation: this.config.operation,
            attempts: attempt,
            error: error.message,
          });
          throw error;
        }

        log.warn(`failed at try ${attempt}/${this.config.maxAttempts}`, {
          operation: this.config.operation,
          error: error.message,
        });
        await this.sleep(this.config.delayMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Create retry executor with catalog defaults (300 attempts, 1s apart)
 */
export function createRetryExecutor(overrides?: Partial<RetryConfig>): RetryExecutor {
  return new RetryExecutor({
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    delayMs: DEFAULT_RETRY_DELAY_MS,
    isTransient: isTransientCatalogError,
    ...overrides,
  });
}

/**
 * Convenience function: retry once-off with catalog defaults
 */
export async function retryFixed<T>(
  fn: () => Promise<T>,
  config?: Partial<RetryConfig>
): Promise<T> {
  return createRetryExecutor(config).execute(fn);
}
