/**
 * @veil/fallback - Retry policy
 *
 * Capped exponential backoff over a small fixed number of attempts.
 * Decides which failures are worth another attempt; the caller owns the
 * actual waiting and re-issuing.
 */

import {
  CanceledError,
  RemoteTimeoutError,
  RemoteTransportError,
  SchemaValidationError,
  ConfigurationError,
  type Issue,
} from '@veil/core';

export interface RetryPolicyOptions {
  /** Total attempts including the first. Default 3. */
  maxAttempts?: number;
  /** Delay before the second attempt. Default 250ms. */
  baseDelayMs?: number;
  /** Upper bound for any single delay. Default 4000ms. */
  maxDelayMs?: number;
}

/**
 * Whether an HTTP status is worth retrying.
 *
 * Retried:
 *   - 408 Request Timeout
 *   - 429 Too Many Requests
 *   - 5xx Server errors
 *   - 0   (connection refused / network error represented as 0)
 *
 * Everything else, notably 401/403 (auth) and 404, fails immediately.
 */
export function isRetryableStatus(statusCode: number): boolean {
  if (statusCode === 0 || statusCode === 408 || statusCode === 429) {
    return true;
  }
  return statusCode >= 500 && statusCode <= 599;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 250;
    this.maxDelayMs = options.maxDelayMs ?? 4000;

    const issues: Issue[] = [];
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      issues.push({ path: '/maxAttempts', message: 'must be an integer >= 1' });
    }
    if (!(this.baseDelayMs >= 0)) {
      issues.push({ path: '/baseDelayMs', message: 'must be >= 0' });
    }
    if (!(this.maxDelayMs >= this.baseDelayMs)) {
      issues.push({ path: '/maxDelayMs', message: 'must be >= baseDelayMs' });
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid retry policy', issues);
    }
  }

  /**
   * Delay before attempt `attempt + 1`, given that `attempt` (1-based)
   * just failed: base * 2^(attempt - 1), capped at maxDelayMs.
   */
  delayFor(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** Math.max(0, attempt - 1));
  }

  /** Whether `error` is transient. */
  isRetryable(error: unknown): boolean {
    if (error instanceof CanceledError || error instanceof SchemaValidationError) return false;
    if (error instanceof ConfigurationError) return false;
    if (error instanceof RemoteTimeoutError) return true;
    if (error instanceof RemoteTransportError) {
      return error.statusCode === undefined || isRetryableStatus(error.statusCode);
    }
    // Unclassified failures (DNS, socket resets) are treated as transient
    return true;
  }

  /** Whether to try again after `attempt` (1-based) failed with `error`. */
  shouldRetry(error: unknown, attempt: number): boolean {
    return attempt < this.maxAttempts && this.isRetryable(error);
  }
}
