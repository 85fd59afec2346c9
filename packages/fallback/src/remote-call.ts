/**
 * @veil/fallback - RemoteCaller
 *
 * Wraps one remote operation with a hard per-attempt timeout, bounded
 * retries under a RetryPolicy, and run-level cancellation. Every attempt
 * is recorded so the caller can report what happened.
 */

import pino from 'pino';
import {
  VeilError,
  CanceledError,
  RemoteTimeoutError,
  RemoteTransportError,
  errorCodeOf,
  errorMessage,
  sleep,
  type ErrorCode,
} from '@veil/core';
import { RetryPolicy } from './retry-policy.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Record of a single attempt. */
export interface RemoteAttempt {
  attempt: number;
  success: boolean;
  code?: ErrorCode;
  error?: string;
  durationMs: number;
}

export interface RemoteCallResult<T> {
  result: T;
  attempts: RemoteAttempt[];
}

export interface RemoteCallerOptions {
  /** Per-attempt timeout in milliseconds (default 15 000). */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Called before each retry with the delay about to be waited. */
  onRetry?: (attempt: number, delayMs: number, error: string) => void;
  logger?: pino.Logger;
}

export interface CallOptions {
  /** Run-level cancellation. Stops retries and aborts the in-flight attempt. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Error carrying an HTTP status code so the retry policy can decide
 * whether the failure is transient.
 */
export class HttpError extends RemoteTransportError {
  constructor(
    message: string,
    public override readonly statusCode: number,
  ) {
    super(message, statusCode);
  }
}

/** Thrown once retries are exhausted or a non-retryable failure occurs. */
export class RemoteCallError extends VeilError {
  readonly code: ErrorCode;
  readonly fatal = false;
  readonly attempts: RemoteAttempt[];

  constructor(message: string, attempts: RemoteAttempt[], cause: unknown) {
    super(message, { cause });
    this.code = errorCodeOf(cause);
    this.attempts = attempts;
  }
}

// ---------------------------------------------------------------------------
// Timeout helper
// ---------------------------------------------------------------------------

/**
 * Race a promise against a timeout. Rejects with RemoteTimeoutError when
 * the timeout fires first, and calls `onTimeout` so the attempt can be
 * aborted.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  onTimeout?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new RemoteTimeoutError(ms, label));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// RemoteCaller
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const caller = new RemoteCaller({ timeoutMs: 10_000, retryPolicy: new RetryPolicy({ maxAttempts: 3 }) });
 * const { result, attempts } = await caller.call('analyze', (signal) => analyzer.analyze(payload, signal));
 * ```
 */
export class RemoteCaller {
  readonly timeoutMs: number;
  readonly retryPolicy: RetryPolicy;
  private readonly onRetry?: (attempt: number, delayMs: number, error: string) => void;
  private readonly log: pino.Logger;

  constructor(options: RemoteCallerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.onRetry = options.onRetry;
    this.log = options.logger ?? pino({ name: '@veil/fallback' });
  }

  /**
   * Run `operation` until it succeeds, the policy gives up, or the signal
   * aborts.
   *
   * @throws RemoteCallError wrapping the last failure (code `canceled`
   *   when the run was canceled).
   */
  async call<T>(
    label: string,
    operation: (signal: AbortSignal) => Promise<T>,
    options: CallOptions = {},
  ): Promise<RemoteCallResult<T>> {
    const attempts: RemoteAttempt[] = [];
    const { signal } = options;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new RemoteCallError(`Remote call "${label}" canceled`, attempts, new CanceledError());
      }

      const controller = new AbortController();
      const forwardAbort = (): void => controller.abort();
      signal?.addEventListener('abort', forwardAbort, { once: true });

      const start = performance.now();
      try {
        const result = await withTimeout(
          Promise.resolve().then(() => operation(controller.signal)),
          this.timeoutMs,
          label,
          () => controller.abort(),
        );
        const durationMs = Math.round(performance.now() - start);
        attempts.push({ attempt, success: true, durationMs });
        this.log.debug({ label, attempt, durationMs }, 'Remote call succeeded');
        return { result, attempts };
      } catch (err: unknown) {
        const durationMs = Math.round(performance.now() - start);
        const failure = signal?.aborted ? new CanceledError() : err;
        const message = errorMessage(failure);
        const code = errorCodeOf(failure);

        attempts.push({ attempt, success: false, code, error: message, durationMs });
        this.log.warn({ label, attempt, durationMs, code }, 'Remote call failed');

        if (!this.retryPolicy.shouldRetry(failure, attempt)) {
          throw new RemoteCallError(
            `Remote call "${label}" failed after ${attempt} attempt(s): ${message}`,
            attempts,
            failure,
          );
        }

        const delayMs = this.retryPolicy.delayFor(attempt);
        this.onRetry?.(attempt, delayMs, message);
        await sleep(delayMs, signal);
      } finally {
        signal?.removeEventListener('abort', forwardAbort);
      }
    }
  }
}
