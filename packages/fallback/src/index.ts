/**
 * @veil/fallback - Bounded remote calls
 *
 * Retry policy with capped exponential backoff, and a caller that applies
 * it with hard per-attempt timeouts and run-level cancellation.
 *
 * @packageDocumentation
 */

export { RetryPolicy, isRetryableStatus, type RetryPolicyOptions } from './retry-policy.js';

export {
  RemoteCaller,
  RemoteCallError,
  HttpError,
  withTimeout,
  type RemoteAttempt,
  type RemoteCallResult,
  type RemoteCallerOptions,
  type CallOptions,
} from './remote-call.js';
