/**
 * @veil/core - Error taxonomy
 *
 * Every error carries a machine-readable code. Only ConfigurationError and
 * HardFailContentDetected are fatal, and only for their own scope (process
 * startup and a single fragment respectively).
 */

import type { RedactionReport } from './types/index.js';

export type ErrorCode =
  | 'configuration_error'
  | 'hardfail'
  | 'coverage_insufficient'
  | 'budget_exceeded'
  | 'validation_failed'
  | 'transport_error'
  | 'remote_timeout'
  | 'canceled';

export interface Issue {
  path: string;
  message: string;
}

export abstract class VeilError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Fatal
// ---------------------------------------------------------------------------

/** Invalid thresholds, privacy parameters or policy. Halts startup. */
export class ConfigurationError extends VeilError {
  readonly code = 'configuration_error';
  readonly fatal = true;
  readonly issues: Issue[];

  constructor(message: string, issues: Issue[] = []) {
    const detail = issues.length > 0
      ? `${message}: ${issues.map((i) => `${i.path || '/'} ${i.message}`).join('; ')}`
      : message;
    super(detail);
    this.issues = issues;
  }
}

/** Fragment contains a hard-fail content class; nothing downstream may run. */
export class HardFailContentDetected extends VeilError {
  readonly code = 'hardfail';
  readonly fatal = true;
  readonly fragmentId: string;
  readonly classes: string[];
  readonly report: RedactionReport;

  constructor(report: RedactionReport) {
    super(
      `Fragment ${report.fragmentId} contains hard-fail content (${report.hardfailClasses.join(', ')})`,
    );
    this.fragmentId = report.fragmentId;
    this.classes = [...report.hardfailClasses];
    this.report = report;
  }
}

// ---------------------------------------------------------------------------
// Non-fatal
// ---------------------------------------------------------------------------

export class CoverageInsufficient extends VeilError {
  readonly code = 'coverage_insufficient';
  readonly fatal = false;

  constructor(
    readonly coverage: number,
    readonly required: number,
  ) {
    super(`Redaction coverage ${coverage.toFixed(4)} is below required ${required}`);
  }
}

export class BudgetExceeded extends VeilError {
  readonly code = 'budget_exceeded';
  readonly fatal = false;

  constructor(
    message: string,
    readonly requestedEpsilon: number,
    readonly spentEpsilon: number,
    readonly maxEpsilon: number,
  ) {
    super(message);
  }
}

export class SchemaValidationError extends VeilError {
  readonly code = 'validation_failed';
  readonly fatal = false;

  constructor(
    message: string,
    readonly issues: Issue[] = [],
  ) {
    super(message);
  }
}

export class RemoteTransportError extends VeilError {
  readonly code = 'transport_error';
  readonly fatal = false;

  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RemoteTimeoutError extends VeilError {
  readonly code = 'remote_timeout';
  readonly fatal = false;

  constructor(readonly timeoutMs: number, label: string) {
    super(`Remote call "${label}" timed out after ${timeoutMs}ms`);
  }
}

export class CanceledError extends VeilError {
  readonly code = 'canceled';
  readonly fatal = false;

  constructor(message = 'Run canceled') {
    super(message);
  }
}

/**
 * Map any thrown value to the closest code. Unknown errors count as
 * transport failures since they only surface from remote calls.
 */
export function errorCodeOf(err: unknown): ErrorCode {
  if (err instanceof VeilError) return err.code;
  return 'transport_error';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
