/**
 * @veil/enrichment - Schema validator
 *
 * Enforces the output record contract per schema version. Invalid
 * records are quarantined with their error detail and never abort a
 * batch.
 */

import type { TSchema, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import pino from 'pino';
import {
  SchemaValidationError,
  FinalRecordSchema,
  AnalysisSchema,
  nowIso,
  type Analysis,
  type FinalRecord,
  type Issue,
  type QuarantineEntry,
} from '@veil/core';
import type { QuarantineSink } from './quarantine.js';

export type ValidationOutcome<T> =
  | { valid: true; record: T }
  | { valid: false; error: SchemaValidationError };

export interface BatchValidation<T> {
  valid: T[];
  invalid: QuarantineEntry[];
}

/** Output schemas by version. */
export const RECORD_SCHEMAS: Readonly<Record<string, typeof FinalRecordSchema>> = Object.freeze({
  '1.0.0': FinalRecordSchema,
});

/**
 * Check `value` against `schema`, collecting every issue.
 */
export function checkSchema<S extends TSchema>(
  schema: S,
  value: unknown,
  label: string,
): ValidationOutcome<Static<S>> {
  if (Value.Check(schema, value)) {
    return { valid: true, record: value };
  }
  const issues: Issue[] = [...Value.Errors(schema, value)].map((e) => ({
    path: e.path || '/',
    message: e.message,
  }));
  return {
    valid: false,
    error: new SchemaValidationError(`${label} failed validation (${issues.length} issue(s))`, issues),
  };
}

/** Validate an untrusted analysis body (e.g. a remote response). */
export function validateAnalysis(value: unknown): ValidationOutcome<Analysis> {
  return checkSchema(AnalysisSchema, value, 'Analysis');
}

export interface SchemaValidatorOptions {
  quarantine?: QuarantineSink;
  logger?: pino.Logger;
}

export class SchemaValidator {
  private readonly quarantine?: QuarantineSink;
  private readonly log: pino.Logger;
  private quarantined = 0;

  constructor(options: SchemaValidatorOptions = {}) {
    this.quarantine = options.quarantine;
    this.log = options.logger ?? pino({ name: '@veil/enrichment-validator' });
  }

  get supportedVersions(): string[] {
    return Object.keys(RECORD_SCHEMAS);
  }

  get quarantinedCount(): number {
    return this.quarantined;
  }

  /**
   * Validate one record. Unknown schema versions are invalid.
   */
  validate(record: unknown, schemaVersion: string): ValidationOutcome<FinalRecord> {
    const schema = RECORD_SCHEMAS[schemaVersion];
    if (!schema) {
      return {
        valid: false,
        error: new SchemaValidationError(`Unknown schema version "${schemaVersion}"`, [
          { path: '/provenance/schemaVersion', message: `supported: ${this.supportedVersions.join(', ')}` },
        ]),
      };
    }
    return checkSchema(schema, record, `Record (schema ${schemaVersion})`);
  }

  /**
   * Validate and, on failure, write the record to quarantine.
   */
  async validateOrQuarantine(record: unknown, schemaVersion: string): Promise<ValidationOutcome<FinalRecord>> {
    const outcome = this.validate(record, schemaVersion);
    if (!outcome.valid) {
      await this.quarantineRecord(record, outcome.error);
    }
    return outcome;
  }

  /**
   * Partition a batch into valid records and quarantine entries. Every
   * invalid record is written to quarantine; the batch always completes.
   */
  async validateBatch(records: readonly unknown[], schemaVersion: string): Promise<BatchValidation<FinalRecord>> {
    const result: BatchValidation<FinalRecord> = { valid: [], invalid: [] };
    for (const record of records) {
      const outcome = this.validate(record, schemaVersion);
      if (outcome.valid) {
        result.valid.push(outcome.record);
      } else {
        result.invalid.push(await this.quarantineRecord(record, outcome.error));
      }
    }
    return result;
  }

  /**
   * Write any failed record to quarantine. Used for remote responses as
   * well as final records.
   */
  async quarantineRecord(record: unknown, error: SchemaValidationError): Promise<QuarantineEntry> {
    const entry: QuarantineEntry = {
      originalRecord: record,
      errorDetail: { code: error.code, message: error.message, issues: error.issues },
      quarantinedAt: nowIso(),
    };
    this.quarantined++;
    this.log.warn({ code: error.code, issues: error.issues.length }, 'Record quarantined');
    if (this.quarantine) {
      await this.quarantine.write(entry);
    }
    return entry;
  }
}
