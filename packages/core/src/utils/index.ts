/**
 * @veil/core - Common utilities
 *
 * Shared helper functions used across the Veil packages.
 */

import { createHash, createHmac } from 'node:crypto';
import { customAlphabet } from 'nanoid';

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Sleep for a given number of milliseconds. Resolves early (without
 * throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/**
 * Compute a SHA-256 hash of the input string.
 */
export function hash(input: string, encoding: 'hex' | 'base64' = 'hex'): string {
  return createHash('sha256').update(input, 'utf-8').digest(encoding);
}

/**
 * HMAC-SHA256 of `input` under `key`, hex encoded.
 */
export function hmac(key: string | Buffer, input: string): string {
  return createHmac('sha256', key).update(input, 'utf-8').digest('hex');
}

// ---------------------------------------------------------------------------
// JSON
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON with object keys sorted recursively, so equal values always
 * serialise to the same string. `undefined` members are dropped.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v === undefined ? null : v)).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const keys = Object.keys(value).filter((k) => value[k] !== undefined).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Deep-freeze a plain data value in place and return it.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ---------------------------------------------------------------------------
// Numbers, time, ids
// ---------------------------------------------------------------------------

/** Clamp to [0, 1]; NaN becomes 0. */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Current time as a UTC ISO-8601 string. */
export function nowIso(): string {
  return new Date().toISOString();
}

const runIdAlphabet = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 16);

/**
 * Generate a run identifier: `run_<16 lowercase alphanumerics>`.
 */
export function createRunId(): string {
  return `run_${runIdAlphabet()}`;
}
