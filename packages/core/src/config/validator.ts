/**
 * @veil/core - Configuration validator
 *
 * Validates a VeilConfig object using TypeBox, then applies the business
 * rules the schema cannot express (threshold ordering, privacy parameter
 * ranges). The rule helpers are shared with the engines, which run the
 * same checks on their own constructor arguments.
 */

import { Value } from '@sinclair/typebox/value';
import type { Issue } from '../errors.js';
import {
  VeilConfigSchema,
  type VeilConfig,
  type GateThresholds,
  type PrivacyPolicy,
} from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: Issue[];
  config: VeilConfig | null;
}

export const EPSILON_MAX = 10;
export const DELTA_MAX = 0.01;

// ---------------------------------------------------------------------------
// Rule helpers
// ---------------------------------------------------------------------------

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Epsilon must lie in (0, 10]. */
export function epsilonIssues(path: string, value: unknown): Issue[] {
  if (!isFiniteNumber(value) || value <= 0 || value > EPSILON_MAX) {
    return [{ path, message: `epsilon must be in (0, ${EPSILON_MAX}], got ${String(value)}` }];
  }
  return [];
}

/** Delta must lie in (0, 0.01]. */
export function deltaIssues(path: string, value: unknown): Issue[] {
  if (!isFiniteNumber(value) || value <= 0 || value > DELTA_MAX) {
    return [{ path, message: `delta must be in (0, ${DELTA_MAX}], got ${String(value)}` }];
  }
  return [];
}

/** 0 <= tauLow <= tau <= tauHigh <= 1 */
export function thresholdIssues(path: string, gate: GateThresholds): Issue[] {
  const issues: Issue[] = [];
  for (const key of ['tau', 'tauLow', 'tauHigh'] as const) {
    const v = gate[key];
    if (!isFiniteNumber(v) || v < 0 || v > 1) {
      issues.push({ path: `${path}/${key}`, message: `${key} must be in [0, 1], got ${String(v)}` });
    }
  }
  if (issues.length > 0) return issues;

  if (gate.tauLow > gate.tau || gate.tau > gate.tauHigh) {
    issues.push({
      path,
      message: `thresholds must satisfy tauLow <= tau <= tauHigh (got ${gate.tauLow}, ${gate.tau}, ${gate.tauHigh})`,
    });
  }
  return issues;
}

export function policyIssues(path: string, policy: PrivacyPolicy): Issue[] {
  const issues: Issue[] = [];
  const { coverageThreshold, strictCoverageThreshold } = policy;

  if (!isFiniteNumber(coverageThreshold) || coverageThreshold <= 0 || coverageThreshold > 1) {
    issues.push({ path: `${path}/coverageThreshold`, message: 'must be in (0, 1]' });
  }
  if (
    !isFiniteNumber(strictCoverageThreshold) ||
    strictCoverageThreshold <= 0 ||
    strictCoverageThreshold > 1
  ) {
    issues.push({ path: `${path}/strictCoverageThreshold`, message: 'must be in (0, 1]' });
  }
  if (issues.length === 0 && strictCoverageThreshold < coverageThreshold) {
    issues.push({
      path: `${path}/strictCoverageThreshold`,
      message: `strict threshold (${strictCoverageThreshold}) is below the default threshold (${coverageThreshold})`,
    });
  }
  if (!Array.isArray(policy.hardFailClasses) || policy.hardFailClasses.some((c) => typeof c !== 'string' || c === '')) {
    issues.push({ path: `${path}/hardFailClasses`, message: 'must be a list of non-empty class names' });
  }
  if (!isFiniteNumber(policy.minConfidence) || policy.minConfidence < 0 || policy.minConfidence > 1) {
    issues.push({ path: `${path}/minConfidence`, message: 'must be in [0, 1]' });
  }
  return issues;
}

// ---------------------------------------------------------------------------
// validateConfig
// ---------------------------------------------------------------------------

/**
 * Validate a config object.
 *
 * 1. TypeBox schema check
 * 2. Privacy policy rules
 * 3. DP parameter ranges
 * 4. Gate threshold ordering
 * 5. Remote backoff sanity
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: Issue[] = [];

  for (const err of Value.Errors(VeilConfigSchema, raw)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (errors.length > 0 || !Value.Check(VeilConfigSchema, raw)) {
    return { valid: false, errors, config: null };
  }

  const config = raw;

  errors.push(...policyIssues('/privacy', config.privacy));
  errors.push(...epsilonIssues('/dp/epsilon', config.dp.epsilon));
  errors.push(...epsilonIssues('/dp/maxEpsilon', config.dp.maxEpsilon));
  errors.push(...deltaIssues('/dp/delta', config.dp.delta));
  errors.push(...deltaIssues('/dp/maxDelta', config.dp.maxDelta));
  errors.push(...thresholdIssues('/gate', config.gate));

  if (config.dp.epsilon > config.dp.maxEpsilon) {
    errors.push({ path: '/dp/epsilon', message: 'per-query epsilon exceeds maxEpsilon' });
  }
  if (config.remote.backoffBaseMs > config.remote.backoffMaxMs) {
    errors.push({ path: '/remote/backoffBaseMs', message: 'must not exceed backoffMaxMs' });
  }

  return {
    valid: errors.length === 0,
    errors,
    config,
  };
}
