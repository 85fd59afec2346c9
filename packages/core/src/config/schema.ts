/**
 * @veil/core - TypeBox schema for veil.json configuration
 *
 * Sections: privacy, salt, dp, gate, remote, local, output
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const PrivacyPolicySchema = Type.Object({
  coverageThreshold: Type.Number({ exclusiveMinimum: 0, maximum: 1, default: 0.995 }),
  strictCoverageThreshold: Type.Number({ exclusiveMinimum: 0, maximum: 1, default: 0.999 }),
  strict: Type.Boolean({ default: false }),
  pseudonymize: Type.Boolean({
    default: true,
    description: 'Replace identities with stable pseudonyms',
  }),
  opaqueTokens: Type.Boolean({
    default: true,
    description: 'Replace other sensitive spans with opaque tokens',
  }),
  hardFailClasses: Type.Array(Type.String(), {
    default: ['csam_indicators', 'explicit_violence', 'illegal_drugs'],
  }),
  minConfidence: Type.Number({ minimum: 0, maximum: 1, default: 0.5 }),
});
export type PrivacyPolicy = Static<typeof PrivacyPolicySchema>;

const SaltSchema = Type.Object({
  path: Type.Optional(Type.String({ description: 'Defaults to VEIL_HOME/secrets/salt' })),
});

export const DPConfigSchema = Type.Object({
  epsilon: Type.Number({ default: 0.5, description: 'Default per-query epsilon' }),
  delta: Type.Number({ default: 1e-6 }),
  maxEpsilon: Type.Number({ default: 3.0 }),
  maxDelta: Type.Number({ default: 1e-5 }),
  reproducible: Type.Boolean({ default: false }),
  sumBound: Type.Number({ exclusiveMinimum: 0, default: 1 }),
});
export type DPConfig = Static<typeof DPConfigSchema>;

export const GateThresholdsSchema = Type.Object({
  tau: Type.Number({ minimum: 0, maximum: 1, default: 0.7 }),
  tauLow: Type.Number({ minimum: 0, maximum: 1, default: 0.62 }),
  tauHigh: Type.Number({ minimum: 0, maximum: 1, default: 0.78 }),
});
export type GateThresholds = Static<typeof GateThresholdsSchema>;

const RemoteSchema = Type.Object({
  authorized: Type.Boolean({
    default: false,
    description: 'Explicit authorization to send redacted fragments off-device',
  }),
  endpoint: Type.Optional(Type.String()),
  modelId: Type.String({ default: 'remote/default' }),
  timeoutMs: Type.Integer({ minimum: 1, default: 15000 }),
  maxAttempts: Type.Integer({ minimum: 1, maximum: 10, default: 3 }),
  backoffBaseMs: Type.Integer({ minimum: 0, default: 250 }),
  backoffMaxMs: Type.Integer({ minimum: 0, default: 4000 }),
  concurrency: Type.Integer({ minimum: 1, default: 2 }),
});

const LocalSchema = Type.Object({
  modelId: Type.String({ default: 'local/heuristic-1' }),
  concurrency: Type.Integer({ minimum: 0, default: 0, description: '0 = available cores' }),
});

const OutputSchema = Type.Object({
  schemaVersion: Type.String({ default: '1.0.0' }),
  dir: Type.Optional(Type.String()),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const VeilConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  privacy: PrivacyPolicySchema,
  salt: SaltSchema,
  dp: DPConfigSchema,
  gate: GateThresholdsSchema,
  remote: RemoteSchema,
  local: LocalSchema,
  output: OutputSchema,
});

export type VeilConfig = Static<typeof VeilConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: VeilConfig = {
  version: 1,
  privacy: {
    coverageThreshold: 0.995,
    strictCoverageThreshold: 0.999,
    strict: false,
    pseudonymize: true,
    opaqueTokens: true,
    hardFailClasses: ['csam_indicators', 'explicit_violence', 'illegal_drugs'],
    minConfidence: 0.5,
  },
  salt: {},
  dp: {
    epsilon: 0.5,
    delta: 1e-6,
    maxEpsilon: 3.0,
    maxDelta: 1e-5,
    reproducible: false,
    sumBound: 1,
  },
  gate: {
    tau: 0.7,
    tauLow: 0.62,
    tauHigh: 0.78,
  },
  remote: {
    authorized: false,
    modelId: 'remote/default',
    timeoutMs: 15000,
    maxAttempts: 3,
    backoffBaseMs: 250,
    backoffMaxMs: 4000,
    concurrency: 2,
  },
  local: {
    modelId: 'local/heuristic-1',
    concurrency: 0,
  },
  output: {
    schemaVersion: '1.0.0',
  },
};
