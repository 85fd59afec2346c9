export {
  VeilConfigSchema,
  PrivacyPolicySchema,
  DPConfigSchema,
  GateThresholdsSchema,
  DEFAULT_CONFIG,
  type VeilConfig,
  type PrivacyPolicy,
  type DPConfig,
  type GateThresholds,
} from './schema.js';
export { loadConfig, resolveConfig, deepMerge } from './loader.js';
export {
  validateConfig,
  epsilonIssues,
  deltaIssues,
  thresholdIssues,
  policyIssues,
  EPSILON_MAX,
  DELTA_MAX,
  type ValidationResult,
} from './validator.js';
export { resolveVeilHome, buildPaths, ensureDirectories, type VeilPaths } from './paths.js';
