/**
 * @veil/privacy - Differential privacy engine
 *
 * Answers count, sum, mean and histogram queries over record collections
 * with (epsilon, delta)-DP noise, charging every execution to a
 * PrivacyBudget before anything is computed.
 *
 * Sensitivity:
 *   count      1
 *   sum        per-record bound (values clamped to [-bound, bound])
 *   mean       (hi - lo) / max(n, 1) (values clamped to [lo, hi])
 *   histogram  1 per bin (each record lands in at most one bin)
 *
 * Laplace noise has scale sensitivity / epsilon. Gaussian noise has
 * sigma = sensitivity * sqrt(2 ln(1.25 / delta)) / epsilon.
 */

import { randomBytes } from 'node:crypto';
import pino from 'pino';
import {
  ConfigurationError,
  canonicalJson,
  epsilonIssues,
  deltaIssues,
  hash,
  type Issue,
} from '@veil/core';
import type { SaltStore } from '../salt-store.js';
import type { PrivacyBudget } from './budget.js';
import { SeededRandom } from './random.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Mechanism = 'laplace' | 'gaussian';

export type DataRecord = Readonly<Record<string, unknown>>;

/** Equality conditions; a record matches when every field is equal. */
export type RecordFilter = Record<string, string | number | boolean | null>;

interface QueryBase {
  /** Defaults to the engine epsilon. */
  epsilon?: number;
  /** Gaussian only. Defaults to the engine delta. */
  delta?: number;
  mechanism?: Mechanism;
  filter?: RecordFilter;
}

export interface CountQuery extends QueryBase {
  type: 'count';
}

export interface SumQuery extends QueryBase {
  type: 'sum';
  field: string;
  /** Per-record contribution bound. Defaults to the engine sumBound. */
  bound?: number;
}

export interface MeanQuery extends QueryBase {
  type: 'mean';
  field: string;
  bounds: [number, number];
}

export type HistogramBins = { edges: number[] } | { categories: string[] };

export interface HistogramQuery extends QueryBase {
  type: 'histogram';
  field: string;
  bins: HistogramBins;
}

export type DPQuery = CountQuery | SumQuery | MeanQuery | HistogramQuery;

export interface HistogramBin {
  label: string;
  trueCount: number;
  noisyCount: number;
}

export interface QueryResult {
  queryType: DPQuery['type'];
  trueValue: number;
  noisyValue: number;
  epsilonSpent: number;
  deltaSpent: number;
  sensitivity: number;
  noiseScale: number;
  mechanism: Mechanism;
  seed: string;
  deterministicSeedUsed: boolean;
  budgetRemaining: number;
  bins?: HistogramBin[];
}

/** A result with everything that would let a reader undo the noise removed. */
export type PublishableResult = Omit<QueryResult, 'trueValue' | 'seed' | 'bins'> & {
  bins?: Array<Omit<HistogramBin, 'trueCount'>>;
};

export interface DPEngineOptions {
  epsilon: number;
  delta: number;
  /** Derive noise seeds from (salt, query fingerprint). Requires `salt`. */
  reproducible?: boolean;
  salt?: SaltStore;
  /** Default per-record bound for sum queries. */
  sumBound?: number;
  logger?: pino.Logger;
}

export interface ExecuteOptions {
  /** Explicit noise seed; overrides reproducible seeding. */
  seed?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function clamp(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}

function matchesFilter(record: DataRecord, filter: RecordFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, expected]) => record[key] === expected);
}

function numericValues(records: readonly DataRecord[], field: string): number[] {
  const values: number[] = [];
  for (const record of records) {
    const value = record[field];
    if (typeof value === 'number' && Number.isFinite(value)) values.push(value);
  }
  return values;
}

function isIncreasing(edges: readonly number[]): boolean {
  return edges.every((e, i) => Number.isFinite(e) && (i === 0 || e > edges[i - 1]));
}

/** SHA-256 of the query's canonical JSON. */
export function queryFingerprint(query: DPQuery): string {
  return hash(canonicalJson(query));
}

// ---------------------------------------------------------------------------
// DifferentialPrivacyEngine
// ---------------------------------------------------------------------------

export class DifferentialPrivacyEngine {
  readonly epsilon: number;
  readonly delta: number;
  readonly reproducible: boolean;
  readonly sumBound: number;

  private readonly salt: SaltStore | undefined;
  private readonly log: pino.Logger;

  constructor(options: DPEngineOptions) {
    const issues: Issue[] = [
      ...epsilonIssues('/epsilon', options.epsilon),
      ...deltaIssues('/delta', options.delta),
    ];
    const reproducible = options.reproducible ?? false;
    if (reproducible && !options.salt) {
      issues.push({ path: '/reproducible', message: 'reproducible mode requires a salt' });
    }
    const sumBound = options.sumBound ?? 1;
    if (!Number.isFinite(sumBound) || sumBound <= 0) {
      issues.push({ path: '/sumBound', message: `must be > 0, got ${sumBound}` });
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid differential privacy parameters', issues);
    }

    this.epsilon = options.epsilon;
    this.delta = options.delta;
    this.reproducible = reproducible;
    this.sumBound = sumBound;
    this.salt = options.salt;
    this.log = options.logger ?? pino({ name: '@veil/privacy-dp' });
  }

  /**
   * Execute one query against `budget`.
   *
   * @throws ConfigurationError for invalid query parameters (budget untouched)
   * @throws BudgetExceeded when the budget cannot cover the query (budget untouched)
   */
  async executeQuery(
    records: readonly DataRecord[],
    query: DPQuery,
    budget: PrivacyBudget,
    options: ExecuteOptions = {},
  ): Promise<QueryResult> {
    const epsilon = query.epsilon ?? this.epsilon;
    const mechanism: Mechanism = query.mechanism ?? 'laplace';
    const delta = mechanism === 'gaussian' ? (query.delta ?? this.delta) : 0;

    const issues = this.queryIssues(query, epsilon, mechanism, delta);
    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid ${query.type} query`, issues);
    }

    return budget.exclusive((ledger) => {
      ledger.charge(epsilon, delta);

      const seed = this.seedFor(query, options.seed);
      const rng = new SeededRandom(seed.value);
      const selected = records.filter((r) => matchesFilter(r, query.filter));
      const computed = this.compute(selected, query);

      const noiseScale = mechanism === 'laplace'
        ? computed.sensitivity / epsilon
        : (computed.sensitivity * Math.sqrt(2 * Math.log(1.25 / delta))) / epsilon;
      const draw = (): number => (mechanism === 'laplace' ? rng.laplace(noiseScale) : rng.gaussian(noiseScale));

      let noisyValue: number;
      let bins: HistogramBin[] | undefined;

      if (computed.bins) {
        bins = computed.bins.map((bin) => ({
          label: bin.label,
          trueCount: bin.count,
          noisyCount: Math.max(0, bin.count + draw()),
        }));
        noisyValue = bins.reduce((acc, b) => acc + b.noisyCount, 0);
      } else {
        noisyValue = this.postProcess(query, computed.trueValue + draw());
      }

      const result: QueryResult = {
        queryType: query.type,
        trueValue: computed.trueValue,
        noisyValue,
        epsilonSpent: epsilon,
        deltaSpent: delta,
        sensitivity: computed.sensitivity,
        noiseScale,
        mechanism,
        seed: seed.value,
        deterministicSeedUsed: seed.deterministic,
        budgetRemaining: ledger.remaining(),
        ...(bins ? { bins } : {}),
      };

      this.log.info(
        {
          queryType: query.type,
          mechanism,
          epsilon,
          delta,
          budgetRemaining: result.budgetRemaining,
          deterministicSeed: seed.deterministic,
        },
        'DP query executed',
      );

      return result;
    });
  }

  /**
   * Strip the true value, the seed and true bin counts before a result
   * leaves the process.
   */
  publishable(result: QueryResult): PublishableResult {
    const { trueValue: _trueValue, seed: _seed, bins, ...rest } = result;
    return bins
      ? { ...rest, bins: bins.map(({ label, noisyCount }) => ({ label, noisyCount })) }
      : rest;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private queryIssues(query: DPQuery, epsilon: number, mechanism: Mechanism, delta: number): Issue[] {
    const issues = epsilonIssues('/epsilon', epsilon);
    if (mechanism === 'gaussian') issues.push(...deltaIssues('/delta', delta));

    switch (query.type) {
      case 'count':
        break;
      case 'sum': {
        const bound = query.bound ?? this.sumBound;
        if (!query.field) issues.push({ path: '/field', message: 'field is required' });
        if (!Number.isFinite(bound) || bound <= 0) {
          issues.push({ path: '/bound', message: `must be > 0, got ${bound}` });
        }
        break;
      }
      case 'mean': {
        const [lo, hi] = query.bounds;
        if (!query.field) issues.push({ path: '/field', message: 'field is required' });
        if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo >= hi) {
          issues.push({ path: '/bounds', message: 'bounds must be finite with lo < hi' });
        }
        break;
      }
      case 'histogram': {
        if (!query.field) issues.push({ path: '/field', message: 'field is required' });
        if ('edges' in query.bins) {
          if (query.bins.edges.length < 2 || !isIncreasing(query.bins.edges)) {
            issues.push({ path: '/bins/edges', message: 'need at least two strictly increasing edges' });
          }
        } else if (query.bins.categories.length === 0) {
          issues.push({ path: '/bins/categories', message: 'need at least one category' });
        } else if (new Set(query.bins.categories).size !== query.bins.categories.length) {
          issues.push({ path: '/bins/categories', message: 'categories must be unique' });
        }
        break;
      }
    }
    return issues;
  }

  private seedFor(query: DPQuery, explicit: string | undefined): { value: string; deterministic: boolean } {
    if (explicit !== undefined) return { value: explicit, deterministic: true };
    if (this.reproducible && this.salt) {
      return { value: this.salt.keyedHash('dp', queryFingerprint(query)), deterministic: true };
    }
    return { value: randomBytes(32).toString('hex'), deterministic: false };
  }

  private compute(
    records: readonly DataRecord[],
    query: DPQuery,
  ): { trueValue: number; sensitivity: number; bins?: Array<{ label: string; count: number }> } {
    switch (query.type) {
      case 'count':
        return { trueValue: records.length, sensitivity: 1 };

      case 'sum': {
        const bound = query.bound ?? this.sumBound;
        const total = numericValues(records, query.field).reduce((acc, v) => acc + clamp(v, -bound, bound), 0);
        return { trueValue: total, sensitivity: bound };
      }

      case 'mean': {
        const [lo, hi] = query.bounds;
        const values = numericValues(records, query.field).map((v) => clamp(v, lo, hi));
        const n = values.length;
        // No data: report the midpoint of the bounds
        const mean = n === 0 ? (lo + hi) / 2 : values.reduce((acc, v) => acc + v, 0) / n;
        return { trueValue: mean, sensitivity: (hi - lo) / Math.max(n, 1) };
      }

      case 'histogram': {
        const bins = histogramCounts(records, query.field, query.bins);
        return {
          trueValue: bins.reduce((acc, b) => acc + b.count, 0),
          sensitivity: 1,
          bins,
        };
      }
    }
  }

  private postProcess(query: DPQuery, value: number): number {
    switch (query.type) {
      case 'count':
        return Math.max(0, value);
      case 'mean':
        return clamp(value, query.bounds[0], query.bounds[1]);
      default:
        return value;
    }
  }
}

/**
 * True per-bin counts. Numeric bins are [e_i, e_i+1), the last one
 * closed; values outside every bin are ignored.
 */
export function histogramCounts(
  records: readonly DataRecord[],
  field: string,
  bins: HistogramBins,
): Array<{ label: string; count: number }> {
  if ('categories' in bins) {
    const counts = new Map(bins.categories.map((c) => [c, 0]));
    for (const record of records) {
      const value = record[field];
      if (value === undefined || value === null) continue;
      const key = String(value);
      const current = counts.get(key);
      if (current !== undefined) counts.set(key, current + 1);
    }
    // One bin per distinct category
    return [...counts].map(([label, count]) => ({ label, count }));
  }

  const { edges } = bins;
  const result = edges.slice(0, -1).map((lo, i) => {
    const hi = edges[i + 1];
    const last = i === edges.length - 2;
    return { label: `[${lo}, ${hi}${last ? ']' : ')'}`, lo, hi, last, count: 0 };
  });

  for (const value of numericValues(records, field)) {
    const bin = result.find((b) => value >= b.lo && (value < b.hi || (b.last && value === b.hi)));
    if (bin) bin.count++;
  }

  return result.map(({ label, count }) => ({ label, count }));
}
