/**
 * @veil/privacy - Privacy budget ledger
 *
 * Sequential composition: spent epsilon is the sum over every accepted
 * query and never exceeds maxEpsilon. At most one delta is accounted per
 * session; later approximate-DP queries must fit under it.
 *
 * All mutation happens inside `exclusive()`, which serializes executions
 * sharing this budget.
 */

import {
  BudgetExceeded,
  ConfigurationError,
  Mutex,
  epsilonIssues,
  deltaIssues,
  type BudgetSnapshot,
} from '@veil/core';

// Tolerance for float accumulation (0.1 + 0.2 style drift)
const EPSILON_SLACK = 1e-12;

export interface PrivacyBudgetOptions {
  maxEpsilon: number;
  maxDelta: number;
}

/** Handle passed to `exclusive()` callbacks. Only valid inside the lock. */
export interface BudgetLedger {
  /**
   * Deduct (epsilon, delta). Throws BudgetExceeded and leaves the budget
   * untouched when the request does not fit.
   */
  charge(epsilon: number, delta: number): void;
  remaining(): number;
}

export class PrivacyBudget {
  readonly maxEpsilon: number;
  readonly maxDelta: number;

  private spent = 0;
  private delta = 0;
  private count = 0;
  private readonly mutex = new Mutex();

  constructor(options: PrivacyBudgetOptions) {
    const issues = [
      ...epsilonIssues('/maxEpsilon', options.maxEpsilon),
      ...deltaIssues('/maxDelta', options.maxDelta),
    ];
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid privacy budget', issues);
    }
    this.maxEpsilon = options.maxEpsilon;
    this.maxDelta = options.maxDelta;
  }

  get spentEpsilon(): number {
    return this.spent;
  }

  get accountedDelta(): number {
    return this.delta;
  }

  get remainingEpsilon(): number {
    return Math.max(0, this.maxEpsilon - this.spent);
  }

  get queries(): number {
    return this.count;
  }

  /**
   * Run `fn` with exclusive access to the ledger.
   */
  exclusive<T>(fn: (ledger: BudgetLedger) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => {
      let open = true;
      const ledger: BudgetLedger = {
        charge: (epsilon, delta) => {
          if (!open) throw new Error('Budget ledger used outside its exclusive section');
          this.charge(epsilon, delta);
        },
        remaining: () => this.remainingEpsilon,
      };
      return Promise.resolve()
        .then(() => fn(ledger))
        .finally(() => {
          open = false;
        });
    });
  }

  /** Clear all spending. Starts a new budget session. */
  reset(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.spent = 0;
      this.delta = 0;
      this.count = 0;
    });
  }

  snapshot(): BudgetSnapshot {
    return {
      maxEpsilon: this.maxEpsilon,
      maxDelta: this.maxDelta,
      spentEpsilon: this.spent,
      accountedDelta: this.delta,
      queries: this.count,
    };
  }

  private charge(epsilon: number, delta: number): void {
    if (this.spent + epsilon > this.maxEpsilon + EPSILON_SLACK) {
      throw new BudgetExceeded(
        `Query needs epsilon ${epsilon} but only ${this.remainingEpsilon} of ${this.maxEpsilon} remains`,
        epsilon,
        this.spent,
        this.maxEpsilon,
      );
    }

    let nextDelta = this.delta;
    if (delta > 0) {
      if (this.delta === 0) {
        if (delta > this.maxDelta) {
          throw new BudgetExceeded(
            `Query needs delta ${delta} but the session allows at most ${this.maxDelta}`,
            epsilon,
            this.spent,
            this.maxEpsilon,
          );
        }
        nextDelta = delta;
      } else if (delta > this.delta) {
        throw new BudgetExceeded(
          `Session already accounts delta ${this.delta}; query requested ${delta}`,
          epsilon,
          this.spent,
          this.maxEpsilon,
        );
      }
    }

    // Clamp accumulation drift at the cap
    this.spent = Math.min(this.maxEpsilon, this.spent + epsilon);
    this.delta = nextDelta;
    this.count++;
  }
}
