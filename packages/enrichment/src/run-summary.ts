/**
 * @veil/enrichment - Run summary
 *
 * Aggregates outcome counts, coverage, escalations, quarantine writes and the
 * privacy budget into the run-level artifact consumed by reporting.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BudgetSnapshot, RunSummary } from '@veil/core';
import type { FragmentOutcome } from './orchestrator.js';

export interface RunSummaryOptions {
  runId: string;
  clock?: () => Date;
}

export class RunSummaryCollector {
  readonly runId: string;
  private readonly clock: () => Date;
  private readonly startedAt: string;

  private fragmentsTotal = 0;
  private emitted = 0;
  private quarantined = 0;
  private quarantineEntries = 0;
  private hardfails = 0;
  private canceled = 0;
  private readonly coverages: number[] = [];
  private attempted = 0;
  private succeeded = 0;
  private readonly byReason: Record<string, number> = {};
  private budget: BudgetSnapshot | null = null;

  constructor(options: RunSummaryOptions) {
    this.runId = options.runId;
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock().toISOString();
  }

  record(outcome: FragmentOutcome): void {
    this.fragmentsTotal++;

    switch (outcome.status) {
      case 'emitted':
        this.emitted++;
        break;
      case 'quarantined':
        this.quarantined++;
        this.quarantineEntries++;
        break;
      case 'hardfail':
        this.hardfails++;
        break;
      case 'canceled':
        this.canceled++;
        break;
    }

    // Hard-failed fragments produce no redacted text, so no coverage
    if (outcome.status !== 'hardfail' && outcome.report) {
      this.coverages.push(outcome.report.coverage);
    }

    if (outcome.escalation) {
      const { reason, attempted, succeeded } = outcome.escalation;
      this.byReason[reason] = (this.byReason[reason] ?? 0) + 1;
      if (attempted) this.attempted++;
      if (succeeded) this.succeeded++;
      // Rejected remote answers are quarantined even when the local record is emitted
      if (outcome.escalation.quarantined) this.quarantineEntries++;
    } else if (outcome.status === 'hardfail') {
      this.byReason.hardfail = (this.byReason.hardfail ?? 0) + 1;
    }
  }

  recordAll(outcomes: readonly FragmentOutcome[]): void {
    for (const outcome of outcomes) this.record(outcome);
  }

  setBudget(snapshot: BudgetSnapshot | null): void {
    this.budget = snapshot ? { ...snapshot } : null;
  }

  toJSON(): RunSummary {
    const n = this.coverages.length;
    return {
      runId: this.runId,
      startedAt: this.startedAt,
      finishedAt: this.clock().toISOString(),
      fragmentsTotal: this.fragmentsTotal,
      emitted: this.emitted,
      quarantined: this.quarantined,
      quarantineEntries: this.quarantineEntries,
      hardfails: this.hardfails,
      canceled: this.canceled,
      coverage: {
        min: n === 0 ? 0 : Math.min(...this.coverages),
        max: n === 0 ? 0 : Math.max(...this.coverages),
        mean: n === 0 ? 0 : this.coverages.reduce((a, b) => a + b, 0) / n,
      },
      escalations: {
        attempted: this.attempted,
        succeeded: this.succeeded,
        byReason: { ...this.byReason },
      },
      budget: this.budget ? { ...this.budget } : null,
    };
  }

  /** Write the summary as pretty JSON. */
  async write(path: string): Promise<RunSummary> {
    const summary = this.toJSON();
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(summary, null, 2) + '\n', 'utf-8');
    return summary;
  }
}
