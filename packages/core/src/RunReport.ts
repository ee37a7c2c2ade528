/**
 * RunReport - read-only summary of one reconciliation pass
 *
 * Holds one outcome per resource, in traversal order. Frozen on construction.
 * The CLI layer formats it; the core only guarantees the outcome fields.
 */

import type { OutcomeStatus, ReconciliationOutcome, ResourceId } from '@provision/types';

export type OutcomeCounts = Record<OutcomeStatus, number>;

/**
 * Collapse action + result into the display category.
 */
export function outcomeStatus(outcome: ReconciliationOutcome): OutcomeStatus {
  switch (outcome.result) {
    case 'failed':
      return 'failed';
    case 'skippedDependencyFailed':
    case 'skippedExcluded':
      return 'skipped';
    case 'success':
      if (outcome.action === 'applied') return 'converged';
      if (outcome.action === 'planned') return 'planned';
      return 'unchanged';
  }
}

export class RunReport {
  readonly outcomes: readonly ReconciliationOutcome[];
  readonly dryRun: boolean;

  constructor(outcomes: readonly ReconciliationOutcome[], options: { dryRun?: boolean } = {}) {
    this.outcomes = Object.freeze(outcomes.map(outcome => Object.freeze({ ...outcome })));
    this.dryRun = options.dryRun ?? false;
    Object.freeze(this);
  }

  /**
   * True when nothing failed and nothing was skipped because of a failure.
   * Resources excluded on purpose (user-only mode) do not count against the run.
   */
  get overallSuccess(): boolean {
    return this.outcomes.every(o => o.result === 'success' || o.result === 'skippedExcluded');
  }

  counts(): OutcomeCounts {
    const counts: OutcomeCounts = { unchanged: 0, converged: 0, planned: 0, failed: 0, skipped: 0 };
    for (const outcome of this.outcomes) {
      counts[outcomeStatus(outcome)]++;
    }
    return counts;
  }

  get(resourceId: ResourceId): ReconciliationOutcome | undefined {
    return this.outcomes.find(o => o.resourceId === resourceId);
  }

  failures(): ReconciliationOutcome[] {
    return this.outcomes.filter(o => o.result === 'failed');
  }

  /**
   * Failures plus dependency skips: everything that keeps the run from succeeding.
   */
  problems(): ReconciliationOutcome[] {
    return this.outcomes.filter(o => o.result === 'failed' || o.result === 'skippedDependencyFailed');
  }
}
