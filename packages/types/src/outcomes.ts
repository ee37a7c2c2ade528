/**
 * Reconciliation outcome types
 */

import type { ObservedState, ResourceId, StateValue } from './resources.js';

export type ReconciliationAction = 'none' | 'applied' | 'planned';

export type ReconciliationResult =
  | 'success'
  | 'failed'
  | 'skippedDependencyFailed'
  | 'skippedExcluded';

export type FailureReason =
  | 'InsufficientPrivilege'
  | 'ProbeError'
  | 'ApplyError'
  | 'VerificationFailed';

export type SkipReason =
  | 'SkippedDependencyFailed'
  | 'UserOnly'
  | 'DependencyExcluded'
  | 'RunHalted';

export type OutcomeReason = FailureReason | SkipReason;

/**
 * Display category derived from action + result.
 *
 * unchanged: already correct; converged: fixed; planned: would be fixed (dry run);
 * failed: attempted and failed; skipped: not attempted.
 */
export type OutcomeStatus = 'unchanged' | 'converged' | 'planned' | 'failed' | 'skipped';

/**
 * Result of reconciling one resource.
 *
 * startState/endState are absent when the resource was never probed
 * (skipped, or gated by privilege).
 */
export interface ReconciliationOutcome {
  resourceId: ResourceId;
  type: string;
  startState?: ObservedState;
  endState?: ObservedState;
  /** State handed to the applier, or that would be in a dry run */
  target?: StateValue;
  action: ReconciliationAction;
  result: ReconciliationResult;
  reason?: OutcomeReason;
  /** Underlying error message (tool stderr, verification mismatch) */
  error?: string;
  /** Next step for the operator, when the failing plugin knows one */
  hint?: string;
  /** Prerequisite that caused a skip */
  blockedBy?: ResourceId;
  durationMs: number;
}
