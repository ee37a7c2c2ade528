/**
 * Reconciler - the state-reconciliation engine
 *
 * Walks resources in dependency order, one at a time:
 *
 *   prerequisites ok? -> privilege ok? -> probe -> diff -> apply -> re-probe
 *
 * Configuration errors (cycle, unknown dependency, duplicate id) are thrown
 * before the first probe. Everything that goes wrong with an individual
 * resource is recorded in its outcome instead of thrown, and its dependents
 * are skipped, so the run always reports on every independent branch.
 *
 * A converged resource never reaches its applier. Every run probes live state;
 * nothing is cached between runs.
 */

import { UNKNOWN } from '@provision/types';
import type {
  CommandRunner,
  Logger,
  ObservedState,
  OutcomeStatus,
  PrivilegeContext,
  ReadinessPolicy,
  ReconciliationOutcome,
  ResourceContext,
  ResourceDescriptor,
  ResourceId,
} from '@provision/types';
import { orderResources } from './core/orderResources.js';
import type { ResourceRegistry } from './core/ResourceRegistry.js';
import { describeState, planTarget, statesMatch } from './core/stateDiff.js';
import { DEFAULT_READINESS } from './core/readiness.js';
import { errorMessage, ProvisionError } from './errors/ProvisionError.js';
import { createLogger } from './logging/Logger.js';
import { RunReport, outcomeStatus } from './RunReport.js';

/**
 * Progress callback info
 */
export interface ProgressInfo {
  phase: 'start' | 'done';
  resourceId: ResourceId;
  index: number;
  total: number;
  /** Set when phase is 'done' */
  status?: OutcomeStatus;
}

export type ProgressCallback = (info: ProgressInfo) => void;

export interface ReconcilerOptions {
  runner: CommandRunner;
  privilege: PrivilegeContext;
  logger?: Logger;
  readiness?: ReadinessPolicy;
  /** Probe and diff only; record 'planned' instead of applying */
  dryRun?: boolean;
  /** Exclude root-level resources (and root-level dependents) instead of failing them */
  userOnly?: boolean;
  /** Stop scheduling further resources after the first failure */
  stopOnFailure?: boolean;
  onProgress?: ProgressCallback;
}

type OutcomeDraft = Omit<ReconciliationOutcome, 'resourceId' | 'type' | 'durationMs'>;

export class Reconciler {
  private readonly logger: Logger;
  private readonly context: ResourceContext;

  constructor(private readonly options: ReconcilerOptions) {
    this.logger = options.logger ?? createLogger('silent');
    this.context = {
      logger: this.logger,
      runner: options.runner,
      privilege: options.privilege,
      readiness: options.readiness ?? DEFAULT_READINESS,
    };
  }

  /**
   * Run one reconciliation pass.
   *
   * @throws ConfigError if the descriptor set cannot be ordered
   */
  async run(resources: ResourceRegistry | Iterable<ResourceDescriptor>): Promise<RunReport> {
    const ordered = orderResources(resources);
    const { dryRun = false, userOnly = false, stopOnFailure = false, onProgress } = this.options;

    this.logger.info('Reconciliation started', {
      resources: ordered.length,
      dryRun,
      userOnly,
      elevated: this.options.privilege.elevated,
    });

    const byId = new Map<ResourceId, ReconciliationOutcome>();
    const outcomes: ReconciliationOutcome[] = [];
    let halted = false;

    for (const [index, descriptor] of ordered.entries()) {
      onProgress?.({ phase: 'start', resourceId: descriptor.id, index, total: ordered.length });
      const startedAt = Date.now();

      const draft: OutcomeDraft = halted
        ? { action: 'none', result: 'skippedExcluded', reason: 'RunHalted' }
        : await this.reconcile(descriptor, byId);

      const outcome: ReconciliationOutcome = {
        resourceId: descriptor.id,
        type: descriptor.type,
        ...draft,
        durationMs: Date.now() - startedAt,
      };
      byId.set(outcome.resourceId, outcome);
      outcomes.push(outcome);

      const status = outcomeStatus(outcome);
      this.logOutcome(outcome, status);
      onProgress?.({ phase: 'done', resourceId: descriptor.id, index, total: ordered.length, status });

      if (outcome.result === 'failed' && stopOnFailure && !halted) {
        halted = true;
        this.logger.warn('Stopping run after failure', { resource: outcome.resourceId });
      }
    }

    const report = new RunReport(outcomes, { dryRun });
    this.logger.info('Reconciliation finished', { ...report.counts(), success: report.overallSuccess });
    return report;
  }

  /**
   * Per-resource protocol. Never throws for resource-level problems.
   */
  private async reconcile(
    descriptor: ResourceDescriptor,
    prior: ReadonlyMap<ResourceId, ReconciliationOutcome>
  ): Promise<OutcomeDraft> {
    const blocked = this.checkPrerequisites(descriptor, prior);
    if (blocked) return blocked;

    const { privilege, userOnly = false, dryRun = false } = this.options;
    if (descriptor.requiredPrivilege === 'root' && !privilege.elevated) {
      if (userOnly) {
        return { action: 'none', result: 'skippedExcluded', reason: 'UserOnly' };
      }
      return {
        action: 'none',
        result: 'failed',
        reason: 'InsufficientPrivilege',
        error: `Requires root privileges (running as ${privilege.user || `uid ${privilege.uid}`})`,
      };
    }

    if (dryRun) {
      // A prerequisite that is only planned does not exist yet; probing on top of it says nothing
      const pending = descriptor.dependsOn.find(dep => prior.get(dep)?.action === 'planned');
      if (pending) {
        return { action: 'planned', result: 'success', blockedBy: pending };
      }
    }

    const log = this.logger;
    log.debug('Probing', { resource: descriptor.id });

    let startState: ObservedState;
    try {
      startState = await descriptor.probe.probe(this.context);
    } catch (error) {
      return { action: 'none', result: 'failed', reason: 'ProbeError', ...describeError(error) };
    }
    if (startState === UNKNOWN) {
      return {
        startState,
        action: 'none',
        result: 'failed',
        reason: 'ProbeError',
        error: 'Current state could not be determined',
      };
    }

    if (statesMatch(startState, descriptor.desired, descriptor.comparison)) {
      return { startState, endState: startState, action: 'none', result: 'success' };
    }

    const target = planTarget(startState, descriptor.desired, descriptor.comparison);
    if (dryRun) {
      log.debug('Would apply', { resource: descriptor.id, from: describeState(startState), to: describeState(target) });
      return { startState, endState: startState, target, action: 'planned', result: 'success' };
    }

    log.info('Applying', { resource: descriptor.id, from: describeState(startState), to: describeState(target) });
    try {
      await descriptor.applier.apply(target, { ...this.context, observed: startState });
    } catch (error) {
      return { startState, target, action: 'applied', result: 'failed', reason: 'ApplyError', ...describeError(error) };
    }

    // The tool saying "done" is not proof; read the state back
    let endState: ObservedState;
    try {
      endState = await descriptor.probe.probe(this.context);
    } catch (error) {
      return {
        startState,
        target,
        action: 'applied',
        result: 'failed',
        reason: 'VerificationFailed',
        error: `Re-probe failed: ${errorMessage(error)}`,
      };
    }

    if (!statesMatch(endState, descriptor.desired, descriptor.comparison)) {
      return {
        startState,
        endState,
        target,
        action: 'applied',
        result: 'failed',
        reason: 'VerificationFailed',
        error: `Expected ${describeState(descriptor.desired)} after apply, observed ${describeState(endState)}`,
      };
    }

    return { startState, endState, target, action: 'applied', result: 'success' };
  }

  /**
   * A failed prerequisite blocks with skippedDependencyFailed. An excluded one
   * propagates the exclusion only to root-level dependents; a user-level
   * dependent is reconciled against whatever the live state already is.
   * Failure wins when both apply.
   */
  private checkPrerequisites(
    descriptor: ResourceDescriptor,
    prior: ReadonlyMap<ResourceId, ReconciliationOutcome>
  ): OutcomeDraft | null {
    let excludedBy: ResourceId | undefined;

    for (const dep of descriptor.dependsOn) {
      const outcome = prior.get(dep);
      if (!outcome) continue;
      if (outcome.result === 'failed' || outcome.result === 'skippedDependencyFailed') {
        return { action: 'none', result: 'skippedDependencyFailed', reason: 'SkippedDependencyFailed', blockedBy: dep };
      }
      if (outcome.result === 'skippedExcluded' && excludedBy === undefined) {
        excludedBy = dep;
      }
    }

    if (excludedBy !== undefined && descriptor.requiredPrivilege === 'root') {
      return { action: 'none', result: 'skippedExcluded', reason: 'DependencyExcluded', blockedBy: excludedBy };
    }
    return null;
  }

  private logOutcome(outcome: ReconciliationOutcome, status: OutcomeStatus): void {
    const context: Record<string, unknown> = { resource: outcome.resourceId, status };
    if (outcome.reason) context.reason = outcome.reason;
    if (outcome.blockedBy) context.blockedBy = outcome.blockedBy;
    if (outcome.error) context.error = outcome.error;
    if (outcome.hint) context.hint = outcome.hint;

    if (status === 'failed') {
      this.logger.error('Resource failed', context);
    } else if (status === 'skipped') {
      this.logger.warn('Resource skipped', context);
    } else {
      this.logger.info(`Resource ${status}`, context);
    }
  }
}

function describeError(error: unknown): Pick<OutcomeDraft, 'error' | 'hint'> {
  if (error instanceof ProvisionError && error.suggestion) {
    return { error: error.message, hint: error.suggestion };
  }
  return { error: errorMessage(error) };
}
