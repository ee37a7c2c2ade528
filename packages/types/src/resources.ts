/**
 * Resource model — the contract between the reconciliation engine and plugins.
 *
 * A resource is one externally observable configuration facility (a daemon
 * registration, a firewall flag, a DNS server list). The engine only ever sees
 * it through a ResourceDescriptor: a probe that reads state, an applier that
 * changes it, and static metadata (privilege, dependencies, comparison mode).
 */

import type { Logger } from './logging.js';
import type { CommandRunner } from './commands.js';

/**
 * Stable key identifying a managed facility.
 * Convention: 'facility' or 'facility:qualifier' (e.g. 'dns-magicdns:Wi-Fi').
 */
export type ResourceId = string;

export type Privilege = 'user' | 'root';

/**
 * Value domain shared by desired and observed state.
 * Scalars cover flags and enums ('on', 'installed', 0); lists cover
 * DNS servers and firewall exceptions.
 */
export type StateValue = boolean | number | string | readonly string[];

/**
 * Sentinel returned by a probe that ran but could not determine the state.
 * Distinct from "state differs".
 */
export const UNKNOWN: unique symbol = Symbol('provision.unknown');
export type Unknown = typeof UNKNOWN;

export type ObservedState<S extends StateValue = StateValue> = S | Unknown;

/**
 * How observed state is compared with desired state.
 *
 * - exact:    values are equal (lists element by element)
 * - contains: every desired entry is present in the observed list, any position
 * - prefix:   the observed list starts with the desired entries, in order
 *
 * List comparisons are add-only: entries the configuration does not mention
 * are never removed.
 */
export type StateComparison = 'exact' | 'contains' | 'prefix';

/**
 * Who is running and whether root-level operations are possible.
 */
export interface PrivilegeContext {
  /** Effective user id (-1 where the platform has none) */
  uid: number;
  /** Real user name; under sudo this is SUDO_USER, not root */
  user: string;
  /** Real user's home directory */
  home: string;
  /** True when the process can perform root-level operations */
  elevated: boolean;
}

/**
 * Bounded wait-for-readiness policy: fixed attempt count, fixed delay.
 */
export interface ReadinessPolicy {
  attempts: number;
  intervalMs: number;
}

/**
 * Context handed to every probe and applier call.
 */
export interface ResourceContext {
  logger: Logger;
  runner: CommandRunner;
  privilege: PrivilegeContext;
  readiness: ReadinessPolicy;
}

/**
 * Apply-time context: adds the state observed just before applying.
 */
export interface ApplyContext<S extends StateValue = StateValue> extends ResourceContext {
  observed: S;
}

/**
 * Read-only query of a resource's current state.
 * Must be side-effect-free and safe to call repeatedly.
 * Throws (ProbeError or CommandError) when the query itself fails.
 */
export interface ResourceProbe<S extends StateValue = StateValue> {
  probe(context: ResourceContext): Promise<ObservedState<S>>;
}

/**
 * Changes a resource toward the target state.
 * Must be idempotent: applying an already converged target is harmless.
 * Throws (ApplyError or CommandError) on failure.
 */
export interface ResourceApplier<S extends StateValue = StateValue> {
  apply(target: S, context: ApplyContext<S>): Promise<void>;
}

/**
 * Static description of one managed resource. Never mutated during a run.
 */
export interface ResourceDescriptor<S extends StateValue = StateValue> {
  readonly id: ResourceId;
  /** Plugin type that produced this descriptor (e.g. 'firewall-state') */
  readonly type: string;
  readonly desired: S;
  readonly probe: ResourceProbe<S>;
  readonly applier: ResourceApplier<S>;
  readonly requiredPrivilege: Privilege;
  readonly dependsOn: readonly ResourceId[];
  readonly comparison: StateComparison;
}
