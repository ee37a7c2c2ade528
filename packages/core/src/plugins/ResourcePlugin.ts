/**
 * Base ResourcePlugin class
 *
 * PLUGIN CONTRACT:
 *
 * 1. Metadata - type, default id, privilege, comparison mode, default desired state
 * 2. probe()  - read-only, returns the observed state or UNKNOWN
 * 3. apply()  - idempotent change toward the target state
 *
 * A plugin instance is built from one configuration entry and acts as both
 * the probe and the applier of the descriptor it produces.
 */

import type {
  ApplyContext,
  ObservedState,
  Privilege,
  ResourceApplier,
  ResourceContext,
  ResourceDescriptor,
  ResourceEntry,
  ResourceProbe,
  StateComparison,
  StateValue,
} from '@provision/types';
import { ConfigError } from '../errors/ProvisionError.js';
import { expandHome } from '../core/privilege.js';

export interface ResourcePluginMetadata<S extends StateValue> {
  type: string;
  /** Id used when the configuration entry does not set one */
  defaultId: string;
  privilege: Privilege;
  comparison: StateComparison;
  defaultDesired: S;
}

/**
 * Build-time environment for plugin factories.
 */
export interface PluginEnvironment {
  /** Real user's home, for `~/` in paths */
  home: string;
  /** Directory of the configuration file, for relative paths */
  configDir: string;
}

export abstract class ResourcePlugin<S extends StateValue> implements ResourceProbe<S>, ResourceApplier<S> {
  protected readonly entry: ResourceEntry;
  protected readonly env: PluginEnvironment;

  constructor(entry: ResourceEntry, env: PluginEnvironment) {
    this.entry = entry;
    this.env = env;
  }

  abstract get metadata(): ResourcePluginMetadata<S>;

  abstract probe(context: ResourceContext): Promise<ObservedState<S>>;

  abstract apply(target: S, context: ApplyContext<S>): Promise<void>;

  /**
   * Validate a desired state from configuration.
   * Throw via this.invalid() when the value is outside the plugin's domain.
   */
  protected abstract parseDesired(value: unknown): S;

  get id(): string {
    return this.entry.id ?? this.metadata.defaultId;
  }

  toDescriptor(): ResourceDescriptor<S> {
    const meta = this.metadata;
    return Object.freeze({
      id: this.id,
      type: meta.type,
      desired: this.entry.desired === undefined ? meta.defaultDesired : this.parseDesired(this.entry.desired),
      probe: this,
      applier: this,
      requiredPrivilege: this.entry.privilege ?? meta.privilege,
      dependsOn: Object.freeze([...(this.entry.dependsOn ?? [])]),
      comparison: meta.comparison,
    });
  }

  protected invalid(message: string): ConfigError {
    return new ConfigError(
      `Config error: resource "${this.entry.id ?? this.entry.type}": ${message}`,
      'ERR_CONFIG_INVALID',
      { resourceId: this.entry.id, resourceType: this.entry.type }
    );
  }

  protected stringOption(name: string, fallback?: string): string {
    const value = this.entry.options?.[name];
    if (value === undefined && fallback !== undefined) return fallback;
    if (typeof value !== 'string' || !value.trim()) {
      throw this.invalid(`options.${name} must be a non-empty string`);
    }
    return value;
  }

  protected stringListOption(name: string, fallback?: readonly string[]): string[] {
    const value = this.entry.options?.[name];
    if (value === undefined && fallback !== undefined) return [...fallback];
    if (!Array.isArray(value) || value.length === 0 || !value.every(isNonEmptyString)) {
      throw this.invalid(`options.${name} must be a non-empty list of strings`);
    }
    return value;
  }

  /** Path option with `~/` expanded against the real user's home. */
  protected pathOption(name: string, fallback?: string): string {
    return expandHome(this.stringOption(name, fallback), this.env.home);
  }

  protected parseEnum<T extends string>(value: unknown, allowed: readonly T[]): T {
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      throw this.invalid(`desired must be one of ${allowed.map(v => `"${v}"`).join(', ')}, got ${JSON.stringify(value)}`);
    }
    return match;
  }

  protected parseStringList(value: unknown): string[] {
    if (!Array.isArray(value) || !value.every(isNonEmptyString)) {
      throw this.invalid('desired must be a list of non-empty strings');
    }
    // Repeats would never match the deduplicated plan target
    return [...new Set(value.map(entry => expandHome(entry, this.env.home)))];
  }
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
