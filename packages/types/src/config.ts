/**
 * Configuration entry types
 */

import type { Privilege, ResourceId } from './resources.js';

/**
 * One resource declaration as written in the configuration file.
 * Plugin factories turn entries into ResourceDescriptors.
 */
export interface ResourceEntry {
  /** Resource id; plugins derive a default from their options when omitted */
  id?: ResourceId;
  /** Built-in plugin type (e.g. 'brew-formula', 'firewall-stealth') */
  type: string;
  /** Desired state; plugins fall back to their default when omitted */
  desired?: unknown;
  dependsOn?: ResourceId[];
  /** Overrides the plugin's default privilege requirement */
  privilege?: Privilege;
  /** Plugin-specific options, validated by the plugin factory */
  options?: Record<string, unknown>;
}
