/**
 * List command - Show resources in the order they would be reconciled
 */

import { Command } from 'commander';
import {
  buildResources,
  collectPrerequisites,
  describeState,
  detectPrivilegeContext,
  loadConfig,
  orderResources,
  ProvisionError,
} from '@provision/core';
import type { ResourceRegistry } from '@provision/core';
import type { PrivilegeContext } from '@provision/types';
import { describeFatalError, exitWithError } from '../utils/errorFormatter.js';

export interface ListedResource {
  position: number;
  id: string;
  type: string;
  privilege: string;
  desired: string;
  dependsOn: string[];
  /** Transitive prerequisites, nearest first */
  prerequisites: string[];
}

export function listResources(registry: ResourceRegistry): ListedResource[] {
  return orderResources(registry).map((descriptor, i) => ({
    position: i + 1,
    id: descriptor.id,
    type: descriptor.type,
    privilege: descriptor.requiredPrivilege,
    desired: describeState(descriptor.desired),
    dependsOn: [...descriptor.dependsOn],
    prerequisites: collectPrerequisites(registry, descriptor.id),
  }));
}

export function formatResourceList(resources: readonly ListedResource[]): string {
  const idWidth = Math.max(0, ...resources.map(r => r.id.length));
  const typeWidth = Math.max(0, ...resources.map(r => r.type.length));
  const numberWidth = String(resources.length).length;

  return resources
    .map(r => {
      const after = r.dependsOn.length > 0 ? `  after ${r.dependsOn.join(', ')}` : '';
      return `${String(r.position).padStart(numberWidth)}. ${r.id.padEnd(idWidth)}  ${r.type.padEnd(typeWidth)}  ${r.privilege.padEnd(4)}  ${r.desired}${after}`.trimEnd();
    })
    .join('\n');
}

export const listCommand = new Command('list')
  .description('Show resources in reconciliation order')
  .option('-c, --config <path>', 'Config file (default: ./provision.yaml, else built-in defaults)')
  .option('-j, --json', 'Output as JSON')
  .action((options: { config?: string; json?: boolean }) => {
    const privilege: PrivilegeContext = detectPrivilegeContext();
    try {
      const loaded = loadConfig({ configPath: options.config });
      const registry = buildResources(loaded.config.resources, { home: privilege.home, configDir: loaded.configDir });
      const resources = listResources(registry);
      console.log(options.json ? JSON.stringify(resources, null, 2) : formatResourceList(resources));
    } catch (err) {
      if (!(err instanceof ProvisionError)) throw err;
      const { title, nextSteps } = describeFatalError(err);
      exitWithError(title, nextSteps);
    }
  });
