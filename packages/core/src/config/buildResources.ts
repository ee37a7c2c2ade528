import type { ResourceEntry } from '@provision/types';
import { ConfigError } from '../errors/ProvisionError.js';
import { ResourceRegistry } from '../core/ResourceRegistry.js';
import type { PluginEnvironment } from '../plugins/ResourcePlugin.js';
import { BUILTIN_RESOURCES, type ResourceFactory } from '../plugins/builtinResources.js';

/**
 * Turn config entries into the descriptor registry for one run.
 *
 * @throws ConfigError on unknown types, invalid plugin options or duplicate ids
 */
export function buildResources(
  entries: readonly ResourceEntry[],
  env: PluginEnvironment,
  factories: Readonly<Record<string, ResourceFactory>> = BUILTIN_RESOURCES
): ResourceRegistry {
  const registry = new ResourceRegistry();

  for (const entry of entries) {
    const factory = Object.hasOwn(factories, entry.type) ? factories[entry.type] : undefined;
    if (!factory) {
      throw new ConfigError(
        `Config error: unknown resource type "${entry.type}"${entry.id ? ` (resource "${entry.id}")` : ''}`,
        'ERR_UNKNOWN_RESOURCE_TYPE',
        { resourceId: entry.id, resourceType: entry.type },
        `Known types: ${Object.keys(factories).join(', ')}`
      );
    }
    registry.register(factory(entry, env).toDescriptor());
  }

  return registry;
}
