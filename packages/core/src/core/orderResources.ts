/**
 * Dependency graph builder for resource descriptors.
 *
 * Produces a total order in which every resource appears strictly after
 * everything in its dependsOn list. Resources without an ordering constraint
 * keep their declaration order.
 */

import type { ResourceDescriptor } from '@provision/types';
import { toposort } from './toposort.js';
import { ResourceRegistry } from './ResourceRegistry.js';

/**
 * @throws ConfigError on duplicate ids (ERR_DUPLICATE_RESOURCE)
 * @throws UnknownDependencyError / CycleError from toposort
 */
export function orderResources(resources: ResourceRegistry | Iterable<ResourceDescriptor>): ResourceDescriptor[] {
  const registry = resources instanceof ResourceRegistry ? resources : ResourceRegistry.from(resources);
  const descriptors = registry.list();

  const order = toposort(descriptors.map(descriptor => ({
    id: descriptor.id,
    dependencies: descriptor.dependsOn,
  })));

  const ordered: ResourceDescriptor[] = [];
  for (const id of order) {
    const descriptor = registry.get(id);
    if (descriptor) ordered.push(descriptor);
  }
  return ordered;
}

/**
 * Transitive prerequisites of a resource, nearest first.
 * Used by `provision list` to explain why a resource is where it is.
 */
export function collectPrerequisites(registry: ResourceRegistry, id: string): string[] {
  const seen = new Set<string>();
  const queue = [...(registry.get(id)?.dependsOn ?? [])];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...(registry.get(next)?.dependsOn ?? []));
  }
  return [...seen];
}
