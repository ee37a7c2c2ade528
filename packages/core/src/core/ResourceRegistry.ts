import type { ResourceDescriptor, ResourceId } from '@provision/types';
import { ConfigError } from '../errors/ProvisionError.js';

/**
 * Descriptor set for a single run, in declaration order.
 *
 * Built once at process start and never mutated while the engine runs;
 * the Reconciler only reads from it.
 */
export class ResourceRegistry {
  private readonly descriptors = new Map<ResourceId, ResourceDescriptor>();

  static from(descriptors: Iterable<ResourceDescriptor>): ResourceRegistry {
    const registry = new ResourceRegistry();
    for (const descriptor of descriptors) {
      registry.register(descriptor);
    }
    return registry;
  }

  /**
   * Add a descriptor. Ids are unique within a run.
   * @throws ConfigError (ERR_DUPLICATE_RESOURCE)
   */
  register(descriptor: ResourceDescriptor): void {
    if (this.descriptors.has(descriptor.id)) {
      throw new ConfigError(
        `Resource "${descriptor.id}" is declared more than once`,
        'ERR_DUPLICATE_RESOURCE',
        { resourceId: descriptor.id, resourceType: descriptor.type },
        'Give each resource entry a distinct id'
      );
    }
    this.descriptors.set(descriptor.id, descriptor);
  }

  get(id: ResourceId): ResourceDescriptor | undefined {
    return this.descriptors.get(id);
  }

  has(id: ResourceId): boolean {
    return this.descriptors.has(id);
  }

  /** All descriptors in declaration order. */
  list(): ResourceDescriptor[] {
    return [...this.descriptors.values()];
  }

  get size(): number {
    return this.descriptors.size;
  }
}
