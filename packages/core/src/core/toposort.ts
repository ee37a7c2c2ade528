/**
 * Topological sort for resource dependency ordering.
 *
 * Uses Kahn's algorithm (BFS-based) to sort items by their declared dependencies.
 * When multiple items have zero in-degree, they are emitted in input order
 * (declaration order tiebreaker), so the same input always yields the same order.
 *
 * Time complexity:  O(V + E)
 * Space complexity: O(V + E)
 */

import { CycleError, UnknownDependencyError } from '../errors/ProvisionError.js';

/**
 * Input item for topological sort.
 */
export interface ToposortItem {
  id: string;
  dependencies: readonly string[];
}

/**
 * Topologically sort items by their dependencies using Kahn's algorithm.
 *
 * @returns IDs in topological order (dependencies first)
 * @throws UnknownDependencyError if a dependency is not among the items
 * @throws CycleError if a dependency cycle exists among the items
 */
export function toposort(items: readonly ToposortItem[]): string[] {
  if (items.length === 0) return [];

  // dep -> items that depend on it (successors)
  const successors = new Map<string, string[]>();
  const inDegree = new Map<string, number>();

  for (const item of items) {
    successors.set(item.id, []);
    inDegree.set(item.id, 0);
  }

  // Edge from dependency -> item (dependency must be reconciled first)
  for (const item of items) {
    for (const dep of new Set(item.dependencies)) {
      const dependents = successors.get(dep);
      if (!dependents) {
        throw new UnknownDependencyError(item.id, dep);
      }
      dependents.push(item.id);
      inDegree.set(item.id, (inDegree.get(item.id) ?? 0) + 1);
    }
  }

  // Seed queue with zero-in-degree items, preserving input order
  const queue: string[] = items.filter(item => inDegree.get(item.id) === 0).map(item => item.id);

  // FIFO keeps the declaration-order tiebreaker
  const result: string[] = [];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head++];
    result.push(current);

    for (const successor of successors.get(current) ?? []) {
      const newDegree = (inDegree.get(successor) ?? 0) - 1;
      inDegree.set(successor, newDegree);
      if (newDegree === 0) {
        queue.push(successor);
      }
    }
  }

  if (result.length < items.length) {
    throw new CycleError(findCycle(items, result));
  }

  return result;
}

/**
 * Name one cycle among the items Kahn's algorithm could not emit.
 *
 * Every such item still waits on another unemitted item, so following the
 * first pending dependency from any of them must come back to a node already
 * on the path. Returns the cycle ending with a repeat of its first id.
 */
function findCycle(items: readonly ToposortItem[], emitted: readonly string[]): string[] {
  const done = new Set(emitted);
  const pendingDeps = new Map<string, string | undefined>();
  for (const item of items) {
    if (!done.has(item.id)) {
      pendingDeps.set(item.id, item.dependencies.find(dep => !done.has(dep)));
    }
  }

  const path: string[] = [];
  const onPath = new Map<string, number>();
  let node = items.find(item => !done.has(item.id))?.id;
  while (node !== undefined && !onPath.has(node)) {
    onPath.set(node, path.length);
    path.push(node);
    node = pendingDeps.get(node);
  }

  const start = node === undefined ? undefined : onPath.get(node);
  if (node === undefined || start === undefined) {
    return [...pendingDeps.keys()];
  }
  return [...path.slice(start), node];
}
