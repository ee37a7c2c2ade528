/**
 * State comparison and add-only list merging.
 *
 * Scalars compare exactly. Lists compare by the descriptor's comparison mode,
 * and the apply target for a list is always a superset of what is already
 * there: required entries first, then every pre-existing entry in its
 * original order.
 */

import { UNKNOWN } from '@provision/types';
import type { ObservedState, StateComparison, StateValue } from '@provision/types';

export function isListState(value: ObservedState): value is readonly string[] {
  return Array.isArray(value);
}

/**
 * True when the observed state satisfies the desired state.
 * UNKNOWN never satisfies anything.
 */
export function statesMatch(
  observed: ObservedState,
  desired: StateValue,
  comparison: StateComparison = 'exact'
): boolean {
  if (observed === UNKNOWN) return false;

  if (!isListState(desired) || !isListState(observed)) {
    return !isListState(desired) && !isListState(observed) && observed === desired;
  }

  switch (comparison) {
    case 'exact':
      return observed.length === desired.length && desired.every((entry, i) => observed[i] === entry);
    case 'contains':
      return desired.every(entry => observed.includes(entry));
    case 'prefix':
      // Same required run that planTarget() puts first
      return dedupe(desired).every((entry, i) => observed[i] === entry);
  }
}

/**
 * Compute the state handed to the applier.
 *
 * For 'exact' comparison this is the desired state itself. For list
 * comparisons the required entries come first and unrelated existing
 * entries are kept after them, so nothing is ever dropped.
 */
export function planTarget(
  observed: StateValue,
  desired: StateValue,
  comparison: StateComparison = 'exact'
): StateValue {
  if (comparison === 'exact' || !isListState(desired) || !isListState(observed)) {
    return desired;
  }

  if (comparison === 'contains') {
    const missing = desired.filter(entry => !observed.includes(entry));
    return [...dedupe(missing), ...observed];
  }

  const required = dedupe(desired);
  return [...required, ...observed.filter(entry => !required.includes(entry))];
}

/**
 * Render a state for logs and reports.
 */
export function describeState(state: ObservedState | undefined): string {
  if (state === undefined) return '-';
  if (state === UNKNOWN) return 'unknown';
  if (isListState(state)) return state.length === 0 ? '[]' : `[${state.join(', ')}]`;
  return String(state);
}

function dedupe(entries: readonly string[]): string[] {
  return [...new Set(entries)];
}
