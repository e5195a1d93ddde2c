/**
 * Ordering policies for the unit list.
 *
 * - `priority`:   (order, displayName)
 * - `numeric-id`: (numericId, order, displayName), so file naming (`code1`,
 *   `code2`, `code10`) decides placement before any declared order.
 *
 * Display names are unique within a registry, which makes both orders total.
 */

import type { HostSettings } from '../config.js';
import type { LoadedUnit } from './types.js';

export type OrderingPolicy = HostSettings['ordering'];

export const DEFAULT_ORDERING_POLICY: OrderingPolicy = 'numeric-id';

type SortKey = Pick<LoadedUnit, 'displayName' | 'order' | 'numericId'>;

/** Code-point comparison; independent of the process locale. */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareUnits(policy: OrderingPolicy): (a: SortKey, b: SortKey) => number {
  if (policy === 'priority') {
    return (a, b) => compareNumbers(a.order, b.order) || compareStrings(a.displayName, b.displayName);
  }
  return (a, b) =>
    compareNumbers(a.numericId, b.numericId)
    || compareNumbers(a.order, b.order)
    || compareStrings(a.displayName, b.displayName);
}

export function sortUnits<T extends SortKey>(units: Iterable<T>, policy: OrderingPolicy): T[] {
  return [...units].sort(compareUnits(policy));
}
