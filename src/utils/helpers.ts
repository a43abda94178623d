import type { Comparator } from '../types';

export function parentIndex(index: number): number {
  return Math.floor((index - 1) / 2);
}

export function leftChildIndex(index: number): number {
  return 2 * index + 1;
}

export function rightChildIndex(index: number): number {
  return 2 * index + 2;
}

/**
 * Default ordering for primitive keys. Anything else needs an explicit comparator.
 */
export function naturalOrder<T>(a: T, b: T): number {
  // Ternaries rather than subtraction: Infinity - Infinity is NaN.
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof Date && b instanceof Date) return naturalOrder(a.getTime(), b.getTime());
  throw new TypeError(`cannot order ${typeof a} and ${typeof b} without a comparator`);
}

export function reverseOrder<T>(compare: Comparator<T> = naturalOrder): Comparator<T> {
  return (a, b) => compare(b, a);
}

/**
 * Returns the first [parent, child] pair that breaks the max-heap property
 * within the live range, or null when the range is a valid heap.
 */
export function findViolation<T>(
  items: readonly T[],
  count: number,
  compare: Comparator<T>
): [number, number] | null {
  for (let child = 1; child < count; child++) {
    const parent = parentIndex(child);
    if (compare(items[parent], items[child]) < 0) return [parent, child];
  }
  return null;
}

export function isMaxHeap<T>(
  items: readonly T[],
  count: number = items.length,
  compare: Comparator<T> = naturalOrder
): boolean {
  return findViolation(items, count, compare) === null;
}
