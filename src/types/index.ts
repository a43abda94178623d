import type { Logger } from 'pino';

/** Array.prototype.sort semantics: positive when `a` ranks above `b` in a max-heap. */
export type Comparator<T> = (a: T, b: T) => number;

export type Equality<T> = (a: T, b: T) => boolean;

export interface HeapOptions<T> {
  /**
   * Required for element types other than numbers, bigints, strings and dates;
   * without it every comparison (and the default `find` equality) throws `TypeError`.
   */
  compare?: Comparator<T>;
  /** Used by `find`. Defaults to `compare(a, b) === 0`. */
  equals?: Equality<T>;
  /** Grow instead of throwing `HeapFullError` when an insert hits capacity. */
  growable?: boolean;
  growthFactor?: number;
  /** Re-validate the heap after every mutation. */
  checkInvariant?: boolean;
  logger?: Logger;
}

export type HeapOperation = 'top' | 'extractTop' | 'remove' | 'changePriority';
