import type { Logger } from 'pino';
import type { Comparator, Equality, HeapOperation, HeapOptions } from '../types';
import { config } from '../utils/config';
import {
  findViolation,
  leftChildIndex,
  naturalOrder,
  parentIndex,
  rightChildIndex,
} from '../utils/helpers';
import logger from '../utils/logger';
import { renderSlots } from '../utils/serializer';
import {
  EmptyHeapError,
  HeapError,
  HeapFullError,
  HeapInvariantError,
  IndexOutOfRangeError,
} from './errors';

/**
 * Array-backed binary max-heap with a capacity fixed at construction.
 *
 * Ordering comes from `options.compare` (natural order for numbers, bigints,
 * strings and dates). Pass `reverseOrder()` to get a min-heap.
 */
export class BinaryHeap<T> {
  // Live range is the whole array; `cap` bounds its length.
  private heap: T[];
  private cap: number;
  private readonly compare: Comparator<T>;
  private readonly equals: Equality<T>;
  private readonly growable: boolean;
  private readonly growthFactor: number;
  private readonly checkInvariant: boolean;
  private readonly log: Logger;

  /** Creates an empty heap that holds at most `capacity` elements. */
  constructor(capacity: number, options?: HeapOptions<T>);
  /** Heapifies a copy of `elements`; capacity becomes `elements.length`. */
  constructor(elements: readonly T[], options?: HeapOptions<T>);
  constructor(source: number | readonly T[], options: HeapOptions<T> = {}) {
    const compare = options.compare ?? naturalOrder;
    this.compare = compare;
    this.equals = options.equals ?? ((a, b) => compare(a, b) === 0);
    this.growable = options.growable ?? false;
    this.growthFactor = options.growthFactor ?? config.growthFactor;
    this.checkInvariant = options.checkInvariant ?? config.checkInvariant;
    this.log = options.logger ?? logger.child({ module: 'BinaryHeap' });

    if (!Number.isFinite(this.growthFactor) || this.growthFactor <= 1) {
      throw new RangeError(`growthFactor must be a finite number greater than 1, got ${this.growthFactor}`);
    }

    if (typeof source === 'number') {
      if (!Number.isSafeInteger(source) || source < 0) {
        throw new RangeError(`capacity must be a non-negative integer, got ${source}`);
      }
      this.heap = [];
      this.cap = source;
    } else {
      this.heap = [];
      this.cap = 0;
      this.buildHeap(source);
    }
  }

  static from<T>(elements: Iterable<T>, options?: HeapOptions<T>): BinaryHeap<T> {
    return new BinaryHeap<T>(Array.from(elements), options);
  }

  get capacity(): number {
    return this.cap;
  }

  size(): number {
    return this.heap.length;
  }

  empty(): boolean {
    return this.heap.length === 0;
  }

  full(): boolean {
    return this.heap.length === this.cap;
  }

  /** Returns the maximum without removing it. */
  top(): T {
    this.assertNotEmpty('top');
    return this.heap[0];
  }

  /** Removes and returns the maximum. */
  extractTop(): T {
    this.assertNotEmpty('extractTop');
    const top = this.heap[0];
    const last = this.takeLast();
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    this.verify();
    return top;
  }

  insert(value: T): void {
    if (this.full()) {
      if (!this.growable) this.fail(new HeapFullError(this.cap));
      this.grow();
    }
    this.heap.push(value);
    this.siftUp(this.heap.length - 1);
    this.verify();
  }

  /**
   * Removes the element at `index` and returns it. The last live element
   * takes its slot and is sifted whichever way restores the ordering.
   */
  remove(index: number): T {
    this.assertIndex(index, 'remove');
    const removed = this.heap[index];
    const last = this.takeLast();
    if (index < this.heap.length) {
      this.heap[index] = last;
      this.restore(index);
    }
    this.verify();
    return removed;
  }

  changePriority(index: number, value: T): void {
    this.assertIndex(index, 'changePriority');
    const previous = this.heap[index];
    this.heap[index] = value;
    if (this.compare(value, previous) > 0) {
      this.siftUp(index);
    } else {
      this.siftDown(index);
    }
    this.verify();
  }

  /**
   * Index of the first live element equal to `value`, or -1.
   * Linear in `size()`; no value-to-index map is kept.
   */
  find(value: T): number {
    for (let i = 0; i < this.heap.length; i++) {
      if (this.equals(this.heap[i], value)) return i;
    }
    return -1;
  }

  /** Copy of the live elements in storage order (not sorted). */
  toArray(): T[] {
    return this.heap.slice();
  }

  /** Every storage slot in array order; unused slots show as `_`. */
  toString(): string {
    return renderSlots(this.heap, this.cap);
  }

  private buildHeap(elements: readonly T[]): void {
    this.heap = elements.slice();
    this.cap = this.heap.length;
    for (let i = Math.floor(this.heap.length / 2); i >= 0; i--) {
      this.siftDown(i);
    }
    this.log.debug({ size: this.heap.length }, 'built heap from sequence');
    this.verify();
  }

  private siftUp(n: number): void {
    const element = this.heap[n];
    while (n > 0) {
      const parentN = parentIndex(n);
      const parent = this.heap[parentN];
      if (this.compare(element, parent) <= 0) break;
      this.heap[parentN] = element;
      this.heap[n] = parent;
      n = parentN;
    }
  }

  private siftDown(n: number): void {
    const length = this.heap.length;

    while (true) {
      let largest = n;
      const leftN = leftChildIndex(n);
      const rightN = rightChildIndex(n);

      if (leftN < length && this.compare(this.heap[leftN], this.heap[largest]) > 0) {
        largest = leftN;
      }
      if (rightN < length && this.compare(this.heap[rightN], this.heap[largest]) > 0) {
        largest = rightN;
      }
      if (largest === n) break;

      const element = this.heap[n];
      this.heap[n] = this.heap[largest];
      this.heap[largest] = element;
      n = largest;
    }
  }

  private restore(n: number): void {
    if (n > 0 && this.compare(this.heap[n], this.heap[parentIndex(n)]) > 0) {
      this.siftUp(n);
    } else {
      this.siftDown(n);
    }
  }

  // Callers guarantee the heap is non-empty.
  private takeLast(): T {
    const last = this.heap[this.heap.length - 1];
    this.heap.length -= 1;
    return last;
  }

  private grow(): void {
    const previous = this.cap;
    const next = Math.max(1, Math.ceil(previous * this.growthFactor));
    if (!Number.isSafeInteger(next)) {
      throw new RangeError(`cannot grow heap capacity past ${previous}`);
    }
    this.cap = next;
    this.log.debug({ from: previous, to: next }, 'grew heap capacity');
  }

  private verify(): void {
    if (!this.checkInvariant) return;
    const violation = findViolation(this.heap, this.heap.length, this.compare);
    if (violation) this.fail(new HeapInvariantError(violation[0], violation[1]));
  }

  private assertNotEmpty(operation: HeapOperation): void {
    if (this.heap.length === 0) this.fail(new EmptyHeapError(operation));
  }

  private assertIndex(index: number, operation: HeapOperation): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.heap.length) {
      this.fail(new IndexOutOfRangeError(index, this.heap.length, operation));
    }
  }

  private fail(error: HeapError): never {
    this.log.debug({ code: error.code }, error.message);
    throw error;
  }
}
