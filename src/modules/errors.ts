import type { HeapOperation } from '../types';

export type HeapErrorCode = 'HEAP_FULL' | 'EMPTY_HEAP' | 'INDEX_OUT_OF_RANGE' | 'HEAP_INVARIANT';

export abstract class HeapError extends Error {
  abstract readonly code: HeapErrorCode;
}

/** Thrown by `insert` when a fixed-capacity heap has no free slot. */
export class HeapFullError extends HeapError {
  readonly code = 'HEAP_FULL';

  constructor(public readonly capacity: number) {
    super(`binary heap is full (capacity ${capacity})`);
    this.name = 'HeapFullError';
  }
}

/** Thrown by `top` and `extractTop` when the heap has no live element. */
export class EmptyHeapError extends HeapError {
  readonly code = 'EMPTY_HEAP';

  constructor(public readonly operation: HeapOperation) {
    super(`${operation}() called on an empty binary heap`);
    this.name = 'EmptyHeapError';
  }
}

export class IndexOutOfRangeError extends HeapError {
  readonly code = 'INDEX_OUT_OF_RANGE';

  constructor(
    public readonly index: number,
    public readonly size: number,
    public readonly operation: HeapOperation
  ) {
    super(`${operation}(): index ${index} is outside [0, ${size})`);
    this.name = 'IndexOutOfRangeError';
  }
}

export class HeapInvariantError extends HeapError {
  readonly code = 'HEAP_INVARIANT';

  constructor(public readonly parent: number, public readonly child: number) {
    super(`max-heap property violated: slot ${parent} ranks below its child ${child}`);
    this.name = 'HeapInvariantError';
  }
}
