export { BinaryHeap } from './modules/BinaryHeap';
export {
  EmptyHeapError,
  HeapError,
  HeapFullError,
  HeapInvariantError,
  IndexOutOfRangeError,
} from './modules/errors';
export type { HeapErrorCode } from './modules/errors';
export {
  isMaxHeap,
  leftChildIndex,
  naturalOrder,
  parentIndex,
  reverseOrder,
  rightChildIndex,
} from './utils/helpers';
export { formatElement, renderSlots } from './utils/serializer';
export { config, loadConfig, verifyConfig } from './utils/config';
export type { Config } from './utils/config';
export type { Comparator, Equality, HeapOperation, HeapOptions } from './types';
