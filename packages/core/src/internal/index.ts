/**
 * Internal modules barrel export
 */

// Constants
export { INITIAL_CAPACITY, GROWTH_FACTOR, MAX_SUBTREE_SIZE, BRANCH } from './constants';

// Errors
export { GroveError, ContractViolationError, OutOfBoundsError, NotFoundError } from './errors';

// Records
export {
  recordsEmpty,
  recordsReserve,
  recordsPush,
  recordsAppendRange,
  recordsEqual,
  recordsToArray,
} from './records';

// Navigation
export {
  checkIndex,
  checkSpan,
  checkWholeRuns,
  checkNode,
  subtreeStart,
  prevBoundary,
  countRuns,
  nthRunFromEnd,
  forwardRuns,
  findBrokenRecord,
  foldRuns,
} from './navigate';

// Iterators
export { RootIterator, ChildIterator, DescendantIterator } from './iterators';

// Types
export type { NodeRecord, Records, ReadonlyRecords, IndexRange, SubtreeMarker, TraversalOrder } from './types';
