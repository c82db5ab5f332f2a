/**
 * flatgrove – ordered trees in one flat, pointer-free buffer
 *
 * - GroveBuf      → append-only record store (pushLeaf / beginSubtree / sealSubtree / appendTree)
 * - ForestView    → read-only grove over any run-aligned span
 * - Tree          → handle on one sealed subtree
 * - RootIterator / ChildIterator / DescendantIterator → lazy index sequences
 * - grove(...)    → declarative literal front end
 *
 * Each record stores its value and its subtree size. Children precede their
 * parent, so parent/child/sibling/root relations are recovered from position
 * and size alone.
 */

export { GroveBuf, type GroveBufOptions, type GroveSource } from './grove-buf';
export { GroveBuilder } from './builder';
export { ForestView, Tree } from './forest';
export { grove, branch, isBranch, appendItems, type Branch, type GroveItem } from './literal';
export { formatGrove } from './format';

export {
  RootIterator,
  ChildIterator,
  DescendantIterator,
  GroveError,
  ContractViolationError,
  OutOfBoundsError,
  NotFoundError,
  INITIAL_CAPACITY,
  GROWTH_FACTOR,
  MAX_SUBTREE_SIZE,
  type NodeRecord,
  type ReadonlyRecords,
  type IndexRange,
  type SubtreeMarker,
  type TraversalOrder,
} from './internal';
