/**
 * Core type definitions
 */

// One stored node: its payload plus the number of nodes in its subtree (itself included)
export interface NodeRecord<T> {
  value: T;
  subtreeSize: number;
}

// Flat record storage. Record i is (values[i], sizes[i]); slots of `sizes`
// past `count` are spare capacity.
export interface Records<T> {
  values: T[];
  sizes: Uint32Array;
  count: number;
}

// What views and iterators read; only the owning store writes records
export interface ReadonlyRecords<T> {
  readonly values: readonly T[];
  readonly sizes: ArrayLike<number>;
  readonly count: number;
}

// Half-open index range [start, end)
export interface IndexRange {
  start: number;
  end: number;
}

// Start boundary of a subtree that has been opened but not yet sealed
export interface SubtreeMarker {
  readonly start: number;
  readonly depth: number;
}

/**
 * Storage order is children-before-parent, i.e. post-order.
 * - 'postorder'          → children left to right, each before its parent
 * - 'reverse-postorder'  → each node before its children, children right to left
 */
export type TraversalOrder = 'postorder' | 'reverse-postorder';
