/**
 * ForestView / Tree - read-only interpretations of a record span
 *
 * - ForestView → any contiguous [lo, hi) made of whole root runs, read as a grove
 * - Tree       → one sealed subtree, addressed by its root index
 *
 * Both take and return absolute buffer indices, so an index obtained from one
 * view stays meaningful in every other view over the same buffer.
 */

import {
  ChildIterator,
  DescendantIterator,
  NotFoundError,
  RootIterator,
  checkIndex,
  checkNode,
  checkWholeRuns,
  countRuns,
  foldRuns,
  forwardRuns,
  nthRunFromEnd,
  recordsEqual,
  recordsToArray,
  subtreeStart,
  type IndexRange,
  type NodeRecord,
  type ReadonlyRecords,
  type TraversalOrder,
} from './internal';
import { formatGrove } from './format';

export class ForestView<T> {
  /**
   * @internal Prefer `GroveBuf#view()` or `ForestView#descendantsView()`.
   * Throws OutOfBoundsError if [lo, hi) cuts through a tree.
   */
  constructor(
    readonly records: ReadonlyRecords<T>,
    readonly lo: number,
    readonly hi: number
  ) {
    checkWholeRuns(records, lo, hi);
  }

  /** Number of records in the view */
  get length(): number {
    return this.hi - this.lo;
  }

  get isEmpty(): boolean {
    return this.hi === this.lo;
  }

  // =====================================================
  // Direct lookups
  // =====================================================

  valueAt(index: number): T {
    checkIndex(index, this.lo, this.hi);
    return this.records.values[index];
  }

  subtreeSizeAt(index: number): number {
    checkIndex(index, this.lo, this.hi);
    return this.records.sizes[index];
  }

  // =====================================================
  // Roots
  // =====================================================

  rootCount(): number {
    return countRuns(this.records, this.lo, this.hi);
  }

  /**
   * Root of the n-th tree counted from the end (0 = last tree).
   * Throws NotFoundError when fewer than n + 1 trees exist.
   */
  nthRootFromEnd(n: number): number {
    const root = nthRunFromEnd(this.records, this.lo, this.hi, n);
    if (root === undefined) throw new NotFoundError(n, this.rootCount());
    return root;
  }

  findNthRootFromEnd(n: number): number | undefined {
    return nthRunFromEnd(this.records, this.lo, this.hi, n);
  }

  /** Roots, last tree first */
  roots(): RootIterator {
    return new RootIterator(this.records, this.lo, this.hi);
  }

  /** Roots, first tree first */
  rootsForward(): number[] {
    return forwardRuns(this.records, this.lo, this.hi);
  }

  // =====================================================
  // Children & descendants
  // =====================================================

  /** Direct children of `node`, rightmost first */
  childrenOf(node: number): ChildIterator {
    return new ChildIterator(this.records, node, this.lo, this.hi);
  }

  childrenLeftToRight(node: number): number[] {
    return Array.from(this.childrenOf(node)).reverse();
  }

  /** Every strict descendant of `node`, in storage order */
  descendantsOf(node: number): DescendantIterator {
    return new DescendantIterator(this.records, node, this.lo, this.hi);
  }

  descendantsView(node: number): ForestView<T> {
    checkNode(this.records, node, this.lo, this.hi);
    return new ForestView(this.records, subtreeStart(this.records, node), node);
  }

  tree(root: number): Tree<T> {
    checkNode(this.records, root, this.lo, this.hi);
    return new Tree(this.records, root);
  }

  // =====================================================
  // Whole-view traversal
  // =====================================================

  *nodes(order: TraversalOrder = 'postorder'): IterableIterator<T> {
    const { values } = this.records;
    if (order === 'postorder') {
      for (let i = this.lo; i < this.hi; i++) yield values[i];
    } else {
      for (let i = this.hi - 1; i >= this.lo; i--) yield values[i];
    }
  }

  /** Every subtree in the view (not only the top-level trees) */
  *trees(order: TraversalOrder = 'postorder'): IterableIterator<Tree<T>> {
    if (order === 'postorder') {
      for (let i = this.lo; i < this.hi; i++) yield new Tree(this.records, i);
    } else {
      for (let i = this.hi - 1; i >= this.lo; i--) yield new Tree(this.records, i);
    }
  }

  values(): T[] {
    return this.records.values.slice(this.lo, this.hi);
  }

  /**
   * Bottom-up aggregation. `fn` receives a node's value together with the
   * results already computed for its children (left to right).
   * Returns the results for the top-level trees, first tree first.
   */
  foldUp<R>(fn: (value: T, children: R[], index: number) => R): R[] {
    return foldRuns(this.records, this.lo, this.hi, fn);
  }

  toArray(): NodeRecord<T>[] {
    return recordsToArray(this.records, this.lo, this.hi);
  }

  equals(other: ForestView<T>, eq: (a: T, b: T) => boolean = Object.is): boolean {
    return recordsEqual(this.records, this.lo, this.hi, other.records, other.lo, other.hi, eq);
  }

  toString(): string {
    return formatGrove(this);
  }
}

/**
 * Handle on the subtree rooted at `root`: the span [root - size + 1, root].
 */
export class Tree<T> {
  readonly start: number;

  /**
   * @internal Prefer `ForestView#tree()` or `GroveBuf#tree()`.
   */
  constructor(
    readonly records: ReadonlyRecords<T>,
    readonly root: number
  ) {
    checkIndex(root, 0, records.count);
    this.start = subtreeStart(records, root);
  }

  get value(): T {
    return this.records.values[this.root];
  }

  /** Node count, root included */
  get size(): number {
    return this.records.sizes[this.root];
  }

  get span(): IndexRange {
    return { start: this.start, end: this.root + 1 };
  }

  get isLeaf(): boolean {
    return this.start === this.root;
  }

  /** The whole tree as a one-tree grove */
  asForest(): ForestView<T> {
    return new ForestView(this.records, this.start, this.root + 1);
  }

  /** The root's descendants as a grove of its children */
  view(): ForestView<T> {
    return new ForestView(this.records, this.start, this.root);
  }

  /** Child subtrees, rightmost first */
  *children(): IterableIterator<Tree<T>> {
    for (const child of new ChildIterator(this.records, this.root, this.start, this.root + 1)) {
      yield new Tree(this.records, child);
    }
  }

  /** n-th child counted from the right (0 = rightmost) */
  childAt(n: number): Tree<T> {
    const child = nthRunFromEnd(this.records, this.start, this.root, n);
    if (child === undefined) {
      throw new NotFoundError(n, countRuns(this.records, this.start, this.root));
    }
    return new Tree(this.records, child);
  }

  values(): T[] {
    return this.records.values.slice(this.start, this.root + 1);
  }

  equals(other: Tree<T>, eq: (a: T, b: T) => boolean = Object.is): boolean {
    return recordsEqual(this.records, this.start, this.root + 1, other.records, other.start, other.root + 1, eq);
  }

  toString(): string {
    return formatGrove(this.asForest());
  }
}
