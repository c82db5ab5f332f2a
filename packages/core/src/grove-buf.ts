/**
 * GroveBuf - append-only store of node records
 *
 * Children are always written before their parent, so a subtree is complete
 * the moment its root is appended. The store is the only thing that mutates
 * records; every index it hands out stays valid for its whole lifetime.
 *
 *   const g = new GroveBuf<string>();
 *   const m = g.beginSubtree();
 *   g.pushLeaf('left');
 *   g.pushLeaf('right');
 *   g.sealSubtree('direction', m);   // sizes: 1, 1, 3
 */

import {
  ContractViolationError,
  checkIndex,
  findBrokenRecord,
  prevBoundary,
  recordsAppendRange,
  recordsEmpty,
  recordsPush,
  recordsReserve,
  type ChildIterator,
  type DescendantIterator,
  type IndexRange,
  type NodeRecord,
  type ReadonlyRecords,
  type Records,
  type RootIterator,
  type SubtreeMarker,
  type TraversalOrder,
} from './internal';
import { ForestView, Tree } from './forest';
import { GroveBuilder } from './builder';

export interface GroveBufOptions {
  /** Record slots reserved up front */
  initialCapacity?: number;
}

/** Anything whose records can be appended onto a store */
export type GroveSource<T> = GroveBuf<T> | ForestView<T> | Tree<T>;

export class GroveBuf<T> {
  private readonly store: Records<T>;
  private readonly open: SubtreeMarker[] = [];

  constructor(options: GroveBufOptions = {}) {
    this.store = recordsEmpty<T>(options.initialCapacity);
  }

  /** Read-only access to the records, for views and iterators */
  get records(): ReadonlyRecords<T> {
    return this.store;
  }

  /**
   * Rebuild a store from a flat record list (e.g. one produced by `toArray()`).
   * Throws ContractViolationError if the sizes do not partition the list.
   */
  static from<T>(records: readonly NodeRecord<T>[]): GroveBuf<T> {
    const buf = new GroveBuf<T>({ initialCapacity: records.length });
    for (const { value, subtreeSize } of records) {
      if (!Number.isInteger(subtreeSize)) {
        throw new ContractViolationError(`Subtree size ${subtreeSize} is not an integer`);
      }
      recordsPush(buf.store, value, subtreeSize);
    }
    const broken = findBrokenRecord(buf.records, 0, buf.records.count);
    if (broken !== -1) {
      throw new ContractViolationError(
        `Record ${broken} (size ${buf.records.sizes[broken]}) straddles a subtree boundary`
      );
    }
    return buf;
  }

  get length(): number {
    return this.records.count;
  }

  get isEmpty(): boolean {
    return this.records.count === 0;
  }

  /** Number of subtrees begun but not yet sealed or abandoned */
  get openDepth(): number {
    return this.open.length;
  }

  // =====================================================
  // Construction surface
  // =====================================================

  pushLeaf(value: T): number {
    return recordsPush(this.store, value, 1);
  }

  beginSubtree(): SubtreeMarker {
    const marker: SubtreeMarker = Object.freeze({
      start: this.records.count,
      depth: this.open.length,
    });
    this.open.push(marker);
    return marker;
  }

  /**
   * Append `value` as the root of everything written since `marker` was
   * issued. `marker` must be the innermost open subtree.
   */
  sealSubtree(value: T, marker: SubtreeMarker): number {
    this.checkInnermost(marker, 'seal');
    const index = recordsPush(this.store, value, this.records.count - marker.start + 1);
    this.open.pop();
    return index;
  }

  /**
   * Close the innermost open subtree without writing a root. Records pushed
   * since `marker` stay in place as trees at the enclosing depth.
   */
  abandonSubtree(marker: SubtreeMarker): void {
    this.checkInnermost(marker, 'abandon');
    this.open.pop();
  }

  /**
   * Append `value` as the parent of the last `childCount` trees.
   * Only trees inside the innermost open subtree can be adopted.
   */
  pushRoot(value: T, childCount: number): number {
    if (!Number.isInteger(childCount) || childCount < 0) {
      throw new ContractViolationError(`Invalid child count ${childCount}`);
    }
    const floor = this.open.length > 0 ? this.open[this.open.length - 1].start : 0;
    let start = this.records.count;
    for (let i = 0; i < childCount; i++) {
      if (start <= floor) {
        throw new ContractViolationError(`Only ${i} trees available, ${childCount} requested`);
      }
      start = prevBoundary(this.records, start);
    }
    return recordsPush(this.store, value, this.records.count - start + 1);
  }

  /**
   * Copy every record of `source` onto the end. The copied trees become
   * top-level trees, or children of the innermost open subtree.
   */
  appendTree(source: GroveSource<T>): IndexRange {
    const view = toView(source);
    const start = recordsAppendRange(this.store, view.records, view.lo, view.hi);
    return { start, end: start + view.length };
  }

  /** Fluent open/push/close builder writing into this store */
  builder(): GroveBuilder<T> {
    return new GroveBuilder(this);
  }

  /** Reserve room for `additional` more records */
  reserve(additional: number): void {
    recordsReserve(this.store, additional);
  }

  // =====================================================
  // Query surface
  // =====================================================

  /** Read-only view of every record written so far */
  view(): ForestView<T> {
    return new ForestView(this.records, 0, this.records.count);
  }

  tree(root: number): Tree<T> {
    checkIndex(root, 0, this.records.count);
    return new Tree(this.records, root);
  }

  valueAt(index: number): T {
    return this.view().valueAt(index);
  }

  subtreeSizeAt(index: number): number {
    return this.view().subtreeSizeAt(index);
  }

  rootCount(): number {
    return this.view().rootCount();
  }

  nthRootFromEnd(n: number): number {
    return this.view().nthRootFromEnd(n);
  }

  roots(): RootIterator {
    return this.view().roots();
  }

  childrenOf(node: number): ChildIterator {
    return this.view().childrenOf(node);
  }

  descendantsOf(node: number): DescendantIterator {
    return this.view().descendantsOf(node);
  }

  nodes(order: TraversalOrder = 'postorder'): IterableIterator<T> {
    return this.view().nodes(order);
  }

  trees(order: TraversalOrder = 'postorder'): IterableIterator<Tree<T>> {
    return this.view().trees(order);
  }

  /** Same shape, values passed through `fn` */
  map<U>(fn: (value: T, index: number) => U): GroveBuf<U> {
    const out = new GroveBuf<U>({ initialCapacity: this.records.count });
    const { values, sizes, count } = this.records;
    for (let i = 0; i < count; i++) {
      recordsPush(out.store, fn(values[i], i), sizes[i]);
    }
    return out;
  }

  equals(other: GroveSource<T>, eq: (a: T, b: T) => boolean = Object.is): boolean {
    return this.view().equals(toView(other), eq);
  }

  toArray(): NodeRecord<T>[] {
    return this.view().toArray();
  }

  toString(): string {
    return this.view().toString();
  }

  // =====================================================
  // Helpers
  // =====================================================

  private checkInnermost(marker: SubtreeMarker, action: string): void {
    const top = this.open[this.open.length - 1];
    if (marker !== top) {
      if (this.open.includes(marker)) {
        throw new ContractViolationError(
          `Cannot ${action} subtree at depth ${marker.depth} while ${this.open.length - 1 - marker.depth} deeper subtree(s) are open`
        );
      }
      throw new ContractViolationError(`Cannot ${action} a subtree that is not open on this store`);
    }
    if (marker.start > this.records.count) {
      throw new ContractViolationError(
        `Marker start ${marker.start} is past the buffer length ${this.records.count}`
      );
    }
  }
}

function toView<T>(source: GroveSource<T>): ForestView<T> {
  if (source instanceof GroveBuf) return source.view();
  if (source instanceof Tree) return source.asForest();
  return source;
}
