/**
 * Iterators - lazy, single-pass index sequences over a record span
 *
 * Bounds are validated when an iterator is constructed; once built, an
 * iterator only ever reads inside the span it captured.
 */

import { checkNode, checkSpan, checkWholeRuns, prevBoundary, subtreeStart } from './navigate';
import type { ReadonlyRecords } from './types';

abstract class BackwardSkipIterator implements IterableIterator<number> {
  private end: number;

  protected constructor(
    private readonly rec: ReadonlyRecords<unknown>,
    private readonly lo: number,
    hi: number
  ) {
    this.end = hi;
  }

  next(): IteratorResult<number> {
    if (this.end <= this.lo) return { done: true, value: undefined };
    const index = this.end - 1;
    this.end = prevBoundary(this.rec, this.end);
    return { done: false, value: index };
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this;
  }
}

/**
 * Roots of every tree in [lo, hi), last tree first.
 * [lo, hi) must not cut through a tree.
 */
export class RootIterator extends BackwardSkipIterator {
  constructor(rec: ReadonlyRecords<unknown>, lo: number, hi: number) {
    checkWholeRuns(rec, lo, hi);
    super(rec, lo, hi);
  }
}

/**
 * Direct children of `node`, rightmost first.
 * `node` and its whole subtree must lie inside [lo, hi).
 */
export class ChildIterator extends BackwardSkipIterator {
  constructor(rec: ReadonlyRecords<unknown>, node: number, lo: number, hi: number) {
    checkSpan(rec, lo, hi);
    checkNode(rec, node, lo, hi);
    super(rec, subtreeStart(rec, node), node);
  }
}

/**
 * Every strict descendant of `node` in storage order, so each record comes
 * after all of its own descendants.
 */
export class DescendantIterator implements IterableIterator<number> {
  private cursor: number;
  private readonly end: number;

  constructor(rec: ReadonlyRecords<unknown>, node: number, lo: number, hi: number) {
    checkSpan(rec, lo, hi);
    checkNode(rec, node, lo, hi);
    this.cursor = subtreeStart(rec, node);
    this.end = node;
  }

  next(): IteratorResult<number> {
    if (this.cursor >= this.end) return { done: true, value: undefined };
    return { done: false, value: this.cursor++ };
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this;
  }
}
