/**
 * Navigate - index arithmetic over record spans
 *
 * A node at position p with subtree size s owns the span [p - s + 1, p].
 * Stepping backward from an exclusive end boundary by the size of the record
 * just before it lands on the previous sibling (or root) boundary.
 */

import { OutOfBoundsError } from './errors';
import type { ReadonlyRecords } from './types';

export function checkIndex(index: number, lo: number, hi: number): void {
  if (!Number.isInteger(index) || index < lo || index >= hi) {
    throw new OutOfBoundsError(index, lo, hi);
  }
}

export function checkSpan<T>(rec: ReadonlyRecords<T>, lo: number, hi: number): void {
  if (!Number.isInteger(lo) || lo < 0 || lo > rec.count) {
    throw new OutOfBoundsError(lo, 0, rec.count + 1);
  }
  if (!Number.isInteger(hi) || hi < lo || hi > rec.count) {
    throw new OutOfBoundsError(hi, lo, rec.count + 1);
  }
}

/**
 * [lo, hi) must be a sequence of whole trees: stepping back from hi by root
 * sizes lands exactly on lo. Any prefix of a store qualifies.
 */
export function checkWholeRuns<T>(rec: ReadonlyRecords<T>, lo: number, hi: number): void {
  checkSpan(rec, lo, hi);
  if (lo === 0) return;
  let end = hi;
  while (end > lo) end = prevBoundary(rec, end);
  if (end !== lo) throw new OutOfBoundsError(end, lo, hi);
}

// `node` and its whole subtree must lie inside [lo, hi)
export function checkNode<T>(rec: ReadonlyRecords<T>, node: number, lo: number, hi: number): void {
  checkIndex(node, lo, hi);
  const start = subtreeStart(rec, node);
  if (start < lo) throw new OutOfBoundsError(start, lo, hi);
}

// First index of the subtree rooted at p
export function subtreeStart<T>(rec: ReadonlyRecords<T>, p: number): number {
  return p - rec.sizes[p] + 1;
}

// Boundary before the run ending at end - 1
export function prevBoundary<T>(rec: ReadonlyRecords<T>, end: number): number {
  return end - rec.sizes[end - 1];
}

export function countRuns<T>(rec: ReadonlyRecords<T>, lo: number, hi: number): number {
  let count = 0;
  for (let end = hi; end > lo; end = prevBoundary(rec, end)) {
    count++;
  }
  return count;
}

// Root of the n-th run counted from the end of [lo, hi)
export function nthRunFromEnd<T>(rec: ReadonlyRecords<T>, lo: number, hi: number, n: number): number | undefined {
  if (!Number.isInteger(n) || n < 0) return undefined;
  let end = hi;
  for (let i = 0; i < n && end > lo; i++) {
    end = prevBoundary(rec, end);
  }
  return end > lo ? end - 1 : undefined;
}

/**
 * Roots of [lo, hi) in storage order, found by one forward pass.
 * Every record swallows the already-seen roots that fall inside its span;
 * whatever is left on the stack at the end is the top level.
 */
export function forwardRuns<T>(rec: ReadonlyRecords<T>, lo: number, hi: number): number[] {
  const stack: number[] = [];
  for (let j = lo; j < hi; j++) {
    const start = subtreeStart(rec, j);
    while (stack.length > 0 && stack[stack.length - 1] >= start) {
      stack.pop();
    }
    stack.push(j);
  }
  return stack;
}

/**
 * Check that every size in [lo, hi) tiles its span exactly with whole runs.
 * Returns the first offending index, or -1.
 */
export function findBrokenRecord<T>(rec: ReadonlyRecords<T>, lo: number, hi: number): number {
  const stack: number[] = [];
  for (let j = lo; j < hi; j++) {
    const start = subtreeStart(rec, j);
    if (start < lo) return j;
    while (stack.length > 0 && stack[stack.length - 1] >= start) {
      stack.pop();
    }
    const boundary = stack.length > 0 ? stack[stack.length - 1] + 1 : lo;
    if (boundary !== start) return j;
    stack.push(j);
  }
  return -1;
}

/**
 * Bottom-up fold over [lo, hi) in one left-to-right pass.
 * By the time a record is reached, all of its descendants have been folded,
 * so its children's results sit on top of the stack.
 */
export function foldRuns<T, R>(
  rec: ReadonlyRecords<T>,
  lo: number,
  hi: number,
  fn: (value: T, children: R[], index: number) => R
): R[] {
  const indices: number[] = [];
  const results: R[] = [];
  for (let j = lo; j < hi; j++) {
    const start = subtreeStart(rec, j);
    let k = indices.length;
    while (k > 0 && indices[k - 1] >= start) k--;
    const children = results.splice(k);
    indices.length = k;
    indices.push(j);
    results.push(fn(rec.values[j], children, j));
  }
  return results;
}
