/**
 * Records - append-only storage for node records
 * Values in a dense array, subtree sizes in a Uint32Array grown by doubling
 */

import { GROWTH_FACTOR, INITIAL_CAPACITY, MAX_SUBTREE_SIZE } from './constants';
import { ContractViolationError } from './errors';
import type { NodeRecord, ReadonlyRecords, Records } from './types';

function checkSlotCount(n: number, what: string): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new ContractViolationError(`Invalid ${what} ${n}`);
  }
}

export function recordsEmpty<T>(capacity = INITIAL_CAPACITY): Records<T> {
  checkSlotCount(capacity, 'capacity');
  return { values: [], sizes: new Uint32Array(Math.max(capacity, 1)), count: 0 };
}

export function recordsReserve<T>(rec: Records<T>, additional: number): void {
  checkSlotCount(additional, 'reserve count');
  const needed = rec.count + additional;
  if (needed <= rec.sizes.length) return;
  const grown = new Uint32Array(Math.max(rec.sizes.length * GROWTH_FACTOR, needed));
  grown.set(rec.sizes.subarray(0, rec.count));
  rec.sizes = grown;
}

export function recordsPush<T>(rec: Records<T>, value: T, subtreeSize: number): number {
  if (subtreeSize < 1 || subtreeSize > rec.count + 1) {
    throw new ContractViolationError(
      `Subtree size ${subtreeSize} does not fit at index ${rec.count}`
    );
  }
  if (subtreeSize > MAX_SUBTREE_SIZE) {
    throw new ContractViolationError(`Subtree size ${subtreeSize} exceeds ${MAX_SUBTREE_SIZE}`);
  }
  recordsReserve(rec, 1);
  const index = rec.count;
  rec.sizes[index] = subtreeSize;
  rec.values.push(value);
  rec.count = index + 1;
  return index;
}

/**
 * Copy records [lo, hi) of `src` onto the end of `dst`.
 * Sizes are position-independent, so they copy verbatim.
 * `src` may be `dst` itself.
 */
export function recordsAppendRange<T>(dst: Records<T>, src: ReadonlyRecords<T>, lo: number, hi: number): number {
  const start = dst.count;
  const n = hi - lo;
  if (n <= 0) return start;
  recordsReserve(dst, n);
  // [lo, hi) never overlaps [start, start + n), even when src is dst
  for (let i = lo; i < hi; i++) {
    dst.sizes[start + i - lo] = src.sizes[i];
    dst.values.push(src.values[i]);
  }
  dst.count = start + n;
  return start;
}

export function recordsEqual<T, U>(
  a: ReadonlyRecords<T>,
  aLo: number,
  aHi: number,
  b: ReadonlyRecords<U>,
  bLo: number,
  bHi: number,
  eq: (x: T, y: U) => boolean
): boolean {
  const n = aHi - aLo;
  if (n !== bHi - bLo) return false;
  for (let i = 0; i < n; i++) {
    if (a.sizes[aLo + i] !== b.sizes[bLo + i]) return false;
    if (!eq(a.values[aLo + i], b.values[bLo + i])) return false;
  }
  return true;
}

export function recordsToArray<T>(rec: ReadonlyRecords<T>, lo: number, hi: number): NodeRecord<T>[] {
  const out: NodeRecord<T>[] = [];
  for (let i = lo; i < hi; i++) {
    out.push({ value: rec.values[i], subtreeSize: rec.sizes[i] });
  }
  return out;
}
