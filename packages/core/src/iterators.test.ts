/**
 * Tests for RootIterator / ChildIterator / DescendantIterator
 */

import { describe, it, expect } from 'vitest';
import {
  ChildIterator,
  DescendantIterator,
  GroveBuf,
  OutOfBoundsError,
  RootIterator,
  branch,
  grove,
} from './index';

function sample(): GroveBuf<string> {
  return grove<string>('a', branch(['b', branch(['c', 'd'], 'e')], 'f'), 'g');
}

describe('iterators', () => {
  describe('single pass', () => {
    it('should be exhausted after one traversal', () => {
      const g = sample();
      const children = g.childrenOf(5);

      expect(Array.from(children)).toEqual([4, 1]);
      expect(Array.from(children)).toEqual([]);
      expect(children.next()).toEqual({ done: true, value: undefined });
    });

    it('should be its own iterator', () => {
      const roots = sample().roots();

      expect(roots[Symbol.iterator]()).toBe(roots);
    });

    it('should start over only through a fresh iterator', () => {
      const g = sample();

      expect([...g.roots()]).toEqual([6, 5, 0]);
      expect([...g.roots()]).toEqual([6, 5, 0]);
    });

    it('should step one element at a time', () => {
      const descendants = sample().descendantsOf(5);

      expect(descendants.next()).toEqual({ done: false, value: 1 });
      expect(descendants.next()).toEqual({ done: false, value: 2 });
      expect(descendants.next()).toEqual({ done: false, value: 3 });
      expect(descendants.next()).toEqual({ done: false, value: 4 });
      expect(descendants.next().done).toBe(true);
    });
  });

  describe('bounds', () => {
    it('should fail at construction, not on first step', () => {
      const g = sample();

      expect(() => g.childrenOf(7)).toThrow(OutOfBoundsError);
      expect(() => g.descendantsOf(7)).toThrow(OutOfBoundsError);
      expect(() => new ChildIterator(g.records, 2, 3, 6)).toThrow('Index 2 is out of bounds [3, 6)');
      expect(() => new DescendantIterator(g.records, 6, 0, 6)).toThrow(OutOfBoundsError);
      expect(() => new RootIterator(g.records, 0, 8)).toThrow(OutOfBoundsError);
    });

    it('should reject a node whose subtree starts before the span', () => {
      const g = sample();

      expect(() => new ChildIterator(g.records, 5, 2, 6)).toThrow('Index 1 is out of bounds [2, 6)');
      expect(() => new DescendantIterator(g.records, 4, 3, 5)).toThrow('Index 2 is out of bounds [3, 5)');
      expect([...new ChildIterator(g.records, 4, 2, 5)]).toEqual([3, 2]);
    });

    it('should reject a root span that cuts through a tree', () => {
      const g = sample();

      expect(() => new RootIterator(g.records, 2, 6)).toThrow('Index 1 is out of bounds [2, 6)');
      expect(() => new RootIterator(g.records, 4, 5)).toThrow(OutOfBoundsError);
    });

    it('should ignore records appended after construction', () => {
      const g = sample();
      const roots = g.roots();
      const descendants = g.descendantsOf(5);
      g.pushLeaf('h');
      g.pushRoot('i', 2);

      expect([...roots]).toEqual([6, 5, 0]);
      expect([...descendants]).toEqual([1, 2, 3, 4]);
      expect([...g.roots()]).toEqual([8, 5, 0]);
    });
  });

  describe('orders', () => {
    it('should yield roots last tree first', () => {
      expect([...new RootIterator(sample().records, 0, 7)]).toEqual([6, 5, 0]);
    });

    it('should yield roots of a sub-span', () => {
      const g = sample();

      expect([...new RootIterator(g.records, 1, 5)]).toEqual([4, 1]);
      expect([...new RootIterator(g.records, 3, 3)]).toEqual([]);
    });

    it('should yield children rightmost first', () => {
      const g = sample();

      expect([...g.childrenOf(5)].map(i => g.valueAt(i))).toEqual(['e', 'b']);
      expect([...g.childrenOf(4)].map(i => g.valueAt(i))).toEqual(['d', 'c']);
    });

    it('should yield descendants children-before-parent', () => {
      const g = sample();

      expect([...g.descendantsOf(5)].map(i => g.valueAt(i))).toEqual(['b', 'c', 'd', 'e']);
    });

    it('should yield nothing for leaves and empty buffers', () => {
      const g = sample();
      const empty = new GroveBuf<string>();

      expect([...g.childrenOf(0)]).toEqual([]);
      expect([...g.descendantsOf(6)]).toEqual([]);
      expect([...empty.roots()]).toEqual([]);
    });
  });
});
