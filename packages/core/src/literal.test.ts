/**
 * Tests for grove literals and formatting
 */

import { describe, it, expect } from 'vitest';
import { GroveBuf, appendItems, branch, formatGrove, grove, isBranch } from './index';

describe('grove literals', () => {
  it('should build the colour example', () => {
    const g = grove<string>(
      branch(['red', 'yellow', 'blue'], 'primary color'),
      branch(['left', 'right'], 'direction')
    );

    expect(g.length).toBe(7);
    expect(g.toArray().map(r => r.subtreeSize)).toEqual([1, 1, 1, 4, 1, 1, 3]);
    expect(g.toString()).toBe('[red, yellow, blue] => primary color, [left, right] => direction');
  });

  it('should build an empty grove', () => {
    const g = grove<number>();

    expect(g.isEmpty).toBe(true);
    expect(g.toString()).toBe('');
  });

  it('should build a path', () => {
    const g = grove<number>(branch([branch([3], 2)], 1));

    expect([...g.nodes()]).toEqual([3, 2, 1]);
    expect(g.toArray().map(r => r.subtreeSize)).toEqual([1, 2, 3]);
  });

  it('should mix leaves and trees at the top level', () => {
    const g = grove<number>(1, branch([2], 3), branch([4], 5), 6);

    expect(g.rootCount()).toBe(4);
    expect(g.toArray().map(r => r.subtreeSize)).toEqual([1, 1, 2, 1, 2, 1]);
    expect(g.toString()).toBe('1, [2] => 3, [4] => 5, 6');
  });

  it('should treat a branch with no children as a leaf', () => {
    const g = grove<string>(branch([], 'alone'));

    expect(g.subtreeSizeAt(0)).toBe(1);
    expect(g.toString()).toBe('alone');
  });

  it('should keep object values that merely look like branches', () => {
    const g = grove<{ children: string[]; root: string }>({ children: ['x'], root: 'y' });

    expect(g.length).toBe(1);
    expect(g.valueAt(0)).toEqual({ children: ['x'], root: 'y' });
    expect(isBranch<{ children: string[]; root: string }>(g.valueAt(0))).toBe(false);
  });

  it('should append items inside an open subtree', () => {
    const g = new GroveBuf<string>();
    const m = g.beginSubtree();
    appendItems(g, ['a', branch(['b'], 'c')]);
    g.sealSubtree('root', m);

    expect(g.toString()).toBe('[a, [b] => c] => root');
  });
});

describe('formatGrove', () => {
  it('should format values through the given function', () => {
    const g = grove<number>(branch([1, 2], 3));

    expect(formatGrove(g.view(), n => `#${n}`)).toBe('[#1, #2] => #3');
  });

  it('should format a sub-span on its own', () => {
    const g = grove<string>(branch([branch(['a'], 'b'), 'c'], 'd'));

    expect(formatGrove(g.view().descendantsView(3))).toBe('[a] => b, c');
  });
});
