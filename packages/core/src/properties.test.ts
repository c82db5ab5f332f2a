/**
 * Structural properties checked over generated groves
 */

import { describe, it, expect } from 'vitest';
import { GroveBuf, branch, grove, isBranch, type GroveItem } from './index';

// Deterministic PRNG so every run sees the same groves
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Values are numbered in storage order: children before their root
function randomItems(rand: () => number, depth: number, counter: { next: number }): GroveItem<number>[] {
  const items: GroveItem<number>[] = [];
  const count = Math.floor(rand() * 4);
  for (let i = 0; i < count; i++) {
    if (depth > 0 && rand() < 0.5) {
      const children = randomItems(rand, depth - 1, counter);
      items.push(branch(children, counter.next++));
    } else {
      items.push(counter.next++);
    }
  }
  return items;
}

function withBuilder(items: readonly GroveItem<number>[]): GroveBuf<number> {
  const g = new GroveBuf<number>();
  const b = g.builder();
  const write = (list: readonly GroveItem<number>[]): void => {
    for (const item of list) {
      if (isBranch(item)) {
        b.open();
        write(item.children);
        b.close(item.root);
      } else {
        b.push(item);
      }
    }
  };
  write(items);
  return b.build();
}

function withPushRoot(items: readonly GroveItem<number>[]): GroveBuf<number> {
  const g = new GroveBuf<number>();
  const write = (list: readonly GroveItem<number>[]): void => {
    for (const item of list) {
      if (isBranch(item)) {
        write(item.children);
        g.pushRoot(item.root, item.children.length);
      } else {
        g.pushLeaf(item);
      }
    }
  };
  write(items);
  return g;
}

const SEEDS = Array.from({ length: 40 }, (_, i) => i + 1);

const cases = SEEDS.map(seed => {
  const items = randomItems(mulberry32(seed), 4, { next: 0 });
  return { seed, items, g: grove<number>(...items) };
});

describe('grove properties', () => {
  it('should generate non-trivial groves', () => {
    const total = cases.reduce((n, c) => n + c.g.length, 0);
    expect(total).toBeGreaterThan(SEEDS.length);
  });

  it.each(cases)('seed $seed: values follow storage order', ({ g }) => {
    expect([...g.nodes()]).toEqual(Array.from({ length: g.length }, (_, i) => i));
  });

  it.each(cases)('seed $seed: each size is one plus the sizes of its children', ({ g }) => {
    for (let p = 0; p < g.length; p++) {
      let sum = 0;
      for (const c of g.childrenOf(p)) sum += g.subtreeSizeAt(c);
      expect(g.subtreeSizeAt(p)).toBe(1 + sum);
    }
  });

  it.each(cases)('seed $seed: root sizes add up to the buffer length', ({ g }) => {
    let sum = 0;
    for (const r of g.roots()) sum += g.subtreeSizeAt(r);
    expect(sum).toBe(g.length);
  });

  it.each(cases)('seed $seed: reversed roots match the forward scan', ({ g }) => {
    const view = g.view();
    expect([...view.roots()].reverse()).toEqual(view.rootsForward());
    expect(view.rootCount()).toBe(view.rootsForward().length);
  });

  it.each(cases)('seed $seed: descendants cover the span before each node', ({ g }) => {
    for (let p = 0; p < g.length; p++) {
      const start = p - g.subtreeSizeAt(p) + 1;
      expect([...g.descendantsOf(p)]).toEqual(Array.from({ length: p - start }, (_, i) => start + i));
    }
  });

  it.each(cases)('seed $seed: reverse post-order is reversed post-order', ({ g }) => {
    expect([...g.nodes('reverse-postorder')]).toEqual([...g.nodes('postorder')].reverse());
  });

  it.each(cases)('seed $seed: counting fold reproduces the sizes', ({ g }) => {
    const counted = new Map<number, number>();
    g.view().foldUp((_, children: number[], index) => {
      const size = 1 + children.reduce((a, b) => a + b, 0);
      counted.set(index, size);
      return size;
    });
    for (let p = 0; p < g.length; p++) {
      expect(counted.get(p)).toBe(g.subtreeSizeAt(p));
    }
  });

  it.each(cases)('seed $seed: every construction path agrees', ({ g, items }) => {
    expect(withBuilder(items).equals(g)).toBe(true);
    expect(withPushRoot(items).equals(g)).toBe(true);
    expect(GroveBuf.from(g.toArray()).equals(g)).toBe(true);
  });
});
