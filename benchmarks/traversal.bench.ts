/**
 * Benchmark: flat grove vs pointer-based object trees
 */

import { bench, describe } from 'vitest';
import { GroveBuf } from '../packages/core/src/index';

// ===== Setup =====
const FANOUT = 8;
const DEPTH = 4; // 8^0 + ... + 8^4 = 4681 nodes

interface ObjNode {
  value: number;
  children: ObjNode[];
}

function buildObject(depth: number, counter: { next: number }): ObjNode {
  const children: ObjNode[] = [];
  if (depth > 0) {
    for (let i = 0; i < FANOUT; i++) children.push(buildObject(depth - 1, counter));
  }
  return { value: counter.next++, children };
}

function buildGrove(g: GroveBuf<number>, depth: number, counter: { next: number }): void {
  const marker = g.beginSubtree();
  if (depth > 0) {
    for (let i = 0; i < FANOUT; i++) buildGrove(g, depth - 1, counter);
  }
  g.sealSubtree(counter.next++, marker);
}

function sumObject(node: ObjNode): number {
  let total = node.value;
  for (const child of node.children) total += sumObject(child);
  return total;
}

const objTree = buildObject(DEPTH, { next: 0 });
const flat = new GroveBuf<number>();
buildGrove(flat, DEPTH, { next: 0 });
const flatRoot = flat.length - 1;

// Keeps results observable so the work is not optimised away
let sink = 0;

// ===== Construction =====
describe(`Build ${flat.length} nodes`, () => {
  bench('Object tree', () => {
    buildObject(DEPTH, { next: 0 });
  });

  bench('GroveBuf begin/seal', () => {
    buildGrove(new GroveBuf<number>(), DEPTH, { next: 0 });
  });
});

// ===== Whole-tree aggregation =====
describe('Sum every value', () => {
  bench('Object tree (recursive)', () => {
    sink = sumObject(objTree);
  });

  bench('GroveBuf (storage scan)', () => {
    let total = 0;
    for (const v of flat.nodes()) total += v;
    sink = total;
  });

  bench('GroveBuf foldUp', () => {
    [sink] = flat.view().foldUp<number>((v, children) => {
      let total = v;
      for (const c of children) total += c;
      return total;
    });
  });
});

// ===== Children of the root =====
describe('Enumerate root children', () => {
  bench('Object tree', () => {
    let n = 0;
    for (const child of objTree.children) n += child.value;
    sink = n;
  });

  bench('GroveBuf childrenOf', () => {
    let n = 0;
    for (const child of flat.childrenOf(flatRoot)) n += flat.valueAt(child);
    sink = n;
  });
});

export { sink };
