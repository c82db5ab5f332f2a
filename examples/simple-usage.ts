/**
 * Simple usage - build a grove, then walk it
 */

import { GroveBuf } from '../packages/core/src/index';

console.log('=== flatgrove: build & navigate ===\n');

// ===== Build with begin / seal =====
console.log('1️⃣ Build two trees with beginSubtree / sealSubtree');
const g = new GroveBuf<string>();

const primary = g.beginSubtree();
g.pushLeaf('red');
g.pushLeaf('yellow');
g.pushLeaf('blue');
g.sealSubtree('primary color', primary);

const direction = g.beginSubtree();
g.pushLeaf('left');
g.pushLeaf('right');
g.sealSubtree('direction', direction);

console.log('Grove:', g.toString());
console.log('Records:', g.toArray());

// ===== Roots =====
console.log('\n2️⃣ Roots (last tree first)');
for (const root of g.roots()) {
  console.log(`  #${root}`, g.valueAt(root), `(size ${g.subtreeSizeAt(root)})`);
}
console.log('Forward order:', g.view().rootsForward());

// ===== Children =====
console.log('\n3️⃣ Children of "primary color" (rightmost first)');
const root = g.nthRootFromEnd(1);
console.log('  ', [...g.childrenOf(root)].map(i => g.valueAt(i)));

// ===== Descendants =====
console.log('\n4️⃣ Descendants of "direction" (storage order)');
console.log('  ', [...g.descendantsOf(g.nthRootFromEnd(0))].map(i => g.valueAt(i)));

// ===== Append =====
console.log('\n5️⃣ Append a copy of the first tree');
const range = g.appendTree(g.tree(root));
console.log('Copied into', range, '→', g.toString());
console.log('✅ Earlier indices still valid:', g.valueAt(root));
