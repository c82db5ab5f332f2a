/**
 * Three APIs Demo: begin/seal, builder(), grove()
 *
 * Three ways to describe the same nesting, all producing identical buffers
 */

import { GroveBuf, branch, grove } from '../packages/core/src/index';

console.log('=== Three APIs: begin/seal, builder(), grove() ===\n');

// ===== begin / seal =====
console.log('1️⃣ beginSubtree() / sealSubtree()');
console.log('─'.repeat(50));

const sealed = new GroveBuf<number>();
const outer = sealed.beginSubtree();
const inner = sealed.beginSubtree();
sealed.pushLeaf(1);
sealed.pushLeaf(2);
sealed.sealSubtree(3, inner);
sealed.pushLeaf(4);
sealed.sealSubtree(5, outer);
console.log('Result:', sealed.toString());

// ===== builder =====
console.log('\n2️⃣ builder() - fluent open / push / close');
console.log('─'.repeat(50));

const built = new GroveBuf<number>()
  .builder()
  .open()
  .open().push(1).push(2).close(3)
  .push(4)
  .close(5)
  .build();
console.log('Result:', built.toString());

// ===== literal =====
console.log('\n3️⃣ grove() - declarative literal');
console.log('─'.repeat(50));

const literal = grove<number>(branch([branch([1, 2], 3), 4], 5));
console.log('Result:', literal.toString());

console.log('\nAll equal:', sealed.equals(built) && built.equals(literal));

// ===== misuse =====
console.log('\n4️⃣ Sealing out of order is rejected');
const bad = new GroveBuf<number>();
const a = bad.beginSubtree();
bad.beginSubtree();
try {
  bad.sealSubtree(0, a);
} catch (err) {
  console.log('Rejected:', err instanceof Error ? err.message : err);
}
console.log('Buffer untouched, length =', bad.length);
