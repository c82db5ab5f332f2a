/**
 * Bottom-up aggregation - total file sizes per folder in one pass
 */

import { branch, grove } from '../packages/core/src/index';

interface Entry {
  name: string;
  bytes: number;
}

const file = (name: string, bytes: number): Entry => ({ name, bytes });
const folder = (name: string): Entry => ({ name, bytes: 0 });

const fs = grove<Entry>(
  branch(
    [
      branch([file('index.ts', 1200), file('forest.ts', 5400)], folder('src')),
      branch([file('forest.test.ts', 8100)], folder('test')),
      file('package.json', 600),
    ],
    folder('core')
  )
);

console.log('=== Folder sizes via foldUp ===\n');

const lines: string[] = [];
fs.view().foldUp<number>((entry, children) => {
  const total = entry.bytes + children.reduce((a, b) => a + b, 0);
  lines.push(`${entry.name.padEnd(16)} ${String(total).padStart(6)} bytes`);
  return total;
});

// Storage order lists every entry after its contents
for (const line of lines) console.log(line);
