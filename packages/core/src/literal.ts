/**
 * Declarative grove literals
 *
 *   grove(
 *     branch(['red', 'yellow', 'blue'], 'primary color'),
 *     branch(['left', 'right'], 'direction'),
 *   )
 *
 * A plain item is a leaf; a branch is a subtree whose root comes last.
 */

import { BRANCH } from './internal';
import { GroveBuf } from './grove-buf';

export interface Branch<T> {
  readonly [BRANCH]: true;
  readonly children: readonly GroveItem<T>[];
  readonly root: T;
}

export type GroveItem<T> = T | Branch<T>;

export function branch<T>(children: readonly GroveItem<T>[], root: T): Branch<T> {
  return { [BRANCH]: true, children, root };
}

export function isBranch<T>(item: GroveItem<T>): item is Branch<T> {
  return typeof item === 'object' && item !== null && BRANCH in item;
}

export function grove<T>(...items: GroveItem<T>[]): GroveBuf<T> {
  return appendItems(new GroveBuf<T>(), items);
}

/**
 * Write `items` onto the end of `target` using only the public construction
 * surface.
 */
export function appendItems<T>(target: GroveBuf<T>, items: readonly GroveItem<T>[]): GroveBuf<T> {
  for (const item of items) {
    if (isBranch(item)) {
      const marker = target.beginSubtree();
      appendItems(target, item.children);
      target.sealSubtree(item.root, marker);
    } else {
      target.pushLeaf(item);
    }
  }
  return target;
}
