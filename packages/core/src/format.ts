/**
 * Render a grove in `[children] => root` notation
 */

import type { ForestView } from './forest';

export function formatGrove<T>(view: ForestView<T>, format: (value: T) => string = String): string {
  return view
    .rootsForward()
    .map(root => formatNode(view, root, format))
    .join(', ');
}

function formatNode<T>(view: ForestView<T>, index: number, format: (value: T) => string): string {
  const label = format(view.valueAt(index));
  if (view.subtreeSizeAt(index) === 1) return label;
  const children = view.childrenLeftToRight(index).map(child => formatNode(view, child, format));
  return `[${children.join(', ')}] => ${label}`;
}
