import type { FlatTree } from '../entities/FlatTree.js';

/**
 * Diagnostic text renderings of a tree. Both are built from the public API
 * only and return strings; where they are printed is up to the caller.
 */

export type ValueFormatter<T> = (value: T) => string;

const defaultFormat = <T>(value: T): string => String(value);

/**
 * Every slot as `value {parent}`, in position order, comma separated.
 *
 * @example
 * renderFlat(tree) // "root {0}, a {0}, b {1}"
 */
export function renderFlat<T>(tree: FlatTree<T>, format: ValueFormatter<T> = defaultFormat): string {
  const parts: string[] = [];
  for (const [, value, parent] of tree.entries()) {
    parts.push(`${format(value)} {${parent}}`);
  }
  return parts.join(', ');
}

/**
 * One line per distinct parent link, ascending: `parent: child,child`.
 *
 * Children come from `getDescendants`, which never lists the root's
 * children, so the root's line ends at the colon. Links that do not name a
 * slot (unassigned or dangling) are skipped.
 */
export function renderGrouped<T>(tree: FlatTree<T>, format: ValueFormatter<T> = defaultFormat): string {
  const parentLinks = new Set<number>();
  for (const [, , parent] of tree.entries()) {
    parentLinks.add(parent);
  }

  const lines: string[] = [];
  for (const parent of [...parentLinks].sort((a, b) => a - b)) {
    if (parent >= tree.size()) continue;

    const children: number[] = [];
    const name = format(tree.get(parent));
    if (!tree.getDescendants(parent, children)) {
      lines.push(`${name}:`);
      continue;
    }
    lines.push(`${name}: ${children.map((child) => format(tree.get(child))).join(',')}`);
  }

  return lines.join('\n');
}
