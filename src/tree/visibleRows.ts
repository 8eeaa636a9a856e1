import type { LazyNode } from "./LazyNode";
import type { LazyTree } from "./LazyTree";

export interface VisibleRow {
  node: LazyNode;
  depth: number;
  /** Position in the full flattened list */
  index: number;
}

export interface VisibleRowsOptions {
  offset?: number;
  limit?: number;
}

function* flatten(tree: LazyTree): Generator<LazyNode> {
  const stack: LazyNode[] = [tree.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;
    if (node.expanded && node.loaded && node.children) {
      for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
    }
  }
}

/**
 * Rows a tree widget shows: the root, then the children of every expanded
 * and loaded node, in document order.
 */
export function visibleRows(tree: LazyTree, options: VisibleRowsOptions = {}): VisibleRow[] {
  const offset = Math.max(0, options.offset ?? 0);
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  const rows: VisibleRow[] = [];
  let index = 0;

  for (const node of flatten(tree)) {
    if (rows.length >= limit) break;
    if (index >= offset) rows.push({ node, depth: node.depth, index });
    index++;
  }
  return rows;
}

export function countVisibleRows(tree: LazyTree): number {
  const rows = flatten(tree);
  let count = 0;
  while (!rows.next().done) count++;
  return count;
}
