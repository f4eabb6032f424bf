// =============================================================================
// LeftistNode<T> — Exclusively owned tree cell with null-path length
// =============================================================================

export interface LeftistNode<T> {
  value: T;
  left: LeftistNode<T> | null;
  right: LeftistNode<T> | null;
  /** Shortest distance to an absent child: 1 for a leaf, 0 for null. */
  npl: number;
}

export function createNode<T>(value: T): LeftistNode<T> {
  return { value, left: null, right: null, npl: 1 };
}

export function npl<T>(node: LeftistNode<T> | null): number {
  return node ? node.npl : 0;
}

/**
 * Deep structural copy of a subtree, npl included. Failures of `copy` propagate
 * unwrapped; the source is only read, and a partial copy is unreachable.
 * Left spines can be as long as the tree, so the walk keeps its own stack.
 */
export function cloneTree<T>(
  node: LeftistNode<T> | null,
  copy: (value: T) => T,
): LeftistNode<T> | null {
  if (!node) return null;
  const root = copyCell(node, copy);
  const pending: Array<[LeftistNode<T>, LeftistNode<T>]> = [[node, root]];
  let next = pending.pop();
  while (next) {
    const [source, target] = next;
    if (source.left) {
      target.left = copyCell(source.left, copy);
      pending.push([source.left, target.left]);
    }
    if (source.right) {
      target.right = copyCell(source.right, copy);
      pending.push([source.right, target.right]);
    }
    next = pending.pop();
  }
  return root;
}

export function countNodes<T>(node: LeftistNode<T> | null): number {
  let count = 0;
  const pending: LeftistNode<T>[] = node ? [node] : [];
  let next = pending.pop();
  while (next) {
    count++;
    if (next.left) pending.push(next.left);
    if (next.right) pending.push(next.right);
    next = pending.pop();
  }
  return count;
}

function copyCell<T>(node: LeftistNode<T>, copy: (value: T) => T): LeftistNode<T> {
  return { value: copy(node.value), left: null, right: null, npl: node.npl };
}
