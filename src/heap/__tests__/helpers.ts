import { LeftistHeap } from "../leftist-heap.js";
import { countNodes, type LeftistNode } from "../leftist-node.js";
import type { LeftistHeapOptions } from "../../domain/heap-options.schema.js";
import type { LessThan } from "../comparators.js";

/** Exposes the protected tree so tests can check the structural invariants. */
export class InspectableHeap<T> extends LeftistHeap<T> {
  get tree(): LeftistNode<T> | null {
    return this.root;
  }
}

export function build<T>(values: T[], options?: LeftistHeapOptions<T>): InspectableHeap<T> {
  const heap = new InspectableHeap<T>(options);
  for (const value of values) heap.push(value);
  return heap;
}

export interface Shape<T> {
  value: T;
  npl: number;
  left: Shape<T> | null;
  right: Shape<T> | null;
}

export function shape<T>(node: LeftistNode<T> | null): Shape<T> | null {
  if (!node) return null;
  return { value: node.value, npl: node.npl, left: shape(node.left), right: shape(node.right) };
}

/**
 * Returns the first broken invariant as a message, or null when the tree is
 * heap-ordered, leftist, npl-consistent and matches the cached size.
 */
export function findViolation<T>(heap: InspectableHeap<T>, less: LessThan<T>): string | null {
  const visit = (node: LeftistNode<T> | null): string | null => {
    if (!node) return null;
    for (const child of [node.left, node.right]) {
      if (child && less(node.value, child.value)) {
        return `child ${String(child.value)} outranks parent ${String(node.value)}`;
      }
    }
    const leftNpl = node.left ? node.left.npl : 0;
    const rightNpl = node.right ? node.right.npl : 0;
    if (leftNpl < rightNpl) return `npl(left) < npl(right) at ${String(node.value)}`;
    if (node.npl !== rightNpl + 1) return `stale npl at ${String(node.value)}`;
    return visit(node.left) ?? visit(node.right);
  };
  const violation = visit(heap.tree);
  if (violation) return violation;
  const count = countNodes(heap.tree);
  if (count !== heap.size()) return `size ${heap.size()} but ${count} reachable nodes`;
  if ((heap.tree === null) !== heap.empty()) return "root/empty mismatch";
  return null;
}

/** A numeric `<` that can be told to throw after a number of further calls. */
export function armedLess() {
  let remaining = Infinity;
  let calls = 0;
  const less: LessThan<number> = (a, b) => {
    calls++;
    if (remaining <= 0) throw new Error("comparator exploded");
    remaining--;
    return a < b;
  };
  return {
    less,
    failAfter(n: number): void {
      remaining = n;
    },
    disarm(): void {
      remaining = Infinity;
    },
    calls(): number {
      return calls;
    },
    resetCalls(): void {
      calls = 0;
    },
  };
}
