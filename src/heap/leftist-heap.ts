// =============================================================================
// LeftistHeap<T> — Mergeable priority queue with strong failure guarantees
// =============================================================================

import { EmptyContainerError, OperationFailedError, type MutatingOperation } from "../errors.js";
import {
  resolveHeapOptions,
  type LeftistHeapOptions,
  type ResolvedHeapOptions,
} from "../domain/heap-options.schema.js";
import { emit } from "../logging.js";
import { cloneTree, createNode, type LeftistNode } from "./leftist-node.js";
import { meld } from "./meld.js";

/**
 * A leftist heap exposing its highest-priority element.
 *
 * `top` is O(1); `push`, `pop` and `merge` are O(log n). The ordering predicate
 * is caller code and may throw: any push, pop or merge it breaks is rolled back
 * and reported as an {@link OperationFailedError}.
 *
 * ```ts
 * const heap = LeftistHeap.from([5, 3, 8, 1]);
 * heap.top(); // 8
 * ```
 */
export class LeftistHeap<T> {
  protected root: LeftistNode<T> | null = null;
  private count = 0;
  private options: ResolvedHeapOptions<T>;

  constructor(options?: LeftistHeapOptions<T>) {
    this.options = resolveHeapOptions(options);
  }

  static from<T>(values: Iterable<T>, options?: LeftistHeapOptions<T>): LeftistHeap<T> {
    const heap = new LeftistHeap<T>(options);
    for (const value of values) heap.push(value);
    return heap;
  }

  // ── Accessors ──────────────────────────────────────────────────────────────

  size(): number {
    return this.count;
  }

  empty(): boolean {
    return this.count === 0;
  }

  top(): T {
    if (!this.root) throw new EmptyContainerError("top");
    return this.root.value;
  }

  // ── Mutations ──────────────────────────────────────────────────────────────

  push(value: T): void {
    const node = createNode(value);
    const outcome = meld(this.root, node, this.options.less);
    if (!outcome.ok) throw this.rollback("push", outcome.error);
    this.root = outcome.node;
    this.count++;
  }

  /** Removes and returns the highest-priority element. */
  pop(): T {
    const old = this.root;
    if (!old) throw new EmptyContainerError("pop");
    const outcome = meld(old.left, old.right, this.options.less);
    if (!outcome.ok) throw this.rollback("pop", outcome.error);
    this.root = outcome.node;
    this.count--;
    old.left = null;
    old.right = null;
    return old.value;
  }

  /**
   * Moves every element of `other` into this heap, leaving `other` empty.
   * If the merge fails both heaps keep their contents.
   */
  merge(other: LeftistHeap<T>): void {
    if (other === this || other.empty()) return;
    const outcome = meld(this.root, other.root, this.options.less);
    if (!outcome.ok) throw this.rollback("merge", outcome.error);
    const absorbed = other.count;
    this.root = outcome.node;
    this.count += absorbed;
    other.root = null;
    other.count = 0;
    emit(this.options.logger, "debug", "heap:merge", { absorbed, size: this.count });
  }

  clear(): void {
    this.root = null;
    this.count = 0;
  }

  // ── Copying ────────────────────────────────────────────────────────────────

  /** Independent deep copy sharing the ordering, copy strategy and logger. */
  clone(): LeftistHeap<T> {
    const copy = new LeftistHeap<T>(this.options);
    copy.root = cloneTree(this.root, this.options.copy);
    copy.count = this.count;
    return copy;
  }

  /**
   * Replaces this heap's state with a deep copy of `other`. The copy is built
   * before anything is discarded, so a failing copy leaves this heap as it was.
   */
  assign(other: LeftistHeap<T>): this {
    if (other === this) return this;
    const root = cloneTree(other.root, other.options.copy);
    this.root = root;
    this.count = other.count;
    this.options = other.options;
    emit(this.options.logger, "debug", "heap:assign", { size: this.count });
    return this;
  }

  // ── Draining ───────────────────────────────────────────────────────────────

  /** Pops until empty, yielding elements in non-increasing priority. */
  *drain(): Generator<T, void, undefined> {
    while (!this.empty()) yield this.pop();
  }

  /** Elements in pop order, leaving this heap untouched. */
  toSortedArray(): T[] {
    return Array.from(this.clone().drain());
  }

  private rollback(operation: MutatingOperation, cause: unknown): OperationFailedError {
    const error = new OperationFailedError(operation, cause);
    emit(this.options.logger, "warn", "heap:rollback", { operation, size: this.count });
    return error;
  }
}
