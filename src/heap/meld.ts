// =============================================================================
// meld — Merge two leftist subtrees along their right spines
// =============================================================================

import type { LessThan } from "./comparators.js";
import { npl, type LeftistNode } from "./leftist-node.js";

export type MeldOutcome<T> =
  | { ok: true; node: LeftistNode<T> | null }
  | { ok: false; error: unknown };

/**
 * Merges two heap-ordered leftist subtrees into one, reusing their nodes.
 *
 * A frame touches its winning node only after the deeper meld has succeeded,
 * so a failed outcome means neither input was modified. Depth is bounded by
 * the two right spines, O(log n).
 */
export function meld<T>(
  a: LeftistNode<T> | null,
  b: LeftistNode<T> | null,
  less: LessThan<T>,
): MeldOutcome<T> {
  if (!a) return { ok: true, node: b };
  if (!b) return { ok: true, node: a };

  let aLoses: boolean;
  try {
    aLoses = less(a.value, b.value);
  } catch (error) {
    return { ok: false, error };
  }
  const winner = aLoses ? b : a;
  const loser = aLoses ? a : b;

  const merged = meld(winner.right, loser, less);
  if (!merged.ok) return merged;

  winner.right = merged.node;
  if (npl(winner.left) < npl(winner.right)) {
    const left = winner.left;
    winner.left = winner.right;
    winner.right = left;
  }
  winner.npl = npl(winner.right) + 1;
  return { ok: true, node: winner };
}
