// =============================================================================
// Ordering predicates — less(a, b) means "a has strictly lower priority than b"
// =============================================================================

export type LessThan<T> = (a: T, b: T) => boolean;

/**
 * Natural `<` over numbers, bigints, strings and Dates. With this predicate the
 * heap exposes its maximum. Mixed or unsupported operands throw a TypeError.
 */
export function naturalLess(a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") return a < b;
  if (typeof a === "bigint" && typeof b === "bigint") return a < b;
  if (typeof a === "string" && typeof b === "string") return a < b;
  if (a instanceof Date && b instanceof Date) return a.getTime() < b.getTime();
  throw new TypeError(`No natural ordering between ${typeName(a)} and ${typeName(b)}`);
}

/** Flips a predicate: a max-heap ordering becomes a min-heap ordering. */
export function reverseOrder<T>(less: LessThan<T>): LessThan<T> {
  return (a, b) => less(b, a);
}

/** Orders records by a selected key, naturally unless a key predicate is given. */
export function byKey<T, K>(
  select: (item: T) => K,
  less: LessThan<K> = naturalLess,
): LessThan<T> {
  return (a, b) => less(select(a), select(b));
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Date) return "Date";
  return typeof value;
}
