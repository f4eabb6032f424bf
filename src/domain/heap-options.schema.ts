// =============================================================================
// Heap Options Schema — Configuration accepted by LeftistHeap
// =============================================================================

import { z } from "zod";
import { InvalidOptionsError } from "../errors.js";
import { naturalLess, type LessThan } from "../heap/comparators.js";
import { noopLogger, type Logger } from "../logging.js";

const fn = () =>
  z.custom<(...args: never[]) => unknown>((value) => typeof value === "function", {
    message: "Expected a function",
  });

export const HeapOptionsSchema = z
  .object({
    less: fn().optional(),
    copy: fn().optional(),
    logger: fn().optional(),
  })
  .strict();

export interface LeftistHeapOptions<T> {
  /** Ordering predicate: true when `a` has strictly lower priority than `b` (default: natural `<`, max on top) */
  less?: LessThan<T>;
  /** Duplicates an element when the heap is cloned or assigned (default: identity) */
  copy?: (value: T) => T;
  /** Receives structured heap events (default: silent) */
  logger?: Logger;
}

export interface ResolvedHeapOptions<T> {
  less: LessThan<T>;
  copy: (value: T) => T;
  logger: Logger;
}

export function resolveHeapOptions<T>(options?: LeftistHeapOptions<T>): ResolvedHeapOptions<T> {
  const result = HeapOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new InvalidOptionsError(issue?.message ?? "Invalid heap options", field);
  }
  return {
    less: options?.less ?? naturalLess,
    copy: options?.copy ?? identity,
    logger: options?.logger ?? noopLogger,
  };
}

function identity<T>(value: T): T {
  return value;
}
