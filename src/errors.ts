/**
 * Structured error hierarchy for meldqueue.
 *
 * All queue errors extend {@link QueueError} to enable type-safe catch blocks:
 *
 * ```ts
 * try {
 *   heap.pop();
 * } catch (e) {
 *   if (e instanceof EmptyContainerError) { ... }
 *   if (e instanceof OperationFailedError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all queue errors. Includes an error code for programmatic matching. */
export class QueueError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "QueueError";
    this.code = code;
  }
}

/** Thrown by `top()` and `pop()` on an empty heap, before anything is touched. */
export class EmptyContainerError extends QueueError {
  readonly operation: "top" | "pop";
  constructor(operation: "top" | "pop") {
    super("EMPTY_CONTAINER", `Cannot ${operation}() an empty heap`);
    this.name = "EmptyContainerError";
    this.operation = operation;
  }
}

export type MutatingOperation = "push" | "pop" | "merge";

/**
 * Thrown when a push, pop or merge could not complete because the ordering
 * predicate failed. The heap (and, for merge, the other heap) is exactly as it
 * was before the call.
 */
export class OperationFailedError extends QueueError {
  readonly operation: MutatingOperation;
  readonly cause: unknown;
  constructor(operation: MutatingOperation, cause: unknown) {
    super("OPERATION_FAILED", `${operation}() failed: ${describeCause(cause)}`);
    this.name = "OperationFailedError";
    this.operation = operation;
    this.cause = cause;
  }
}

/** Thrown when heap options fail validation. */
export class InvalidOptionsError extends QueueError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("INVALID_OPTIONS", field ? `Invalid "${field}": ${message}` : message);
    this.name = "InvalidOptionsError";
    this.field = field;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
