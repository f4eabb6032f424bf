// =============================================================================
// meldqueue — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Heap
// ─────────────────────────────────────────────────────────────────────────────

export { LeftistHeap, naturalLess, reverseOrder, byKey } from "./heap/index.js";
export type { LessThan } from "./heap/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export { HeapOptionsSchema } from "./domain/heap-options.schema.js";
export type { LeftistHeapOptions } from "./domain/heap-options.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Errors & logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  QueueError,
  EmptyContainerError,
  OperationFailedError,
  InvalidOptionsError,
} from "./errors.js";
export type { MutatingOperation } from "./errors.js";
export { createConsoleLogger, noopLogger } from "./logging.js";
export type { Logger, LogEntry, LogLevel, ConsoleLoggerOptions } from "./logging.js";
