// =============================================================================
// Heap — Public API
// =============================================================================

export { LeftistHeap } from "./leftist-heap.js";
export { naturalLess, reverseOrder, byKey } from "./comparators.js";
export type { LessThan } from "./comparators.js";
