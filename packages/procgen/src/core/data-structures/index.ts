/**
 * Data structures used by the solver's selection and propagation loops.
 */

export { coordFromKey, coordKey, FastQueue } from "./fast-queue";
export { MinHeap, type MinHeapCompare } from "./min-heap";
