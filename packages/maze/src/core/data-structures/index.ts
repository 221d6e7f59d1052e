/**
 * Data structures backing the generators and searches.
 */

export { CoordSet } from "./coord-set";
export { FastQueue } from "./fast-queue";
export { MinHeap, type MinHeapCompare } from "./min-heap";
