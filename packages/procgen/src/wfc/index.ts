export * from "./adjacency";
export * from "./solver";
export * from "./violations";
export { countBits32, fullMask, lowestBitIndex, Wave, wordCount } from "./wave";
