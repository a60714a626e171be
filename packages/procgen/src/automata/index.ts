export * from "./engine";
export * from "./neighbor-counts";
export * from "./rules";
