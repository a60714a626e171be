export * from "./passes";
export * from "./simulation";
export * from "./stats";
