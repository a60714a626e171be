export * from "./base-tiles";
export * from "./registry";
