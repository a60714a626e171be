export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/seed";
export * from "./schemas/simulation";
export * from "./types/error";
export * from "./types/result";
export * from "./types/terrain";
export * from "./utils/builder";
