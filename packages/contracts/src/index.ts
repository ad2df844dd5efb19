export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/level-config";
export * from "./types/error";
export * from "./types/level";
