export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/config";
export * from "./schemas/map";
export * from "./types/error";
export * from "./types/geometry";
export * from "./types/result";
export * from "./utils/logger";
