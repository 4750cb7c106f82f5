export * from "./schemas/faces";
export * from "./schemas/level";
export * from "./schemas/limits";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
export * from "./utils/issues";
