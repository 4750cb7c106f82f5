export * from "./gap-solver";
export * from "./types";
