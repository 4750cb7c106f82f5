/**
 * Core module - constants, directions and geometry primitives.
 */

export * from "./constants";
export * from "./direction";
export * from "./geometry";
