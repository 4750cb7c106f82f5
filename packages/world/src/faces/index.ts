/**
 * Face primitives - floors, ceilings, walls and what they reference.
 */

export * from "./color";
export * from "./horizontal-face";
export * from "./texture-ref";
export * from "./types";
export * from "./vertical-face";
