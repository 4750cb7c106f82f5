import type { CornerHeights } from "../faces/types";

/**
 * Inputs for a gap search on one edge or diagonal.
 */
export interface GapQuery {
  /** Floor height used when the sector has no floor */
  readonly fallbackFloor: number;
  /** Ceiling height used when the sector has no ceiling */
  readonly fallbackCeiling: number;
  /**
   * Height the user is pointing at. Only disambiguates between several
   * eligible gaps; never moves a gap.
   */
  readonly preferredY?: number;
}

export type GapFailureReason = "slot-full" | "no-gap";

/**
 * Either the corner heights [bottom-left, bottom-right, top-right, top-left]
 * of a wall that exactly fills one gap, or why there is none. Neither
 * failure is a fault: callers surface them as feedback.
 */
export type GapResult =
  | { readonly success: true; readonly heights: CornerHeights }
  | { readonly success: false; readonly reason: GapFailureReason };

/** Heights of the lower or upper boundary of a gap at its two corners. */
export interface GapBoundary {
  readonly left: number;
  readonly right: number;
}

export interface GapCandidate {
  readonly heights: CornerHeights;
  /** Larger of the two corner gaps */
  readonly size: number;
  /** Average of the four corner heights */
  readonly midpoint: number;
}
