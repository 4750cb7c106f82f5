/**
 * Core Constants
 *
 * Fixed numeric contract of the geometry engine. None of these are
 * per-instance configuration.
 */

export { MAX_WALLS_PER_EDGE, NEUTRAL_CHANNEL } from "@sectorforge/contracts";

// =============================================================================
// GRID
// =============================================================================

/** Edge length of one grid cell in world units */
export const SECTOR_SIZE = 1024;

// =============================================================================
// HEIGHTS
// =============================================================================

/** One "click": the smallest vertical gap treated as fillable (quarter sector) */
export const MIN_GAP = 256;

/** Tolerance for height equality checks */
export const HEIGHT_EPSILON = 0.001;

// =============================================================================
// DEFAULTS
// =============================================================================

/** Default room ambient light level */
export const DEFAULT_AMBIENT = 0.5;

/** Default floor-to-ceiling height for a fresh sector (four clicks) */
export const DEFAULT_CEILING_HEIGHT = 1024;
