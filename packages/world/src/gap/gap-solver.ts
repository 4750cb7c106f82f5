/**
 * Gap solver: where does the next wall on an edge go?
 *
 * A slot holds at most three walls. An empty slot is filled floor to
 * ceiling (or, on a steep span, with a triangle following the floor or the
 * ceiling). Otherwise the solver looks at every vertical gap between floor,
 * existing walls and ceiling, keeps the ones at least MIN_GAP tall at one of
 * their two corners, and picks one.
 *
 * Ties (equal size without a preferred height, or equal distance to it)
 * resolve to the lowest gap.
 */

import { HEIGHT_EPSILON, MIN_GAP } from "../core/constants";
import type { DiagonalDirection, Direction } from "../core/direction";
import type { HorizontalFace } from "../faces/horizontal-face";
import type { Coverage, CornerHeights } from "../faces/types";
import type { VerticalFace } from "../faces/vertical-face";
import type { Sector } from "../sector/sector";
import type {
  GapBoundary,
  GapCandidate,
  GapQuery,
  GapResult,
} from "./types";

const SLOT_FULL: GapResult = { success: false, reason: "slot-full" };
const NO_GAP: GapResult = { success: false, reason: "no-gap" };

/** A corner gap this tall or taller is fillable. */
const FIT_THRESHOLD = MIN_GAP - HEIGHT_EPSILON;

// =============================================================================
// BOUNDARIES
// =============================================================================

function faceBoundary(
  face: HorizontalFace | null,
  direction: Direction,
  fallback: number,
): GapBoundary {
  if (face === null) return { left: fallback, right: fallback };
  const [left, right] = face.edgeHeights(direction);
  return { left, right };
}

/** Top edge of a wall, as the lower boundary of the gap above it */
function wallTop(wall: VerticalFace): GapBoundary {
  return { left: wall.leftCoverage().top, right: wall.rightCoverage().top };
}

/** Bottom edge of a wall, as the upper boundary of the gap below it */
function wallBottom(wall: VerticalFace): GapBoundary {
  return {
    left: wall.leftCoverage().bottom,
    right: wall.rightCoverage().bottom,
  };
}

function hasExtent(heights: CornerHeights): boolean {
  const [bl, br, tr, tl] = heights;
  return Math.max(tl - bl, tr - br) > HEIGHT_EPSILON;
}

// =============================================================================
// EMPTY SLOT
// =============================================================================

/**
 * Wall for an empty slot. A span whose floor or ceiling drops more than
 * MIN_GAP between its corners is ambiguous: with a preferred height, offer
 * the triangle below the higher floor corner (following the floor) or the
 * part above it (following the ceiling).
 */
function fillEmptySlot(
  floor: GapBoundary,
  ceiling: GapBoundary,
  preferredY: number | undefined,
): CornerHeights {
  const full: CornerHeights = [floor.left, floor.right, ceiling.right, ceiling.left];
  const sloped =
    Math.abs(floor.left - floor.right) > MIN_GAP ||
    Math.abs(ceiling.left - ceiling.right) > MIN_GAP;

  if (!sloped || preferredY === undefined) return full;

  // Top corners stay between their own floor and the pivot (lower fill) or
  // at or above the pivot (upper fill), so neither fill turns inside out.
  const pivot = Math.max(floor.left, floor.right);
  const lower: CornerHeights = [
    floor.left,
    floor.right,
    Math.max(floor.right, Math.min(pivot, ceiling.right)),
    Math.max(floor.left, Math.min(pivot, ceiling.left)),
  ];
  const upper: CornerHeights = [
    pivot,
    pivot,
    Math.max(pivot, ceiling.right),
    Math.max(pivot, ceiling.left),
  ];
  const midpoint = (pivot + Math.min(ceiling.left, ceiling.right)) / 2;

  const [preferred, other]: readonly [CornerHeights, CornerHeights] =
    preferredY < midpoint ? [lower, upper] : [upper, lower];
  return hasExtent(preferred) ? preferred : other;
}

// =============================================================================
// STACKED SLOT
// =============================================================================

/**
 * Collapse a corner that cannot hold a gap to a single height, never above
 * the upper boundary.
 */
function collapse(lower: number, upper: number): Coverage {
  const height = Math.min(lower, upper);
  return { bottom: height, top: height };
}

function fitGap(lower: GapBoundary, upper: GapBoundary): GapCandidate | undefined {
  const leftGap = upper.left - lower.left;
  const rightGap = upper.right - lower.right;
  const leftFits = leftGap >= FIT_THRESHOLD;
  const rightFits = rightGap >= FIT_THRESHOLD;

  if (!leftFits && !rightFits) return undefined;

  const left = leftFits
    ? { bottom: lower.left, top: upper.left }
    : collapse(lower.left, upper.left);
  const right = rightFits
    ? { bottom: lower.right, top: upper.right }
    : collapse(lower.right, upper.right);

  const heights: CornerHeights = [left.bottom, right.bottom, right.top, left.top];
  return {
    heights,
    size: Math.max(leftGap, rightGap),
    midpoint: (left.bottom + right.bottom + right.top + left.top) / 4,
  };
}

/**
 * Every fillable gap, bottom to top: below the lowest wall, between each
 * consecutive pair, above the highest.
 */
export function collectGapCandidates(
  walls: readonly VerticalFace[],
  floor: GapBoundary,
  ceiling: GapBoundary,
): GapCandidate[] {
  const sorted = [...walls].sort((a, b) => a.yBottom() - b.yBottom());
  const candidates: GapCandidate[] = [];

  for (let i = 0; i <= sorted.length; i++) {
    const below = sorted[i - 1];
    const above = sorted[i];
    const lower = below ? wallTop(below) : floor;
    const upper = above ? wallBottom(above) : ceiling;
    const candidate = fitGap(lower, upper);
    if (candidate) candidates.push(candidate);
  }

  return candidates;
}

/**
 * Nearest midpoint to the preferred height, else the largest gap. Strict
 * comparisons keep the earliest (lowest) candidate on ties.
 */
export function pickGapCandidate(
  candidates: readonly GapCandidate[],
  preferredY?: number,
): GapCandidate | undefined {
  let best: GapCandidate | undefined;
  let bestScore = Infinity;

  for (const candidate of candidates) {
    const score =
      preferredY === undefined
        ? -candidate.size
        : Math.abs(candidate.midpoint - preferredY);
    if (score < bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Corner heights of the next wall that fits on `direction`, or why none does.
 */
export function nextWallPosition(
  sector: Sector,
  direction: Direction,
  query: GapQuery,
): GapResult {
  const stack = sector.wallStack(direction);
  if (stack.isFull()) return SLOT_FULL;

  const floor = faceBoundary(sector.floor, direction, query.fallbackFloor);
  const ceiling = faceBoundary(sector.ceiling, direction, query.fallbackCeiling);

  if (stack.isEmpty()) {
    return {
      success: true,
      heights: fillEmptySlot(floor, ceiling, query.preferredY),
    };
  }

  const candidate = pickGapCandidate(
    collectGapCandidates(stack.walls, floor, ceiling),
    query.preferredY,
  );
  return candidate ? { success: true, heights: candidate.heights } : NO_GAP;
}

/**
 * Same policy on a diagonal, bounded by NW/SE or NE/SW.
 */
export function nextDiagonalWallPosition(
  sector: Sector,
  diagonal: DiagonalDirection,
  query: GapQuery,
): GapResult {
  return nextWallPosition(sector, diagonal, query);
}
