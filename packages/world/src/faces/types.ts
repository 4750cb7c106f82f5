import type { Vec2 } from "../core/geometry/types";

export type {
  BlendMode,
  FaceNormalMode,
  SplitDirection,
  UvProjection,
} from "@sectorforge/contracts";

/**
 * Four corner heights. Floors and ceilings order them [NW, NE, SE, SW];
 * walls order them [bottom-left, bottom-right, top-right, top-left].
 */
export type CornerHeights = [number, number, number, number];

/** Texture coordinates per corner, in the face's corner order. */
export type UvQuad = readonly [Vec2, Vec2, Vec2, Vec2];

/**
 * Wall corner indices into `VerticalFace.heights`.
 */
export const WallCorner = {
  BottomLeft: 0,
  BottomRight: 1,
  TopRight: 2,
  TopLeft: 3,
} as const;

export type WallCorner = (typeof WallCorner)[keyof typeof WallCorner];

/** Vertical extent of one side of a wall. */
export interface Coverage {
  readonly bottom: number;
  readonly top: number;
}
