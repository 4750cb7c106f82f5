/**
 * Floor or ceiling face of a sector.
 */

import { HEIGHT_EPSILON } from "../core/constants";
import { Corner, type Direction, EDGE_CORNERS } from "../core/direction";
import {
  type Color,
  type CornerColors,
  isUniform,
  NEUTRAL_COLOR,
  uniformColors,
} from "./color";
import type { TextureRef } from "./texture-ref";
import type {
  BlendMode,
  CornerHeights,
  FaceNormalMode,
  SplitDirection,
  UvQuad,
} from "./types";

export type TriangleCorners = readonly [Corner, Corner, Corner];

/**
 * The two triangles each split produces. Triangle 1 takes the face's
 * primary texture/uv/colors, triangle 2 the `*2` overrides when present.
 */
export const SPLIT_TRIANGLES: Readonly<
  Record<SplitDirection, readonly [TriangleCorners, TriangleCorners]>
> = {
  "nw-se": [
    [Corner.NW, Corner.NE, Corner.SE],
    [Corner.NW, Corner.SE, Corner.SW],
  ],
  "ne-sw": [
    [Corner.NW, Corner.NE, Corner.SW],
    [Corner.NE, Corner.SE, Corner.SW],
  ],
};

export interface HorizontalFaceOptions {
  readonly splitDirection?: SplitDirection;
  readonly uv?: UvQuad | null;
  readonly colors?: CornerColors;
  readonly texture2?: TextureRef | null;
  readonly uv2?: UvQuad | null;
  readonly colors2?: CornerColors | null;
  readonly walkable?: boolean;
  readonly blendMode?: BlendMode;
  readonly normalMode?: FaceNormalMode;
  readonly blackTransparent?: boolean;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export class HorizontalFace {
  /** Corner heights [NW, NE, SE, SW] */
  heights: CornerHeights;
  texture: TextureRef;
  splitDirection: SplitDirection;
  /** Custom UVs; null = default 0,0 to 1,1 */
  uv: UvQuad | null;
  colors: CornerColors;
  texture2: TextureRef | null;
  uv2: UvQuad | null;
  colors2: CornerColors | null;
  /** Walkable for collision/AI */
  walkable: boolean;
  blendMode: BlendMode;
  normalMode: FaceNormalMode;
  /** Treat pure black texels as transparent */
  blackTransparent: boolean;

  constructor(
    heights: CornerHeights,
    texture: TextureRef,
    options: HorizontalFaceOptions = {},
  ) {
    this.heights = [...heights];
    this.texture = texture;
    this.splitDirection = options.splitDirection ?? "nw-se";
    this.uv = options.uv ?? null;
    this.colors = options.colors ?? uniformColors(NEUTRAL_COLOR);
    this.texture2 = options.texture2 ?? null;
    this.uv2 = options.uv2 ?? null;
    this.colors2 = options.colors2 ?? null;
    this.walkable = options.walkable ?? true;
    this.blendMode = options.blendMode ?? "opaque";
    this.normalMode = options.normalMode ?? "front";
    this.blackTransparent = options.blackTransparent ?? true;
  }

  static flat(
    height: number,
    texture: TextureRef,
    options?: HorizontalFaceOptions,
  ): HorizontalFace {
    return new HorizontalFace([height, height, height, height], texture, options);
  }

  static sloped(
    heights: CornerHeights,
    texture: TextureRef,
    options?: HorizontalFaceOptions,
  ): HorizontalFace {
    return new HorizontalFace(heights, texture, options);
  }

  // ===========================================================================
  // HEIGHT QUERIES
  // ===========================================================================

  avgHeight(): number {
    const [nw, ne, se, sw] = this.heights;
    return (nw + ne + se + sw) / 4;
  }

  isFlat(): boolean {
    const [first] = this.heights;
    return this.heights.every((h) => Math.abs(h - first) < HEIGHT_EPSILON);
  }

  /**
   * Heights of the two corners bounding an edge or diagonal, [left, right]
   * as seen from inside the sector.
   */
  edgeHeights(direction: Direction): readonly [number, number] {
    const [left, right] = EDGE_CORNERS[direction];
    return [this.heights[left], this.heights[right]];
  }

  edgeMax(direction: Direction): number {
    const [left, right] = this.edgeHeights(direction);
    return Math.max(left, right);
  }

  edgeMin(direction: Direction): number {
    const [left, right] = this.edgeHeights(direction);
    return Math.min(left, right);
  }

  /**
   * Height at normalized in-sector coordinates (u west→east, v north→south),
   * interpolated inside whichever split triangle contains the point.
   */
  interpolateHeight(u: number, v: number): number {
    const cu = clamp01(u);
    const cv = clamp01(v);
    const [nw, ne, se, sw] = this.heights;

    if (this.splitDirection === "nw-se") {
      if (cu >= cv) {
        // (NW, NE, SE)
        return nw + cu * (ne - nw) + cv * (se - ne);
      }
      // (NW, SE, SW)
      return nw + cv * (sw - nw) + cu * (se - sw);
    }

    if (cu + cv <= 1) {
      // (NW, NE, SW)
      return nw + cu * (ne - nw) + cv * (sw - nw);
    }
    // (NE, SE, SW)
    return se + (1 - cu) * (sw - se) + (1 - cv) * (ne - se);
  }

  // ===========================================================================
  // TRIANGLES
  // ===========================================================================

  triangles(): readonly [TriangleCorners, TriangleCorners] {
    return SPLIT_TRIANGLES[this.splitDirection];
  }

  triangleTexture(triangle: 1 | 2): TextureRef {
    return triangle === 2 && this.texture2 ? this.texture2 : this.texture;
  }

  triangleUv(triangle: 1 | 2): UvQuad | null {
    return triangle === 2 && this.uv2 ? this.uv2 : this.uv;
  }

  triangleColors(triangle: 1 | 2): CornerColors {
    return triangle === 2 && this.colors2 ? this.colors2 : this.colors;
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  raise(amount: number): void {
    this.heights = [
      this.heights[0] + amount,
      this.heights[1] + amount,
      this.heights[2] + amount,
      this.heights[3] + amount,
    ];
  }

  setUniformColor(c: Color): void {
    this.colors = uniformColors(c);
  }

  hasUniformColor(): boolean {
    return isUniform(this.colors);
  }

  clone(): HorizontalFace {
    return new HorizontalFace(this.heights, this.texture, {
      splitDirection: this.splitDirection,
      uv: this.uv,
      colors: this.colors,
      texture2: this.texture2,
      uv2: this.uv2,
      colors2: this.colors2,
      walkable: this.walkable,
      blendMode: this.blendMode,
      normalMode: this.normalMode,
      blackTransparent: this.blackTransparent,
    });
  }
}
