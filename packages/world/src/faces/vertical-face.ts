/**
 * Wall segment on a sector edge or diagonal.
 *
 * Heights are [bottom-left, bottom-right, top-right, top-left]. Left and
 * right are the corners given by EDGE_CORNERS for the slot the wall sits in,
 * so a wall whose sides differ in height follows a sloped floor or ceiling,
 * and a wall whose side collapses to one height is a triangle.
 */

import { HEIGHT_EPSILON } from "../core/constants";
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
  Coverage,
  FaceNormalMode,
  UvProjection,
  UvQuad,
} from "./types";

export interface VerticalFaceOptions {
  readonly uv?: UvQuad | null;
  readonly colors?: CornerColors;
  readonly solid?: boolean;
  readonly blendMode?: BlendMode;
  readonly normalMode?: FaceNormalMode;
  readonly blackTransparent?: boolean;
  readonly uvProjection?: UvProjection;
}

export class VerticalFace {
  heights: CornerHeights;
  texture: TextureRef;
  uv: UvQuad | null;
  colors: CornerColors;
  /** Blocks movement */
  solid: boolean;
  blendMode: BlendMode;
  normalMode: FaceNormalMode;
  blackTransparent: boolean;
  uvProjection: UvProjection;

  constructor(
    heights: CornerHeights,
    texture: TextureRef,
    options: VerticalFaceOptions = {},
  ) {
    this.heights = [...heights];
    this.texture = texture;
    this.uv = options.uv ?? null;
    this.colors = options.colors ?? uniformColors(NEUTRAL_COLOR);
    this.solid = options.solid ?? true;
    this.blendMode = options.blendMode ?? "opaque";
    this.normalMode = options.normalMode ?? "front";
    this.blackTransparent = options.blackTransparent ?? true;
    this.uvProjection = options.uvProjection ?? "default";
  }

  /**
   * Rectangular wall from `bottom` to `top`.
   */
  static span(
    bottom: number,
    top: number,
    texture: TextureRef,
    options?: VerticalFaceOptions,
  ): VerticalFace {
    return new VerticalFace([bottom, bottom, top, top], texture, options);
  }

  static fromHeights(
    heights: CornerHeights,
    texture: TextureRef,
    options?: VerticalFaceOptions,
  ): VerticalFace {
    return new VerticalFace(heights, texture, options);
  }

  /** Average of the two bottom corners */
  yBottom(): number {
    return (this.heights[0] + this.heights[1]) / 2;
  }

  /** Average of the two top corners */
  yTop(): number {
    return (this.heights[2] + this.heights[3]) / 2;
  }

  yMin(): number {
    return Math.min(...this.heights);
  }

  yMax(): number {
    return Math.max(...this.heights);
  }

  height(): number {
    return this.yTop() - this.yBottom();
  }

  isFlat(): boolean {
    const [bl, br, tr, tl] = this.heights;
    return (
      Math.abs(bl - br) < HEIGHT_EPSILON && Math.abs(tr - tl) < HEIGHT_EPSILON
    );
  }

  leftCoverage(): Coverage {
    return { bottom: this.heights[0], top: this.heights[3] };
  }

  rightCoverage(): Coverage {
    return { bottom: this.heights[1], top: this.heights[2] };
  }

  setUniformColor(c: Color): void {
    this.colors = uniformColors(c);
  }

  hasUniformColor(): boolean {
    return isUniform(this.colors);
  }

  clone(): VerticalFace {
    return new VerticalFace(this.heights, this.texture, {
      uv: this.uv,
      colors: this.colors,
      solid: this.solid,
      blendMode: this.blendMode,
      normalMode: this.normalMode,
      blackTransparent: this.blackTransparent,
      uvProjection: this.uvProjection,
    });
  }
}
