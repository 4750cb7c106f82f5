/**
 * Render data handed to an external rasterizer. World space, Y up; the
 * rasterizer owns everything from here to pixels.
 */

import type { Vec2, Vec3 } from "../core/geometry/types";
import type { Color } from "../faces/color";
import type { TextureRef } from "../faces/texture-ref";
import type { BlendMode, FaceNormalMode } from "../faces/types";

export interface MeshVertex {
  readonly position: Vec3;
  readonly uv: Vec2;
  /** Front-facing normal of the triangle this vertex belongs to */
  readonly normal: Vec3;
  readonly color: Color;
}

/**
 * Triangle over three vertex indices, counter-clockwise seen from the
 * front: normalize(cross(b - a, c - a)) is the front normal.
 */
export interface MeshTriangle {
  readonly indices: readonly [number, number, number];
  readonly textureId: number;
  readonly blendMode: BlendMode;
  readonly normalMode: FaceNormalMode;
  readonly blackTransparent: boolean;
}

export interface RoomMesh {
  readonly vertices: MeshVertex[];
  readonly triangles: MeshTriangle[];
}

/** Texture id for a reference; undefined falls back to id 0 */
export type TextureResolver = (texture: TextureRef) => number | undefined;
