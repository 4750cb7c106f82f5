/**
 * Core geometry types. Vectors are plain value objects; Y is up,
 * X grows east and Z grows south.
 */

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Axis-aligned bounding box. An empty box has min > max on every axis.
 */
export interface Aabb {
  readonly min: Vec3;
  readonly max: Vec3;
}

export const ZERO_VEC3: Vec3 = { x: 0, y: 0, z: 0 };
