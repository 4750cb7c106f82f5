/**
 * Geometry operations - pure functions, no mutation of their inputs.
 */

import type { Aabb, Vec3 } from "./types";

// =============================================================================
// VECTOR OPERATIONS
// =============================================================================

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function addVec3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtractVec3(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  };
}

/**
 * Unit vector in the direction of v; the zero vector stays zero.
 */
export function normalize(v: Vec3): Vec3 {
  const length = Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
  if (length === 0) return v;
  return { x: v.x / length, y: v.y / length, z: v.z / length };
}

export function negate(v: Vec3): Vec3 {
  return { x: -v.x, y: -v.y, z: -v.z };
}

// =============================================================================
// BOUNDING BOX OPERATIONS
// =============================================================================

export function emptyAabb(): Aabb {
  return {
    min: vec3(Infinity, Infinity, Infinity),
    max: vec3(-Infinity, -Infinity, -Infinity),
  };
}

export function isEmptyAabb(box: Aabb): boolean {
  return box.min.x > box.max.x || box.min.y > box.max.y || box.min.z > box.max.z;
}

/**
 * Smallest box containing `box` and `point`.
 */
export function expandAabb(box: Aabb, point: Vec3): Aabb {
  return {
    min: vec3(
      Math.min(box.min.x, point.x),
      Math.min(box.min.y, point.y),
      Math.min(box.min.z, point.z),
    ),
    max: vec3(
      Math.max(box.max.x, point.x),
      Math.max(box.max.y, point.y),
      Math.max(box.max.z, point.z),
    ),
  };
}

export function aabbContains(box: Aabb, point: Vec3): boolean {
  return (
    point.x >= box.min.x &&
    point.x <= box.max.x &&
    point.y >= box.min.y &&
    point.y <= box.max.y &&
    point.z >= box.min.z &&
    point.z <= box.max.z
  );
}

export function aabbCenter(box: Aabb): Vec3 {
  return vec3(
    (box.min.x + box.max.x) * 0.5,
    (box.min.y + box.max.y) * 0.5,
    (box.min.z + box.max.z) * 0.5,
  );
}

export function translateAabb(box: Aabb, offset: Vec3): Aabb {
  return { min: addVec3(box.min, offset), max: addVec3(box.max, offset) };
}
