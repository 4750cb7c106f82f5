/**
 * Starter levels.
 */

import { DEFAULT_CEILING_HEIGHT } from "../core/constants";
import { CARDINAL_DIRECTIONS } from "../core/direction";
import { ZERO_VEC3 } from "../core/geometry/types";
import type { TextureRef } from "../faces/texture-ref";
import { Room } from "../room/room";
import { Level } from "./level";

/** One 1x1 room at the origin with a floor at height 0 */
export function createEmptyLevel(texture: TextureRef): Level {
  const room = new Room(0, ZERO_VEC3, 1, 1);
  room.setFloor(0, 0, 0, texture);
  return new Level([room]);
}

/**
 * One enclosed 1x1 room: floor at 0, ceiling at one sector height, a
 * full-height wall on every edge.
 */
export function createTestLevel(
  floorTexture: TextureRef,
  wallTexture: TextureRef,
): Level {
  const room = new Room(0, ZERO_VEC3, 1, 1);
  room.setFloor(0, 0, 0, floorTexture);
  room.setCeiling(0, 0, DEFAULT_CEILING_HEIGHT, floorTexture);
  for (const direction of CARDINAL_DIRECTIONS) {
    room.addWall(0, 0, direction, 0, DEFAULT_CEILING_HEIGHT, wallTexture);
  }
  return new Level([room]);
}
