/**
 * Level validation: the gate between untrusted files and the geometry
 * engine. Everything here reports the first problem found, with a path to
 * the offending value.
 */

import {
  DEFAULT_LEVEL_LIMITS,
  Err,
  type HorizontalFaceData,
  LevelError,
  type LevelData,
  type LevelLimits,
  MAX_WALLS_PER_EDGE,
  Ok,
  type Result,
  type RoomData,
  type SectorData,
  type TextureRefData,
  type VerticalFaceData,
} from "@sectorforge/contracts";
import { ALL_DIRECTIONS } from "../core/direction";
import { Level } from "../level/level";
import { levelToData, WALL_FIELDS } from "./convert";

type Check = LevelError | undefined;

function firstError(checks: Iterable<Check>): Check {
  for (const check of checks) {
    if (check) return check;
  }
  return undefined;
}

function isValidCoord(value: number, limits: LevelLimits): boolean {
  return Number.isFinite(value) && Math.abs(value) <= limits.maxCoord;
}

// =============================================================================
// FACES
// =============================================================================

function checkTexture(texture: TextureRefData, context: string, limits: LevelLimits): Check {
  for (const [field, value] of [
    ["pack", texture.pack],
    ["name", texture.name],
  ] as const) {
    if (value.length > limits.maxStringLength) {
      return LevelError.validationFailed(
        "STRING_TOO_LONG",
        `${context}: texture ${field} too long (${value.length} > ${limits.maxStringLength})`,
        { context, field, length: value.length },
      );
    }
  }
  return undefined;
}

function checkHeights(heights: readonly number[], context: string, limits: LevelLimits): Check {
  const index = heights.findIndex((h) => !isValidCoord(h, limits));
  if (index === -1) return undefined;
  return LevelError.validationFailed(
    "VALUE_OUT_OF_RANGE",
    `${context}: invalid height[${index}] = ${heights[index]}`,
    { context, index },
  );
}

function checkHorizontalFace(
  face: HorizontalFaceData,
  context: string,
  limits: LevelLimits,
): Check {
  return (
    checkHeights(face.heights, context, limits) ??
    checkTexture(face.texture, context, limits) ??
    (face.texture2 ? checkTexture(face.texture2, `${context} texture2`, limits) : undefined)
  );
}

function checkVerticalFace(face: VerticalFaceData, context: string, limits: LevelLimits): Check {
  return (
    checkHeights(face.heights, context, limits) ?? checkTexture(face.texture, context, limits)
  );
}

// =============================================================================
// SECTORS AND ROOMS
// =============================================================================

function* sectorChecks(sector: SectorData, context: string, limits: LevelLimits): Generator<Check> {
  if (sector.floor) yield checkHorizontalFace(sector.floor, `${context} floor`, limits);
  if (sector.ceiling) yield checkHorizontalFace(sector.ceiling, `${context} ceiling`, limits);

  for (const direction of ALL_DIRECTIONS) {
    const walls = sector[WALL_FIELDS[direction]];
    if (walls.length > MAX_WALLS_PER_EDGE) {
      yield LevelError.validationFailed(
        "TOO_MANY_WALLS",
        `${context}: too many ${direction} walls (${walls.length} > ${MAX_WALLS_PER_EDGE})`,
        { context, direction, count: walls.length },
      );
    }
    for (const [i, wall] of walls.entries()) {
      yield checkVerticalFace(wall, `${context} ${WALL_FIELDS[direction]}[${i}]`, limits);
    }
  }
}

function* roomChecks(room: RoomData, index: number, limits: LevelLimits): Generator<Check> {
  const context = `room[${index}]`;

  for (const [field, size] of [
    ["width", room.width],
    ["depth", room.depth],
  ] as const) {
    if (size > limits.maxRoomSize) {
      yield LevelError.validationFailed(
        "ROOM_TOO_LARGE",
        `${context}: ${field} too large (${size} > ${limits.maxRoomSize})`,
        { room: index, [field]: size },
      );
    }
  }

  const { x, y, z } = room.position;
  if (![x, y, z].every((v) => isValidCoord(v, limits))) {
    yield LevelError.validationFailed(
      "VALUE_OUT_OF_RANGE",
      `${context}: invalid position (${x}, ${y}, ${z})`,
      { room: index },
    );
  }

  if (room.sectors.length !== room.width) {
    yield LevelError.validationFailed(
      "ROOM_SHAPE_MISMATCH",
      `${context}: sectors array width mismatch (${room.sectors.length} != ${room.width})`,
      { room: index },
    );
  }
  for (const [gx, column] of room.sectors.entries()) {
    if (column.length !== room.depth) {
      yield LevelError.validationFailed(
        "ROOM_SHAPE_MISMATCH",
        `${context}: sectors[${gx}] depth mismatch (${column.length} != ${room.depth})`,
        { room: index, column: gx },
      );
    }
  }

  if (!Number.isFinite(room.ambient) || room.ambient < 0 || room.ambient > 1) {
    yield LevelError.validationFailed(
      "VALUE_OUT_OF_RANGE",
      `${context}: invalid ambient ${room.ambient}`,
      { room: index },
    );
  }

  for (const [gx, column] of room.sectors.entries()) {
    for (const [gz, sector] of column.entries()) {
      if (sector) yield* sectorChecks(sector, `${context} sector[${gx},${gz}]`, limits);
    }
  }
}

function* levelChecks(level: LevelData, limits: LevelLimits): Generator<Check> {
  if (level.rooms.length > limits.maxRooms) {
    yield LevelError.validationFailed(
      "TOO_MANY_ROOMS",
      `too many rooms (${level.rooms.length} > ${limits.maxRooms})`,
      { count: level.rooms.length },
    );
  }
  for (const [index, room] of level.rooms.entries()) {
    yield* roomChecks(room, index, limits);
  }
}

/**
 * Check a level against resource limits before it reaches the engine.
 * Accepts either a live level or its serialized form.
 */
export function validateLevel(
  level: Level | LevelData,
  limits: LevelLimits = DEFAULT_LEVEL_LIMITS,
): Result<void, LevelError> {
  const data = level instanceof Level ? levelToData(level) : level;
  const error = firstError(levelChecks(data, limits));
  return error ? Err(error) : Ok(undefined);
}
