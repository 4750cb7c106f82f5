/**
 * Conversion between engine objects and their plain serialized shapes.
 */

import {
  type ColorQuad,
  type HorizontalFaceData,
  LEVEL_FORMAT_VERSION,
  type LevelData,
  type RoomData,
  type SectorData,
  type TextureRefData,
  type UvQuad as UvQuadData,
  type VerticalFaceData,
} from "@sectorforge/contracts";
import { ALL_DIRECTIONS, type Direction } from "../core/direction";
import type { CornerColors } from "../faces/color";
import { HorizontalFace } from "../faces/horizontal-face";
import { TextureRef } from "../faces/texture-ref";
import type { UvQuad } from "../faces/types";
import { VerticalFace } from "../faces/vertical-face";
import { Level } from "../level/level";
import { Room } from "../room/room";
import { Sector } from "../sector/sector";
import { WallStack } from "../sector/wall-stack";

type Quad<T> = readonly [T, T, T, T];

function mapQuad<T, U>(quad: Quad<T>, fn: (item: T) => U): [U, U, U, U] {
  return [fn(quad[0]), fn(quad[1]), fn(quad[2]), fn(quad[3])];
}

/** Serialized wall-list key for each edge or diagonal */
export const WALL_FIELDS = {
  north: "wallsNorth",
  east: "wallsEast",
  south: "wallsSouth",
  west: "wallsWest",
  "nw-se": "wallsNwSe",
  "ne-sw": "wallsNeSw",
} as const satisfies Record<Direction, keyof SectorData>;

const WALL_ENTRIES = ALL_DIRECTIONS.map((direction) => ({
  direction,
  field: WALL_FIELDS[direction],
}));

// =============================================================================
// TO DATA
// =============================================================================

function textureToData(texture: TextureRef): TextureRefData {
  return { pack: texture.pack, name: texture.name };
}

function uvToData(uv: UvQuad | null): UvQuadData | null {
  return uv ? mapQuad(uv, ({ x, y }) => ({ x, y })) : null;
}

function colorsToData(colors: CornerColors): ColorQuad {
  return mapQuad(colors, ({ r, g, b }) => ({ r, g, b }));
}

export function horizontalFaceToData(face: HorizontalFace): HorizontalFaceData {
  return {
    heights: [...face.heights],
    texture: textureToData(face.texture),
    uv: uvToData(face.uv),
    colors: colorsToData(face.colors),
    splitDirection: face.splitDirection,
    texture2: face.texture2 ? textureToData(face.texture2) : null,
    uv2: uvToData(face.uv2),
    colors2: face.colors2 ? colorsToData(face.colors2) : null,
    walkable: face.walkable,
    blendMode: face.blendMode,
    normalMode: face.normalMode,
    blackTransparent: face.blackTransparent,
  };
}

export function verticalFaceToData(face: VerticalFace): VerticalFaceData {
  return {
    heights: [...face.heights],
    texture: textureToData(face.texture),
    uv: uvToData(face.uv),
    colors: colorsToData(face.colors),
    solid: face.solid,
    blendMode: face.blendMode,
    normalMode: face.normalMode,
    blackTransparent: face.blackTransparent,
    uvProjection: face.uvProjection,
  };
}

export function sectorToData(sector: Sector): SectorData {
  const walls = (direction: Direction): VerticalFaceData[] =>
    sector.wallStack(direction).toArray().map(verticalFaceToData);

  return {
    floor: sector.floor ? horizontalFaceToData(sector.floor) : null,
    ceiling: sector.ceiling ? horizontalFaceToData(sector.ceiling) : null,
    wallsNorth: walls("north"),
    wallsEast: walls("east"),
    wallsSouth: walls("south"),
    wallsWest: walls("west"),
    wallsNwSe: walls("nw-se"),
    wallsNeSw: walls("ne-sw"),
  };
}

/** Dense column-major grid: `sectors[x][z]`, null for empty cells */
export function roomToData(room: Room): RoomData {
  const sectors: (SectorData | null)[][] = [];
  for (let x = 0; x < room.width; x++) {
    const column: (SectorData | null)[] = [];
    for (let z = 0; z < room.depth; z++) {
      const sector = room.getSector(x, z);
      column.push(sector ? sectorToData(sector) : null);
    }
    sectors.push(column);
  }

  const { x, y, z } = room.position;
  return {
    id: room.id,
    position: { x, y, z },
    width: room.width,
    depth: room.depth,
    sectors,
    ambient: room.ambient,
  };
}

// =============================================================================
// FROM DATA
// =============================================================================

function textureFromData(data: TextureRefData): TextureRef {
  return new TextureRef(data.pack, data.name);
}

export function horizontalFaceFromData(data: HorizontalFaceData): HorizontalFace {
  return new HorizontalFace(data.heights, textureFromData(data.texture), {
    uv: data.uv,
    colors: data.colors,
    splitDirection: data.splitDirection,
    texture2: data.texture2 ? textureFromData(data.texture2) : null,
    uv2: data.uv2,
    colors2: data.colors2,
    walkable: data.walkable,
    blendMode: data.blendMode,
    normalMode: data.normalMode,
    blackTransparent: data.blackTransparent,
  });
}

export function verticalFaceFromData(data: VerticalFaceData): VerticalFace {
  return new VerticalFace(data.heights, textureFromData(data.texture), {
    uv: data.uv,
    colors: data.colors,
    solid: data.solid,
    blendMode: data.blendMode,
    normalMode: data.normalMode,
    blackTransparent: data.blackTransparent,
    uvProjection: data.uvProjection,
  });
}

export function sectorFromData(data: SectorData): Sector {
  const walls: Partial<Record<Direction, WallStack>> = {};
  for (const { direction, field } of WALL_ENTRIES) {
    walls[direction] = WallStack.from(data[field].map(verticalFaceFromData));
  }

  return new Sector(
    data.floor ? horizontalFaceFromData(data.floor) : null,
    data.ceiling ? horizontalFaceFromData(data.ceiling) : null,
    walls,
  );
}

/**
 * Rebuild a room from data whose shape already matches its dimensions.
 */
export function roomFromData(data: RoomData): Room {
  const room = new Room(data.id, data.position, data.width, data.depth, {
    ambient: data.ambient,
  });

  data.sectors.forEach((column, x) => {
    column.forEach((sector, z) => {
      if (sector) room.setSector(x, z, sectorFromData(sector));
    });
  });

  room.recalculateBounds();
  return room;
}

export function levelToData(level: Level): LevelData {
  return {
    version: LEVEL_FORMAT_VERSION,
    rooms: level.rooms.map(roomToData),
  };
}

export function levelFromData(data: LevelData): Level {
  return new Level(data.rooms.map(roomFromData));
}
