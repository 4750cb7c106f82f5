/**
 * Level: an ordered list of rooms. A room's index in the list is its
 * identity for lookups.
 */

import { ALL_DIRECTIONS } from "../core/direction";
import type { Vec3 } from "../core/geometry/types";
import type { TextureCatalog, TextureRef } from "../faces/texture-ref";
import type { Room } from "../room/room";

export class Level {
  readonly rooms: Room[];

  constructor(rooms: Room[] = []) {
    this.rooms = rooms;
  }

  get roomCount(): number {
    return this.rooms.length;
  }

  /** Append a room and return its index */
  addRoom(room: Room): number {
    this.rooms.push(room);
    return this.rooms.length - 1;
  }

  getRoom(index: number): Room | undefined {
    return this.rooms[index];
  }

  /** Index of the first room whose bounds contain `point` */
  findRoomAt(point: Vec3): number | undefined {
    const index = this.rooms.findIndex((room) => room.containsPoint(point));
    return index === -1 ? undefined : index;
  }

  /**
   * Same as `findRoomAt`, trying `hint` (usually the room the point was in
   * last frame) before scanning.
   */
  findRoomAtWithHint(point: Vec3, hint: number | undefined): number | undefined {
    if (hint !== undefined && this.rooms[hint]?.containsPoint(point)) {
      return hint;
    }
    return this.findRoomAt(point);
  }

  clone(): Level {
    return new Level(this.rooms.map((room) => room.clone()));
  }
}

// =============================================================================
// TEXTURE QUERIES
// =============================================================================

/**
 * Every distinct valid texture used by the level's faces, in first-use
 * order.
 */
export function collectTextures(level: Level): TextureRef[] {
  const seen = new Map<string, TextureRef>();
  const add = (texture: TextureRef | null): void => {
    if (texture?.isValid() && !seen.has(texture.toString())) {
      seen.set(texture.toString(), texture);
    }
  };

  for (const room of level.rooms) {
    for (const { sector } of room.iterSectors()) {
      for (const face of [sector.floor, sector.ceiling]) {
        add(face?.texture ?? null);
        add(face?.texture2 ?? null);
      }
      for (const direction of ALL_DIRECTIONS) {
        for (const wall of sector.walls(direction)) add(wall.texture);
      }
    }
  }

  return [...seen.values()];
}

/** Textures the level uses that the catalog does not know */
export function findMissingTextures(
  level: Level,
  catalog: TextureCatalog,
): TextureRef[] {
  return collectTextures(level).filter((texture) => !catalog.has(texture));
}
