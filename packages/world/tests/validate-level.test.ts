import { type LevelInput, LevelSchema } from "@sectorforge/contracts";
import { describe, expect, it } from "vitest";
import {
  createTestLevel,
  Level,
  Room,
  TextureRef,
  validateLevel,
  vec3,
} from "../src";

const tex = new TextureRef("test-pack", "stone");

function wall(bottom: number, top: number) {
  const heights: [number, number, number, number] = [bottom, bottom, top, top];
  return { heights, texture: { pack: "p", name: "n" } };
}

function levelData(input: LevelInput) {
  return LevelSchema.parse(input);
}

describe("validateLevel", () => {
  it("accepts a well-formed level", () => {
    expect(validateLevel(createTestLevel(tex, tex)).isOk()).toBe(true);
  });

  it("rejects heights beyond the coordinate limit", () => {
    const room = new Room(0, vec3(0, 0, 0), 1, 1);
    room.setFloor(0, 0, 2_000_000, tex);

    const result = validateLevel(new Level([room]));
    expect(result.error.code).toBe("VALUE_OUT_OF_RANGE");
    expect(result.error.message).toBe("room[0] sector[0,0] floor: invalid height[0] = 2000000");
  });

  it("rejects non-finite heights", () => {
    const room = new Room(0, vec3(0, 0, 0), 1, 1);
    room.addWall(0, 0, "east", 0, Number.NaN, tex);

    const result = validateLevel(new Level([room]));
    expect(result.error.code).toBe("VALUE_OUT_OF_RANGE");
    expect(result.error.message).toBe("room[0] sector[0,0] wallsEast[0]: invalid height[2] = NaN");
  });

  it("rejects an oversized room", () => {
    const result = validateLevel(new Level([new Room(0, vec3(0, 0, 0), 129, 1)]));
    expect(result.error.code).toBe("ROOM_TOO_LARGE");
    expect(result.error.message).toBe("room[0]: width too large (129 > 128)");
  });

  it("rejects too many rooms under custom limits", () => {
    const level = createTestLevel(tex, tex);
    level.addRoom(new Room(1, vec3(0, 0, 0), 1, 1));

    const result = validateLevel(level, {
      maxRooms: 1,
      maxRoomSize: 128,
      maxStringLength: 256,
      maxCoord: 1_000_000,
    });
    expect(result.error.code).toBe("TOO_MANY_ROOMS");
  });

  it("rejects long texture names", () => {
    const room = new Room(0, vec3(0, 0, 0), 1, 1);
    room.setFloor(0, 0, 0, new TextureRef("test-pack", "x".repeat(300)));

    const result = validateLevel(new Level([room]));
    expect(result.error.code).toBe("STRING_TOO_LONG");
    expect(result.error.details).toEqual({
      context: "room[0] sector[0,0] floor",
      field: "name",
      length: 300,
    });
  });

  it("rejects a sector grid that does not match the room size", () => {
    const data = levelData({ rooms: [] });
    data.rooms.push({
      id: 0,
      position: { x: 0, y: 0, z: 0 },
      width: 2,
      depth: 1,
      sectors: [[null]],
      ambient: 0.5,
    });

    const result = validateLevel(data);
    expect(result.error.code).toBe("ROOM_SHAPE_MISMATCH");
    expect(result.error.message).toBe("room[0]: sectors array width mismatch (1 != 2)");
  });

  it("rejects more than three walls on one edge", () => {
    const data = levelData({
      rooms: [
        {
          id: 0,
          position: { x: 0, y: 0, z: 0 },
          width: 1,
          depth: 1,
          sectors: [[{ wallsSouth: [wall(0, 256), wall(256, 512), wall(512, 768)] }]],
        },
      ],
    });
    const sector = data.rooms[0]?.sectors[0]?.[0];
    if (!sector) throw new Error("fixture");
    sector.wallsSouth.push(...sector.wallsSouth);

    const result = validateLevel(data);
    expect(result.error.code).toBe("TOO_MANY_WALLS");
    expect(result.error.message).toBe("room[0] sector[0,0]: too many south walls (6 > 3)");
  });
});
