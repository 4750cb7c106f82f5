import { buildLevelLimits } from "@sectorforge/contracts";
import { describe, expect, it } from "vitest";
import {
  color,
  createTestLevel,
  decodeLevel,
  deserializeLevel,
  encodeLevel,
  HorizontalFace,
  Level,
  Room,
  serializeLevel,
  TextureRef,
  vec3,
  VerticalFace,
} from "../src";

const floorTex = new TextureRef("test-pack", "floor");
const wallTex = new TextureRef("test-pack", "wall");

function detailedLevel(): Level {
  const room = new Room(7, vec3(-2048, 128, 1024), 2, 2, { ambient: 0.75 });
  const sector = room.ensureSector(0, 0).sector;
  sector.floor = HorizontalFace.sloped([0, 256, 256, 0], floorTex, {
    splitDirection: "ne-sw",
    texture2: wallTex,
    colors2: [color(10, 20, 30), color(40, 50, 60), color(70, 80, 90), color(0, 0, 0)],
    uv: [
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 2 },
      { x: 0, y: 2 },
    ],
    walkable: false,
    blendMode: "add-quarter",
    normalMode: "both",
    blackTransparent: false,
  });
  sector.addWall(
    "nw-se",
    VerticalFace.span(0, 512, wallTex, { solid: false, uvProjection: "projected" }),
  );
  room.setCeiling(1, 1, 1024, floorTex);

  const level = createTestLevel(floorTex, wallTex);
  level.addRoom(room);
  return level;
}

describe("serializeLevel", () => {
  it("writes the current format version and column-major sectors", () => {
    const data = serializeLevel(detailedLevel());
    const room = data.rooms[1];

    expect(data.version).toBe(2);
    expect(room?.sectors).toHaveLength(2);
    expect(room?.sectors[0]?.[1]).toBeNull();
    expect(room?.sectors[1]?.[1]?.ceiling?.heights).toEqual([1024, 1024, 1024, 1024]);
    expect(room?.sectors[0]?.[0]?.wallsNwSe[0]?.uvProjection).toBe("projected");
  });
});

describe("encodeLevel / decodeLevel", () => {
  it("round-trips every field", () => {
    const level = detailedLevel();
    const decoded = decodeLevel(encodeLevel(level)).getOrThrow();

    expect(serializeLevel(decoded)).toEqual(serializeLevel(level));
    expect(decoded.rooms[1]?.position).toEqual(vec3(-2048, 128, 1024));
    expect(decoded.rooms[1]?.bounds).toEqual(level.rooms[1]?.bounds);
  });

  it("indents when asked", () => {
    const text = encodeLevel(new Level(), { pretty: true });
    expect(text).toBe('{\n  "version": 2,\n  "rooms": []\n}');
  });

  it("fills defaults for fields older files lack", () => {
    const text = JSON.stringify({
      rooms: [
        {
          id: 0,
          position: { x: 0, y: 0, z: 0 },
          width: 1,
          depth: 1,
          sectors: [[{ floor: { heights: [0, 0, 0, 0], texture: { pack: "p", name: "n" } } }]],
        },
      ],
    });

    const room = decodeLevel(text).getOrThrow().rooms[0];
    const floor = room?.getSector(0, 0)?.floor;

    expect(room?.ambient).toBe(0.5);
    expect(floor?.splitDirection).toBe("nw-se");
    expect(floor?.blackTransparent).toBe(true);
    expect(floor?.colors[0]).toEqual({ r: 128, g: 128, b: 128 });
    expect(room?.getSector(0, 0)?.walls("ne-sw")).toEqual([]);
  });

  it("reports malformed JSON as PARSE_FAILED", () => {
    const result = decodeLevel("{oops");
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("PARSE_FAILED");
  });

  it("reports a schema mismatch as SCHEMA_INVALID", () => {
    const result = decodeLevel('{"rooms": 5}');
    expect(result.error.code).toBe("SCHEMA_INVALID");
    expect(result.error.message).toContain("rooms");
  });

  it("rejects a newer format version", () => {
    const result = deserializeLevel({ version: 3, rooms: [] });
    expect(result.error.code).toBe("SCHEMA_INVALID");
    expect(result.error.details).toEqual({ version: 3 });
  });

  it("applies limits before building rooms", () => {
    const data = serializeLevel(detailedLevel());
    const limits = buildLevelLimits({ maxRooms: 1 }).getOrThrow();
    const result = deserializeLevel(data, limits);
    expect(result.error.code).toBe("TOO_MANY_ROOMS");
  });
});
