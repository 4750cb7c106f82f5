import { describe, expect, it } from "vitest";
import {
  classifySector,
  createTestLevel,
  renderLegend,
  renderLevelAscii,
  renderRoomAscii,
  renderRoomDetail,
  Room,
  Sector,
  SIMPLE_CHARSET,
  TextureRef,
  vec3,
  VerticalFace,
} from "../src";

const tex = new TextureRef("test-pack", "stone");

function sampleRoom(): Room {
  const room = new Room(4, vec3(1024, 0, -1024), 3, 2);
  room.setFloor(0, 0, 0, tex);
  room.setCeiling(1, 0, 1024, tex);
  room.addWall(2, 0, "north", 0, 1024, tex);
  room.ensureSector(0, 1);
  room.setFloor(1, 1, 0, tex);
  room.addWall(1, 1, "nw-se", 0, 1024, tex);
  return room;
}

describe("classifySector", () => {
  it("ranks diagonal walls over edge walls over floors", () => {
    const sector = Sector.withFloor(0, tex);
    expect(classifySector(sector)).toBe("floor");

    sector.addWall("west", VerticalFace.span(0, 1024, tex));
    expect(classifySector(sector)).toBe("walled");

    sector.addWall("ne-sw", VerticalFace.span(0, 1024, tex));
    expect(classifySector(sector)).toBe("diagonal");
  });

  it("treats missing and geometry-free sectors as empty", () => {
    expect(classifySector(undefined)).toBe("empty");
    expect(classifySector(Sector.empty())).toBe("empty");
  });
});

describe("renderRoomAscii", () => {
  it("draws one character per sector, north row first", () => {
    expect(renderRoomAscii(sampleRoom(), { charset: SIMPLE_CHARSET })).toBe(".o#\n / ");
  });

  it("labels rows and columns", () => {
    const text = renderRoomAscii(sampleRoom(), {
      charset: SIMPLE_CHARSET,
      showCoordinates: true,
    });
    expect(text.split("\n")).toEqual(["    0", "  0 .o#", "  1  / "]);
  });

  it("wraps sectors in ANSI codes when coloring", () => {
    const room = new Room(0, vec3(0, 0, 0), 1, 1);
    room.addWall(0, 0, "east", 0, 1024, tex);
    expect(renderRoomAscii(room, { charset: SIMPLE_CHARSET, useColors: true })).toBe(
      "\x1b[34m#\x1b[0m",
    );
  });
});

describe("renderRoomDetail", () => {
  it("prints a header above the grid", () => {
    expect(renderRoomDetail(sampleRoom(), { charset: SIMPLE_CHARSET }).split("\n")).toEqual([
      "Room 4",
      "Position: (1024, 0, -1024)",
      "Size: 3×2",
      "Sectors: 5",
      "Heights: 0..1024",
      "",
      ".o#",
      " / ",
    ]);
  });

  it("notes a room with no geometry", () => {
    const text = renderRoomDetail(new Room(0, vec3(0, 0, 0), 1, 1));
    expect(text.split("\n")[4]).toBe("Heights: no geometry");
  });
});

describe("renderLevelAscii", () => {
  it("renders every room", () => {
    const text = renderLevelAscii(createTestLevel(tex, tex), { charset: SIMPLE_CHARSET });
    expect(text.split("\n").at(-1)).toBe("#");
  });
});

describe("renderLegend", () => {
  it("lists each sector kind", () => {
    expect(renderLegend(SIMPLE_CHARSET).split("\n")).toEqual([
      "Legend:",
      "  . Floor",
      "  o Ceiling only",
      "  # Walled",
      "  / Diagonal wall",
      "    Empty",
    ]);
  });
});
