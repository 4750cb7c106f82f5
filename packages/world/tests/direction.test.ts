import { describe, expect, it } from "vitest";
import {
  ALL_DIRECTIONS,
  CARDINAL_DIRECTIONS,
  Corner,
  directionOffset,
  EDGE_CORNERS,
  isCardinal,
  isDiagonal,
  oppositeDirection,
} from "../src";

describe("directions", () => {
  it("lists four cardinal edges and two diagonals", () => {
    expect(ALL_DIRECTIONS).toHaveLength(6);
    expect(ALL_DIRECTIONS.filter(isDiagonal)).toEqual(["nw-se", "ne-sw"]);
    expect(ALL_DIRECTIONS.filter(isCardinal)).toEqual(CARDINAL_DIRECTIONS);
  });

  it("pairs each cardinal edge with its opposite", () => {
    expect(oppositeDirection("north")).toBe("south");
    expect(oppositeDirection("east")).toBe("west");
    for (const direction of CARDINAL_DIRECTIONS) {
      expect(oppositeDirection(oppositeDirection(direction))).toBe(direction);
    }
  });

  it("maps north to -Z and east to +X", () => {
    expect(directionOffset("north")).toEqual({ x: 0, z: -1 });
    expect(directionOffset("east")).toEqual({ x: 1, z: 0 });
    expect(directionOffset("south")).toEqual({ x: 0, z: 1 });
    expect(directionOffset("west")).toEqual({ x: -1, z: 0 });
  });

  it("bounds each slot by its two corners", () => {
    expect(EDGE_CORNERS.north).toEqual([Corner.NW, Corner.NE]);
    expect(EDGE_CORNERS.east).toEqual([Corner.NE, Corner.SE]);
    expect(EDGE_CORNERS.south).toEqual([Corner.SW, Corner.SE]);
    expect(EDGE_CORNERS.west).toEqual([Corner.NW, Corner.SW]);
    expect(EDGE_CORNERS["nw-se"]).toEqual([Corner.NW, Corner.SE]);
    expect(EDGE_CORNERS["ne-sw"]).toEqual([Corner.NE, Corner.SW]);
  });
});
