import { describe, expect, it } from "vitest";
import { HorizontalFace, Sector, TextureRef, VerticalFace } from "../src";

const floorTex = new TextureRef("test-pack", "floor");
const wallTex = new TextureRef("test-pack", "wall");

describe("Sector", () => {
  it("starts empty", () => {
    const sector = Sector.empty();
    expect(sector.isEmpty()).toBe(true);
    expect(sector.wallCount()).toBe(0);
    expect(sector.walls("nw-se")).toEqual([]);
  });

  it("counts walls across all six slots", () => {
    const sector = Sector.withFloor(0, floorTex);
    sector.addWall("north", VerticalFace.span(0, 1024, wallTex));
    sector.addWall("ne-sw", VerticalFace.span(0, 1024, wallTex));
    expect(sector.wallCount()).toBe(2);
    expect(sector.wallsMaxHeight("north")).toBe(1024);
    expect(sector.wallsMinHeight("east")).toBeUndefined();
  });

  describe("extrudeFloor", () => {
    it("adds a riser on every open edge of a flat floor", () => {
      const sector = Sector.withFloor(0, floorTex);

      expect(sector.extrudeFloor(256, wallTex)).toBe(true);
      expect(sector.floor?.heights).toEqual([256, 256, 256, 256]);
      for (const direction of ["north", "east", "south", "west"] as const) {
        const walls = sector.walls(direction);
        expect(walls).toHaveLength(1);
        expect(walls[0]?.heights).toEqual([0, 0, 256, 256]);
        expect(walls[0]?.normalMode).toBe("back");
        expect(walls[0]?.texture).toBe(wallTex);
      }
      expect(sector.walls("nw-se")).toHaveLength(0);
    });

    it("moves the bottom of an existing lowest wall to the new floor", () => {
      const sector = Sector.withFloorAndCeiling(0, 1024, floorTex);
      sector.addWall("north", VerticalFace.span(0, 1024, wallTex));

      sector.extrudeFloor(256, wallTex);

      expect(sector.walls("north")).toHaveLength(1);
      expect(sector.walls("north")[0]?.heights).toEqual([256, 256, 1024, 1024]);
      expect(sector.walls("east")[0]?.heights).toEqual([0, 0, 256, 256]);
    });

    it("raises an earlier riser instead of inverting it", () => {
      const sector = Sector.withFloor(0, floorTex);

      sector.extrudeFloor(256, wallTex);
      sector.extrudeFloor(256, wallTex);

      expect(sector.floor?.heights).toEqual([512, 512, 512, 512]);
      for (const direction of ["north", "east", "south", "west"] as const) {
        const walls = sector.walls(direction);
        expect(walls).toHaveLength(1);
        expect(walls[0]?.heights).toEqual([0, 0, 512, 512]);
      }
    });

    it("spans old to new height when lowering", () => {
      const sector = Sector.withFloor(0, floorTex);
      sector.extrudeFloor(-256, wallTex);
      expect(sector.walls("west")[0]?.heights).toEqual([-256, -256, 0, 0]);
    });

    it("follows a sloped floor", () => {
      const sector = new Sector(HorizontalFace.sloped([0, 256, 256, 0], floorTex));
      sector.extrudeFloor(512, wallTex);
      // north edge: NW 0 -> 512, NE 256 -> 768
      expect(sector.walls("north")[0]?.heights).toEqual([0, 256, 768, 512]);
    });

    it("does nothing without a floor or an amount", () => {
      expect(Sector.empty().extrudeFloor(256, wallTex)).toBe(false);
      const sector = Sector.withFloor(0, floorTex);
      expect(sector.extrudeFloor(0, wallTex)).toBe(false);
      expect(sector.wallCount()).toBe(0);
    });
  });

  it("clones deeply", () => {
    const sector = Sector.withFloor(0, floorTex);
    sector.addWall("south", VerticalFace.span(0, 512, wallTex));
    const copy = sector.clone();

    copy.extrudeFloor(256, wallTex);
    expect(sector.floor?.heights).toEqual([0, 0, 0, 0]);
    expect(sector.walls("south")[0]?.heights).toEqual([0, 0, 512, 512]);
    expect(sector.walls("north")).toHaveLength(0);
  });
});
