import { describe, expect, it } from "vitest";
import {
  type GapCandidate,
  type GapQuery,
  type GapResult,
  HorizontalFace,
  nextWallPosition,
  pickGapCandidate,
  Sector,
  TextureRef,
  VerticalFace,
} from "../src";

const tex = new TextureRef("test-pack", "brick");
const query: GapQuery = { fallbackFloor: 0, fallbackCeiling: 1024 };

function room(floor: number, ceiling: number): Sector {
  return Sector.withFloorAndCeiling(floor, ceiling, tex);
}

function insert(sector: Sector, heights: [number, number, number, number]): void {
  sector.addWall("north", VerticalFace.fromHeights(heights, tex));
}

describe("nextWallPosition", () => {
  describe("empty slot", () => {
    it("spans floor to ceiling", () => {
      expect(nextWallPosition(room(0, 2048), "north", query)).toEqual({
        success: true,
        heights: [0, 0, 2048, 2048],
      });
    });

    it("falls back when the sector has no floor or ceiling", () => {
      expect(nextWallPosition(Sector.empty(), "east", query)).toEqual({
        success: true,
        heights: [0, 0, 1024, 1024],
      });
    });

    it("offers the lower or upper part of a steep span by preferred height", () => {
      const sector = new Sector(
        HorizontalFace.sloped([0, 1024, 1024, 0], tex),
        HorizontalFace.flat(2048, tex),
      );

      expect(nextWallPosition(sector, "north", query)).toEqual({
        success: true,
        heights: [0, 1024, 2048, 2048],
      });
      expect(nextWallPosition(sector, "north", { ...query, preferredY: 100 })).toEqual({
        success: true,
        heights: [0, 1024, 1024, 1024],
      });
      expect(nextWallPosition(sector, "north", { ...query, preferredY: 2000 })).toEqual({
        success: true,
        heights: [1024, 1024, 2048, 2048],
      });
    });
  });

  it("keeps both triangular fills upright under a ceiling below the floor peak", () => {
    const sector = new Sector(
      HorizontalFace.sloped([256, 1536, 1536, 256], tex),
      HorizontalFace.sloped([1024, 3584, 3584, 1024], tex),
    );

    expect(nextWallPosition(sector, "north", { ...query, preferredY: 1664 })).toEqual({
      success: true,
      heights: [1536, 1536, 3584, 1536],
    });
    expect(nextWallPosition(sector, "north", { ...query, preferredY: 100 })).toEqual({
      success: true,
      heights: [256, 1536, 1536, 1024],
    });
  });

  it("reports no gap once a full-height wall is in place", () => {
    const sector = room(0, 2048);
    const first = nextWallPosition(sector, "north", query);
    if (!first.success) throw new Error("expected a gap");
    insert(sector, first.heights);

    expect(nextWallPosition(sector, "north", query)).toEqual({
      success: false,
      reason: "no-gap",
    });
  });

  it("picks the lower of two equal gaps", () => {
    const sector = room(0, 2048);
    insert(sector, [512, 512, 1536, 1536]);

    expect(nextWallPosition(sector, "north", query)).toEqual({
      success: true,
      heights: [0, 0, 512, 512],
    });
  });

  it("picks the gap nearest the preferred height", () => {
    const sector = room(0, 2048);
    insert(sector, [512, 512, 1536, 1536]);

    expect(nextWallPosition(sector, "north", { ...query, preferredY: 1900 })).toEqual({
      success: true,
      heights: [1536, 1536, 2048, 2048],
    });
  });

  describe("repeated fills", () => {
    /** Fill the north edge until the solver refuses, checking each result */
    function fillAll(sector: Sector): { walls: number[][]; last: GapResult } {
      const walls: number[][] = [];
      for (;;) {
        const result = nextWallPosition(sector, "north", query);
        if (!result.success) return { walls, last: result };

        const [bl, br, tr, tl] = result.heights;
        expect(tl).toBeGreaterThanOrEqual(bl);
        expect(tr).toBeGreaterThanOrEqual(br);
        for (const wall of sector.walls("north")) {
          const overlapsLeft = bl < wall.heights[3] && tl > wall.heights[0];
          const overlapsRight = br < wall.heights[2] && tr > wall.heights[1];
          expect(overlapsLeft || overlapsRight).toBe(false);
        }

        insert(sector, result.heights);
        walls.push(result.heights);
      }
    }

    it("never overlaps on a flat span", () => {
      const sector = room(0, 2048);
      insert(sector, [512, 512, 1536, 1536]);

      expect(fillAll(sector)).toEqual({
        walls: [
          [0, 0, 512, 512],
          [1536, 1536, 2048, 2048],
        ],
        last: { success: false, reason: "slot-full" },
      });
    });

    it("never overlaps over a sloped floor", () => {
      const sector = new Sector(
        HorizontalFace.sloped([0, 512, 512, 0], tex),
        HorizontalFace.flat(2048, tex),
      );
      insert(sector, [512, 512, 1536, 1536]);

      expect(fillAll(sector)).toEqual({
        walls: [
          [0, 512, 512, 512],
          [1536, 1536, 2048, 2048],
        ],
        last: { success: false, reason: "slot-full" },
      });
    });

    it("never overlaps a collapsed triangular wall", () => {
      const sector = room(0, 1024);
      insert(sector, [100, 400, 1024, 1024]);

      expect(fillAll(sector)).toEqual({
        walls: [[0, 0, 400, 0]],
        last: { success: false, reason: "no-gap" },
      });
    });
  });

  it("reports a full slot with three walls, whatever the gaps", () => {
    const sector = room(0, 4096);
    insert(sector, [0, 0, 256, 256]);
    insert(sector, [512, 512, 768, 768]);
    insert(sector, [1024, 1024, 1280, 1280]);

    expect(nextWallPosition(sector, "north", { ...query, preferredY: 3000 })).toEqual({
      success: false,
      reason: "slot-full",
    });
  });

  it("accepts a gap of exactly MIN_GAP and rejects a smaller one", () => {
    const exact = room(0, 1024);
    insert(exact, [256, 256, 1024, 1024]);
    expect(nextWallPosition(exact, "north", query)).toEqual({
      success: true,
      heights: [0, 0, 256, 256],
    });

    const small = room(0, 1024);
    insert(small, [100, 100, 1024, 1024]);
    expect(nextWallPosition(small, "north", query)).toEqual({
      success: false,
      reason: "no-gap",
    });
  });

  it("collapses the corner that cannot hold a gap into a triangle", () => {
    const sector = room(0, 1024);
    insert(sector, [100, 400, 1024, 1024]);

    expect(nextWallPosition(sector, "north", query)).toEqual({
      success: true,
      heights: [0, 0, 400, 0],
    });
  });

  describe("diagonals", () => {
    it("spans floor to ceiling along the diagonal corners", () => {
      const sector = new Sector(
        HorizontalFace.sloped([0, 0, 512, 0], tex),
        HorizontalFace.flat(1024, tex),
      );

      expect(sector.nextDiagonalWallPosition("nw-se", query)).toEqual({
        success: true,
        heights: [0, 512, 1024, 1024],
      });
      expect(sector.nextDiagonalWallPosition("ne-sw", query)).toEqual({
        success: true,
        heights: [0, 0, 1024, 1024],
      });
    });
  });
});

describe("pickGapCandidate", () => {
  const low: GapCandidate = { heights: [0, 0, 512, 512], size: 512, midpoint: 256 };
  const high: GapCandidate = { heights: [1024, 1024, 2048, 2048], size: 1024, midpoint: 1536 };

  it("prefers the largest gap without a preferred height", () => {
    expect(pickGapCandidate([low, high])).toBe(high);
  });

  it("prefers the nearest midpoint with a preferred height", () => {
    expect(pickGapCandidate([low, high], 300)).toBe(low);
  });

  it("returns undefined for no candidates", () => {
    expect(pickGapCandidate([])).toBeUndefined();
  });
});
