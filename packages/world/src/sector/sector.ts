/**
 * A single sector in the room grid: optional floor, optional ceiling and six
 * wall stacks (four edges, two diagonals).
 */

import {
  ALL_DIRECTIONS,
  CARDINAL_DIRECTIONS,
  type CardinalDirection,
  type DiagonalDirection,
  type Direction,
} from "../core/direction";
import { HorizontalFace } from "../faces/horizontal-face";
import type { TextureRef } from "../faces/texture-ref";
import { VerticalFace } from "../faces/vertical-face";
import { nextDiagonalWallPosition, nextWallPosition } from "../gap/gap-solver";
import type { GapQuery, GapResult } from "../gap/types";
import { type WallInsertResult, WallStack } from "./wall-stack";

function emptyWalls(): Record<Direction, WallStack> {
  return {
    north: new WallStack(),
    east: new WallStack(),
    south: new WallStack(),
    west: new WallStack(),
    "nw-se": new WallStack(),
    "ne-sw": new WallStack(),
  };
}

export class Sector {
  /** null = no floor (pit) */
  floor: HorizontalFace | null;
  /** null = no ceiling (open sky) */
  ceiling: HorizontalFace | null;
  private readonly stacks: Record<Direction, WallStack>;

  constructor(
    floor: HorizontalFace | null = null,
    ceiling: HorizontalFace | null = null,
    walls: Partial<Record<Direction, WallStack>> = {},
  ) {
    this.floor = floor;
    this.ceiling = ceiling;
    this.stacks = { ...emptyWalls(), ...walls };
  }

  static empty(): Sector {
    return new Sector();
  }

  static withFloor(height: number, texture: TextureRef): Sector {
    return new Sector(HorizontalFace.flat(height, texture));
  }

  static withFloorAndCeiling(
    floorHeight: number,
    ceilingHeight: number,
    texture: TextureRef,
  ): Sector {
    return new Sector(
      HorizontalFace.flat(floorHeight, texture),
      HorizontalFace.flat(ceilingHeight, texture),
    );
  }

  // ===========================================================================
  // WALL SLOTS
  // ===========================================================================

  /** Walls on an edge or diagonal, in insertion order */
  walls(direction: Direction): readonly VerticalFace[] {
    return this.stacks[direction].walls;
  }

  /** Mutable slot for an edge or diagonal */
  wallStack(direction: Direction): WallStack {
    return this.stacks[direction];
  }

  addWall(direction: Direction, face: VerticalFace): WallInsertResult {
    return this.stacks[direction].add(face);
  }

  /** Highest wall corner on an edge, undefined when the slot is empty */
  wallsMaxHeight(direction: Direction): number | undefined {
    return this.stacks[direction].maxHeight();
  }

  /** Lowest wall corner on an edge, undefined when the slot is empty */
  wallsMinHeight(direction: Direction): number | undefined {
    return this.stacks[direction].minHeight();
  }

  /** Where the next wall on an edge would go (see gap-solver) */
  nextWallPosition(direction: Direction, query: GapQuery): GapResult {
    return nextWallPosition(this, direction, query);
  }

  nextDiagonalWallPosition(
    diagonal: DiagonalDirection,
    query: GapQuery,
  ): GapResult {
    return nextDiagonalWallPosition(this, diagonal, query);
  }

  wallCount(): number {
    return ALL_DIRECTIONS.reduce(
      (count, direction) => count + this.stacks[direction].length,
      0,
    );
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  hasGeometry(): boolean {
    return (
      this.floor !== null ||
      this.ceiling !== null ||
      ALL_DIRECTIONS.some((direction) => !this.stacks[direction].isEmpty())
    );
  }

  /** Geometrically empty: no floor, no ceiling, no walls */
  isEmpty(): boolean {
    return !this.hasGeometry();
  }

  // ===========================================================================
  // EDITS
  // ===========================================================================

  /**
   * Raise the floor by `amount` and close the step on every cardinal edge.
   *
   * An edge that already has walls gets its lowest wall's bottom moved to the
   * new floor (top untouched), unless that wall sits entirely below the new
   * floor, in which case its top is raised to it. An empty edge gets a riser between the old and
   * new floor heights, front face pointing out of the sector.
   *
   * Returns false when there is no floor or nothing to extrude.
   */
  extrudeFloor(amount: number, wallTexture: TextureRef): boolean {
    const floor = this.floor;
    if (floor === null || amount === 0) return false;

    const previous = new Map<CardinalDirection, readonly [number, number]>(
      CARDINAL_DIRECTIONS.map((direction) => [
        direction,
        floor.edgeHeights(direction),
      ]),
    );
    floor.raise(amount);

    for (const direction of CARDINAL_DIRECTIONS) {
      const [newLeft, newRight] = floor.edgeHeights(direction);
      const [oldLeft, oldRight] = previous.get(direction) ?? [newLeft, newRight];
      const stack = this.stacks[direction];
      const lowest = stack.lowest();

      if (lowest) {
        const [bl, br, tr, tl] = lowest.heights;
        // A wall wholly under the new floor (an earlier riser) grows up to it.
        lowest.heights =
          tl <= newLeft && tr <= newRight
            ? [bl, br, newRight, newLeft]
            : [newLeft, newRight, tr, tl];
        continue;
      }

      stack.add(
        VerticalFace.fromHeights(
          [
            Math.min(oldLeft, newLeft),
            Math.min(oldRight, newRight),
            Math.max(oldRight, newRight),
            Math.max(oldLeft, newLeft),
          ],
          wallTexture,
          { normalMode: "back" },
        ),
      );
    }

    return true;
  }

  clone(): Sector {
    const walls = emptyWalls();
    for (const direction of ALL_DIRECTIONS) {
      walls[direction] = this.stacks[direction].clone();
    }
    return new Sector(
      this.floor?.clone() ?? null,
      this.ceiling?.clone() ?? null,
      walls,
    );
  }
}
