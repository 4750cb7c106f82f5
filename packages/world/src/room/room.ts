/**
 * Room: a grid of sectors placed in world space.
 *
 * Grid index (gx, gz) maps to arena cell (gx + offsetX, gz + offsetZ).
 * Growing toward -X/-Z lowers the offsets and moves `position` by the same
 * number of sectors in one step, so existing geometry never moves in world
 * space.
 */

import { DEFAULT_AMBIENT, DEFAULT_CEILING_HEIGHT, SECTOR_SIZE } from "../core/constants";
import {
  ALL_DIRECTIONS,
  type CardinalDirection,
  Corner,
  CORNER_OFFSETS,
  type Direction,
  EDGE_CORNERS,
} from "../core/direction";
import {
  aabbContains,
  emptyAabb,
  expandAabb,
  isEmptyAabb,
  subtractVec3,
  translateAabb,
  vec3,
} from "../core/geometry/operations";
import type { Aabb, Vec3 } from "../core/geometry/types";
import { HorizontalFace } from "../faces/horizontal-face";
import type { TextureRef } from "../faces/texture-ref";
import { VerticalFace, type VerticalFaceOptions } from "../faces/vertical-face";
import type { GapResult } from "../gap/types";
import { Sector } from "../sector/sector";
import type { WallInsertResult } from "../sector/wall-stack";
import { SectorArena } from "./sector-arena";

const DEV_MODE = process.env.NODE_ENV !== "production";

/** Horizontal face heights are stored [NW, NE, SE, SW] */
const FACE_CORNERS: readonly Corner[] = [Corner.NW, Corner.NE, Corner.SE, Corner.SW];

// =============================================================================
// TYPES
// =============================================================================

export interface GridCoord {
  readonly x: number;
  readonly z: number;
}

export interface RoomCell extends GridCoord {
  readonly sector: Sector;
}

/** Sector to place at an offset from an anchor cell */
export interface SectorPlacement {
  readonly dx: number;
  readonly dz: number;
  readonly sector: Sector;
}

export interface RoomOptions {
  /** Ambient light, 0..1 */
  readonly ambient?: number;
}

export interface FillWallOptions extends VerticalFaceOptions {
  readonly preferredY?: number;
  /** Floor height assumed when the sector has no floor (default 0) */
  readonly fallbackFloor?: number;
  /** Ceiling height assumed when the sector has no ceiling */
  readonly fallbackCeiling?: number;
}

/** Result of an edit, plus the cell it landed in after any growth */
export type RoomEdit<T> = T & { readonly cell: GridCoord };

function assertGridIndex(gx: number, gz: number): void {
  if (!Number.isInteger(gx) || !Number.isInteger(gz)) {
    throw new RangeError(`Invalid grid index: (${gx}, ${gz})`);
  }
}

// =============================================================================
// ROOM
// =============================================================================

export class Room {
  id: number;
  ambient: number;
  private _position: Vec3;
  private _width: number;
  private _depth: number;
  private offsetX = 0;
  private offsetZ = 0;
  private arena = new SectorArena();
  private _bounds: Aabb = emptyAabb();

  constructor(
    id: number,
    position: Vec3,
    width: number,
    depth: number,
    options: RoomOptions = {},
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(depth) || width <= 0 || depth <= 0) {
      throw new RangeError(`Invalid room dimensions: ${width}x${depth}`);
    }

    this.id = id;
    this._position = position;
    this._width = width;
    this._depth = depth;
    this.ambient = options.ambient ?? DEFAULT_AMBIENT;
  }

  get position(): Vec3 {
    return this._position;
  }

  /** Sectors along X */
  get width(): number {
    return this._width;
  }

  /** Sectors along Z */
  get depth(): number {
    return this._depth;
  }

  /** Room-relative bounds of all geometry; empty when there is none */
  get bounds(): Aabb {
    return this._bounds;
  }

  get minY(): number | undefined {
    return isEmptyAabb(this._bounds) ? undefined : this._bounds.min.y;
  }

  get maxY(): number | undefined {
    return isEmptyAabb(this._bounds) ? undefined : this._bounds.max.y;
  }

  get sectorCount(): number {
    return this.arena.size;
  }

  /** Move the whole room; geometry stays put relative to `position`. */
  moveTo(position: Vec3): void {
    this._position = position;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  isInBounds(gx: number, gz: number): boolean {
    return (
      Number.isInteger(gx) &&
      Number.isInteger(gz) &&
      gx >= 0 &&
      gx < this._width &&
      gz >= 0 &&
      gz < this._depth
    );
  }

  getSector(gx: number, gz: number): Sector | undefined {
    if (!this.isInBounds(gx, gz)) return undefined;
    return this.arena.get(gx + this.offsetX, gz + this.offsetZ);
  }

  /**
   * Store a copy of `sector` in an existing cell. Use `ensureSector` or
   * `placeSectors` to grow the grid.
   */
  setSector(gx: number, gz: number, sector: Sector): boolean {
    if (!this.isInBounds(gx, gz)) {
      if (DEV_MODE) {
        console.warn(
          `[Room] setSector: out of bounds (${gx}, ${gz}) for room ${this._width}x${this._depth}`,
        );
      }
      return false;
    }
    this.arena.set(gx + this.offsetX, gz + this.offsetZ, sector.clone());
    return true;
  }

  removeSector(gx: number, gz: number): Sector | undefined {
    if (!this.isInBounds(gx, gz)) {
      if (DEV_MODE) {
        console.warn(
          `[Room] removeSector: out of bounds (${gx}, ${gz}) for room ${this._width}x${this._depth}`,
        );
      }
      return undefined;
    }
    return this.arena.delete(gx + this.offsetX, gz + this.offsetZ);
  }

  /** Occupied cells, ordered by x then z */
  *iterSectors(): Generator<RoomCell> {
    const cells: RoomCell[] = [];
    for (const { ax, az, sector } of this.arena.entries()) {
      cells.push({ x: ax - this.offsetX, z: az - this.offsetZ, sector });
    }
    cells.sort((a, b) => a.x - b.x || a.z - b.z);
    yield* cells;
  }

  // ===========================================================================
  // GROWTH
  // ===========================================================================

  /**
   * Add `count` rows or columns on one side. Toward west/north the new cells
   * take index 0 and `position` moves back by `count` sectors.
   */
  grow(direction: CardinalDirection, count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Invalid growth count: ${count}`);
    }
    if (count === 0) return;

    const shift = count * SECTOR_SIZE;
    switch (direction) {
      case "west":
        this.offsetX -= count;
        this._width += count;
        this._position = vec3(this._position.x - shift, this._position.y, this._position.z);
        this._bounds = translateAabb(this._bounds, vec3(shift, 0, 0));
        break;
      case "north":
        this.offsetZ -= count;
        this._depth += count;
        this._position = vec3(this._position.x, this._position.y, this._position.z - shift);
        this._bounds = translateAabb(this._bounds, vec3(0, 0, shift));
        break;
      case "east":
        this._width += count;
        break;
      case "south":
        this._depth += count;
        break;
    }
  }

  /**
   * Grow just enough for (gx, gz) to be a valid index and return where that
   * cell sits afterwards.
   */
  growToInclude(gx: number, gz: number): GridCoord {
    assertGridIndex(gx, gz);

    const west = gx < 0 ? -gx : 0;
    const north = gz < 0 ? -gz : 0;
    this.grow("west", west);
    this.grow("north", north);
    this.grow("east", Math.max(0, gx - this._width + 1));
    this.grow("south", Math.max(0, gz - this._depth + 1));

    return { x: gx + west, z: gz + north };
  }

  /** Sector at (gx, gz), created empty (growing the grid) if missing */
  ensureSector(gx: number, gz: number): RoomCell {
    const cell = this.growToInclude(gx, gz);
    const ax = cell.x + this.offsetX;
    const az = cell.z + this.offsetZ;
    const existing = this.arena.get(ax, az);
    if (existing) return { ...cell, sector: existing };

    const sector = Sector.empty();
    this.arena.set(ax, az, sector);
    return { ...cell, sector };
  }

  /**
   * Place copies of several sectors around an anchor in one step. The grid
   * grows once to cover every target; returns where each placement landed.
   */
  placeSectors(
    anchorX: number,
    anchorZ: number,
    placements: readonly SectorPlacement[],
  ): GridCoord[] {
    if (placements.length === 0) return [];

    const targets = placements.map((p) => ({
      x: anchorX + p.dx,
      z: anchorZ + p.dz,
      sector: p.sector,
    }));
    const minX = Math.min(...targets.map((t) => t.x));
    const minZ = Math.min(...targets.map((t) => t.z));
    const maxX = Math.max(...targets.map((t) => t.x));
    const maxZ = Math.max(...targets.map((t) => t.z));

    const origin = this.growToInclude(minX, minZ);
    const shiftX = origin.x - minX;
    const shiftZ = origin.z - minZ;
    this.growToInclude(maxX + shiftX, maxZ + shiftZ);

    const landed = targets.map((target) => {
      const cell = { x: target.x + shiftX, z: target.z + shiftZ };
      this.arena.set(cell.x + this.offsetX, cell.z + this.offsetZ, target.sector.clone());
      return cell;
    });

    this.recalculateBounds();
    return landed;
  }

  // ===========================================================================
  // EDITS
  // ===========================================================================

  setFloor(gx: number, gz: number, height: number, texture: TextureRef): GridCoord {
    const { sector, ...cell } = this.ensureSector(gx, gz);
    sector.floor = HorizontalFace.flat(height, texture);
    this.recalculateBounds();
    return cell;
  }

  setCeiling(gx: number, gz: number, height: number, texture: TextureRef): GridCoord {
    const { sector, ...cell } = this.ensureSector(gx, gz);
    sector.ceiling = HorizontalFace.flat(height, texture);
    this.recalculateBounds();
    return cell;
  }

  /** Rectangular wall from `bottom` to `top` on one edge */
  addWall(
    gx: number,
    gz: number,
    direction: Direction,
    bottom: number,
    top: number,
    texture: TextureRef,
  ): RoomEdit<WallInsertResult> {
    const { sector, ...cell } = this.ensureSector(gx, gz);
    const result = sector.addWall(direction, VerticalFace.span(bottom, top, texture));
    if (result.success) this.recalculateBounds();
    return { ...result, cell };
  }

  /**
   * Ask the gap solver where the next wall on an edge goes and insert it
   * there. Failures (full slot, no gap) leave the sector unchanged.
   */
  fillNextWall(
    gx: number,
    gz: number,
    direction: Direction,
    texture: TextureRef,
    options: FillWallOptions = {},
  ): RoomEdit<GapResult> {
    const { preferredY, fallbackFloor, fallbackCeiling, ...faceOptions } = options;
    const { sector, ...cell } = this.ensureSector(gx, gz);

    const result = sector.nextWallPosition(direction, {
      fallbackFloor: fallbackFloor ?? 0,
      fallbackCeiling: fallbackCeiling ?? DEFAULT_CEILING_HEIGHT,
      preferredY,
    });

    if (result.success) {
      sector.addWall(direction, VerticalFace.fromHeights(result.heights, texture, faceOptions));
      this.recalculateBounds();
    }
    return { ...result, cell };
  }

  /** Raise a sector's floor and close the step with walls */
  extrudeFloor(gx: number, gz: number, amount: number, wallTexture: TextureRef): boolean {
    const sector = this.getSector(gx, gz);
    if (!sector) return false;

    const extruded = sector.extrudeFloor(amount, wallTexture);
    if (extruded) this.recalculateBounds();
    return extruded;
  }

  // ===========================================================================
  // CLEANUP
  // ===========================================================================

  /**
   * Drop boundary rows and columns that hold no sector. Leading ones move
   * `position` forward so nothing moves in world space. A room with no
   * sectors at all shrinks to 1x1 in place. The arena is re-keyed so grid
   * index (0, 0) sits at arena (0, 0) again.
   */
  trimEmptyEdges(): void {
    let minX = Infinity;
    let minZ = Infinity;
    let maxX = -Infinity;
    let maxZ = -Infinity;

    for (const { x, z } of this.iterSectors()) {
      minX = Math.min(minX, x);
      minZ = Math.min(minZ, z);
      maxX = Math.max(maxX, x);
      maxZ = Math.max(maxZ, z);
    }

    if (minX === Infinity) {
      this.arena.clear();
      this.offsetX = 0;
      this.offsetZ = 0;
      this._width = 1;
      this._depth = 1;
      this._bounds = emptyAabb();
      return;
    }

    // Re-key from zero so offsets do not creep toward the arena's range.
    const arena = new SectorArena();
    for (const { x, z, sector } of this.iterSectors()) {
      arena.set(x - minX, z - minZ, sector);
    }
    this.arena = arena;
    this.offsetX = 0;
    this.offsetZ = 0;
    this._width = maxX - minX + 1;
    this._depth = maxZ - minZ + 1;
    this._position = vec3(
      this._position.x + minX * SECTOR_SIZE,
      this._position.y,
      this._position.z + minZ * SECTOR_SIZE,
    );
    this._bounds = translateAabb(
      this._bounds,
      vec3(-minX * SECTOR_SIZE, 0, -minZ * SECTOR_SIZE),
    );
  }

  /** Remove sectors with no geometry, then trim. Returns how many went. */
  cleanupEmptySectors(): number {
    const empty = [...this.iterSectors()].filter(({ sector }) => sector.isEmpty());
    for (const { x, z } of empty) {
      this.arena.delete(x + this.offsetX, z + this.offsetZ);
    }
    this.trimEmptyEdges();
    return empty.length;
  }

  /**
   * Rebuild the room-relative bounds from every floor, ceiling and wall
   * corner. Call after any vertical edit made directly on a sector.
   */
  recalculateBounds(): void {
    let bounds = emptyAabb();

    const corner = (gx: number, gz: number, c: Corner, y: number): Vec3 => {
      const offset = CORNER_OFFSETS[c];
      return vec3((gx + offset.x) * SECTOR_SIZE, y, (gz + offset.z) * SECTOR_SIZE);
    };

    for (const { x, z, sector } of this.iterSectors()) {
      for (const face of [sector.floor, sector.ceiling]) {
        if (!face) continue;
        for (const c of FACE_CORNERS) {
          bounds = expandAabb(bounds, corner(x, z, c, face.heights[c]));
        }
      }

      for (const direction of ALL_DIRECTIONS) {
        const [left, right] = EDGE_CORNERS[direction];
        for (const wall of sector.walls(direction)) {
          const [bl, br, tr, tl] = wall.heights;
          bounds = expandAabb(bounds, corner(x, z, left, bl));
          bounds = expandAabb(bounds, corner(x, z, left, tl));
          bounds = expandAabb(bounds, corner(x, z, right, br));
          bounds = expandAabb(bounds, corner(x, z, right, tr));
        }
      }
    }

    this._bounds = bounds;
  }

  // ===========================================================================
  // SPATIAL QUERIES
  // ===========================================================================

  /** Grid cell under a world-space XZ position, undefined outside the grid */
  worldToGrid(worldX: number, worldZ: number): GridCoord | undefined {
    const gx = Math.floor((worldX - this._position.x) / SECTOR_SIZE);
    const gz = Math.floor((worldZ - this._position.z) / SECTOR_SIZE);
    return this.isInBounds(gx, gz) ? { x: gx, z: gz } : undefined;
  }

  /** World position of a cell's NW corner at the room's base height */
  gridToWorld(gx: number, gz: number): Vec3 {
    return vec3(
      this._position.x + gx * SECTOR_SIZE,
      this._position.y,
      this._position.z + gz * SECTOR_SIZE,
    );
  }

  containsPoint(point: Vec3): boolean {
    return aabbContains(this._bounds, subtractVec3(point, this._position));
  }

  worldBounds(): Aabb {
    return translateAabb(this._bounds, this._position);
  }

  clone(): Room {
    const copy = new Room(this.id, this._position, this._width, this._depth, {
      ambient: this.ambient,
    });
    copy.offsetX = this.offsetX;
    copy.offsetZ = this.offsetZ;
    copy.arena = this.arena.clone();
    copy._bounds = this._bounds;
    return copy;
  }
}
