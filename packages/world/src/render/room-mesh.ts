/**
 * Room to triangle list.
 *
 * Every triangle gets its own three vertices, so the two halves of a split
 * floor can carry different UVs and colors. Triangles that collapse to a
 * line (the missing half of a triangular wall) are skipped.
 */

import { SECTOR_SIZE } from "../core/constants";
import {
  ALL_DIRECTIONS,
  type CardinalDirection,
  type Corner,
  CORNER_OFFSETS,
  type Direction,
  EDGE_CORNERS,
  isDiagonal,
} from "../core/direction";
import {
  addVec3,
  cross,
  dot,
  negate,
  normalize,
  subtractVec3,
  vec3,
} from "../core/geometry/operations";
import type { Vec2, Vec3 } from "../core/geometry/types";
import type { Color } from "../faces/color";
import type { HorizontalFace } from "../faces/horizontal-face";
import type { UvQuad } from "../faces/types";
import type { VerticalFace } from "../faces/vertical-face";
import type { Room } from "../room/room";
import type { MeshTriangle, MeshVertex, RoomMesh, TextureResolver } from "./types";

const UP = vec3(0, 1, 0);
const DOWN = vec3(0, -1, 0);
const AREA_EPSILON = 1e-6;

const DEFAULT_FLOOR_UV: UvQuad = [
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
];

/** Wall UVs [bottom-left, bottom-right, top-right, top-left] */
const DEFAULT_WALL_UV: UvQuad = [
  { x: 0, y: 1 },
  { x: 1, y: 1 },
  { x: 1, y: 0 },
  { x: 0, y: 0 },
];

/** Same, for walls whose left corner is on the viewer's right */
const MIRRORED_WALL_UV: UvQuad = [
  { x: 1, y: 1 },
  { x: 0, y: 1 },
  { x: 0, y: 0 },
  { x: 1, y: 0 },
];

/** Edge walls face into their sector */
const INWARD: Readonly<Record<CardinalDirection, Vec3>> = {
  north: vec3(0, 0, 1),
  east: vec3(-1, 0, 0),
  south: vec3(0, 0, -1),
  west: vec3(1, 0, 0),
};

interface Corner3 {
  readonly position: Vec3;
  readonly uv: Vec2;
  readonly color: Color;
}

type Surface = Omit<MeshTriangle, "indices">;

class MeshBuilder {
  readonly vertices: MeshVertex[] = [];
  readonly triangles: MeshTriangle[] = [];

  /** Add a triangle wound so its front faces along `facing` */
  addTriangle(a: Corner3, b: Corner3, c: Corner3, facing: Vec3, surface: Surface): void {
    const raw = cross(subtractVec3(b.position, a.position), subtractVec3(c.position, a.position));
    const area = Math.sqrt(dot(raw, raw));
    if (area < AREA_EPSILON) return;

    const front = dot(raw, facing) >= 0;
    const [second, third]: readonly [Corner3, Corner3] = front ? [b, c] : [c, b];
    const normal = normalize(front ? raw : negate(raw));

    const base = this.vertices.length;
    for (const corner of [a, second, third]) {
      this.vertices.push({ ...corner, normal });
    }
    this.triangles.push({ indices: [base, base + 1, base + 2], ...surface });
  }
}

function cornerPosition(origin: Vec3, corner: Corner, height: number): Vec3 {
  const offset = CORNER_OFFSETS[corner];
  return addVec3(origin, vec3(offset.x * SECTOR_SIZE, height, offset.z * SECTOR_SIZE));
}

// =============================================================================
// FLOORS AND CEILINGS
// =============================================================================

function addHorizontalFace(
  mesh: MeshBuilder,
  face: HorizontalFace,
  origin: Vec3,
  facing: Vec3,
  resolve: TextureResolver,
): void {
  const triangles = face.triangles();

  triangles.forEach(([a, b, c], i) => {
    const half = i === 0 ? 1 : 2;
    const uv = face.triangleUv(half) ?? DEFAULT_FLOOR_UV;
    const colors = face.triangleColors(half);
    const at = (corner: Corner): Corner3 => ({
      position: cornerPosition(origin, corner, face.heights[corner]),
      uv: uv[corner],
      color: colors[corner],
    });

    mesh.addTriangle(at(a), at(b), at(c), facing, {
      textureId: resolve(face.triangleTexture(half)) ?? 0,
      blendMode: face.blendMode,
      normalMode: face.normalMode,
      blackTransparent: face.blackTransparent,
    });
  });
}

// =============================================================================
// WALLS
// =============================================================================

/** Normal of the side from which `left` appears on the viewer's left */
function frameNormal(direction: Direction): Vec3 {
  const [left, right] = EDGE_CORNERS[direction];
  const along = vec3(
    CORNER_OFFSETS[right].x - CORNER_OFFSETS[left].x,
    0,
    CORNER_OFFSETS[right].z - CORNER_OFFSETS[left].z,
  );
  return normalize(cross(along, UP));
}

/** UVs from world height, so stacked walls continue one texture */
function projectedUv(wall: VerticalFace, mirrored: boolean): UvQuad {
  const [bl, br, tr, tl] = wall.heights;
  const [uLeft, uRight] = mirrored ? [1, 0] : [0, 1];
  return [
    { x: uLeft, y: -bl / SECTOR_SIZE },
    { x: uRight, y: -br / SECTOR_SIZE },
    { x: uRight, y: -tr / SECTOR_SIZE },
    { x: uLeft, y: -tl / SECTOR_SIZE },
  ];
}

function addWall(
  mesh: MeshBuilder,
  wall: VerticalFace,
  direction: Direction,
  origin: Vec3,
  resolve: TextureResolver,
): void {
  const [left, right] = EDGE_CORNERS[direction];
  const frame = frameNormal(direction);
  const facing = isDiagonal(direction) ? frame : INWARD[direction];
  const mirrored = dot(frame, facing) < 0;

  const uv =
    wall.uv ??
    (wall.uvProjection === "projected"
      ? projectedUv(wall, mirrored)
      : mirrored
        ? MIRRORED_WALL_UV
        : DEFAULT_WALL_UV);

  const [hbl, hbr, htr, htl] = wall.heights;
  const [cbl, cbr, ctr, ctl] = wall.colors;
  const bottomLeft = { position: cornerPosition(origin, left, hbl), uv: uv[0], color: cbl };
  const bottomRight = { position: cornerPosition(origin, right, hbr), uv: uv[1], color: cbr };
  const topRight = { position: cornerPosition(origin, right, htr), uv: uv[2], color: ctr };
  const topLeft = { position: cornerPosition(origin, left, htl), uv: uv[3], color: ctl };

  const surface: Surface = {
    textureId: resolve(wall.texture) ?? 0,
    blendMode: wall.blendMode,
    normalMode: wall.normalMode,
    blackTransparent: wall.blackTransparent,
  };
  mesh.addTriangle(bottomLeft, bottomRight, topRight, facing, surface);
  mesh.addTriangle(bottomLeft, topRight, topLeft, facing, surface);
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * World-space triangles for every face in the room. Floors face up,
 * ceilings face down, edge walls face into their sector; a diagonal wall
 * faces the side from which its left corner is on the left.
 */
export function buildRoomMesh(room: Room, resolveTexture: TextureResolver): RoomMesh {
  const mesh = new MeshBuilder();

  for (const { x, z, sector } of room.iterSectors()) {
    const origin = room.gridToWorld(x, z);

    if (sector.floor) addHorizontalFace(mesh, sector.floor, origin, UP, resolveTexture);
    if (sector.ceiling) addHorizontalFace(mesh, sector.ceiling, origin, DOWN, resolveTexture);

    for (const direction of ALL_DIRECTIONS) {
      for (const wall of sector.walls(direction)) {
        addWall(mesh, wall, direction, origin, resolveTexture);
      }
    }
  }

  return { vertices: mesh.vertices, triangles: mesh.triangles };
}
