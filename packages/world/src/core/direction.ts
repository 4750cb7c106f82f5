/**
 * Sector edges and diagonals.
 *
 * Direction is a closed set: every per-direction table below is a
 * `Record<Direction, ...>`, so adding a new edge kind fails to compile until
 * each table covers it.
 */

/**
 * Sector corners, indexing a horizontal face's heights [NW, NE, SE, SW].
 * NW = (-X, -Z), NE = (+X, -Z), SE = (+X, +Z), SW = (-X, +Z).
 */
export const Corner = {
  NW: 0,
  NE: 1,
  SE: 2,
  SW: 3,
} as const;

export type Corner = (typeof Corner)[keyof typeof Corner];

export const Direction = {
  North: "north",
  East: "east",
  South: "south",
  West: "west",
  NwSe: "nw-se",
  NeSw: "ne-sw",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

export type CardinalDirection =
  | typeof Direction.North
  | typeof Direction.East
  | typeof Direction.South
  | typeof Direction.West;

export type DiagonalDirection = typeof Direction.NwSe | typeof Direction.NeSw;

export const ALL_DIRECTIONS: readonly Direction[] = [
  Direction.North,
  Direction.East,
  Direction.South,
  Direction.West,
  Direction.NwSe,
  Direction.NeSw,
];

export const CARDINAL_DIRECTIONS: readonly CardinalDirection[] = [
  Direction.North,
  Direction.East,
  Direction.South,
  Direction.West,
];

/**
 * The two corners bounding each edge or diagonal, as seen from inside the
 * sector: [left, right]. A wall's bottom-left/top-left corners sit on the
 * left corner.
 */
export const EDGE_CORNERS: Readonly<
  Record<Direction, readonly [left: Corner, right: Corner]>
> = {
  north: [Corner.NW, Corner.NE],
  east: [Corner.NE, Corner.SE],
  south: [Corner.SW, Corner.SE],
  west: [Corner.NW, Corner.SW],
  "nw-se": [Corner.NW, Corner.SE],
  "ne-sw": [Corner.NE, Corner.SW],
};

/** Local position of each corner inside the sector, in units of SECTOR_SIZE. */
export const CORNER_OFFSETS: Readonly<
  Record<Corner, { readonly x: number; readonly z: number }>
> = {
  [Corner.NW]: { x: 0, z: 0 },
  [Corner.NE]: { x: 1, z: 0 },
  [Corner.SE]: { x: 1, z: 1 },
  [Corner.SW]: { x: 0, z: 1 },
};

const OPPOSITE: Readonly<Record<CardinalDirection, CardinalDirection>> = {
  north: Direction.South,
  east: Direction.West,
  south: Direction.North,
  west: Direction.East,
};

const GRID_OFFSET: Readonly<
  Record<CardinalDirection, { readonly x: number; readonly z: number }>
> = {
  north: { x: 0, z: -1 },
  east: { x: 1, z: 0 },
  south: { x: 0, z: 1 },
  west: { x: -1, z: 0 },
};

export function isDiagonal(direction: Direction): direction is DiagonalDirection {
  return direction === Direction.NwSe || direction === Direction.NeSw;
}

export function isCardinal(
  direction: Direction,
): direction is CardinalDirection {
  return !isDiagonal(direction);
}

/**
 * Opposite cardinal direction (the edge a neighbouring sector shares).
 */
export function oppositeDirection(
  direction: CardinalDirection,
): CardinalDirection {
  return OPPOSITE[direction];
}

/**
 * Grid offset toward the neighbouring sector across an edge.
 */
export function directionOffset(direction: CardinalDirection): {
  readonly x: number;
  readonly z: number;
} {
  return GRID_OFFSET[direction];
}
