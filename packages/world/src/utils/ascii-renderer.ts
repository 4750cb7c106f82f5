/**
 * ASCII Room Renderer
 *
 * Plan view of rooms for debugging: one character per sector, north at the
 * top, X growing to the right.
 *
 * @example
 * ```typescript
 * import {
 *   createTestLevel,
 *   printLevel,
 *   SIMPLE_CHARSET,
 *   TextureRef,
 * } from "@sectorforge/world";
 *
 * const wall = new TextureRef("SAMPLE", "wall_01");
 * printLevel(createTestLevel(wall, wall), { charset: SIMPLE_CHARSET });
 * ```
 */

import { ALL_DIRECTIONS, isDiagonal } from "../core/direction";
import type { Level } from "../level/level";
import type { Room } from "../room/room";
import type { Sector } from "../sector/sector";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Character per sector kind
 */
export interface AsciiCharset {
  /** Has a floor, no walls */
  readonly floor: string;
  /** Ceiling but no floor (a pit under a roof) */
  readonly ceilingOnly: string;
  /** At least one edge wall */
  readonly walled: string;
  /** At least one diagonal wall */
  readonly diagonal: string;
  /** No sector, or a sector with no geometry */
  readonly empty: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  floor: "·",
  ceilingOnly: "○",
  walled: "█",
  diagonal: "╱",
  empty: " ",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  floor: ".",
  ceilingOnly: "o",
  walled: "#",
  diagonal: "/",
  empty: " ",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Column labels every 10 sectors, row labels on the left */
  readonly showCoordinates?: boolean;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
}

export type SectorKind = keyof AsciiCharset;

// =============================================================================
// ANSI COLOR CODES
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  white: "\x1b[37m",
} as const;

const KIND_COLORS: Readonly<Record<SectorKind, string>> = {
  floor: ANSI.dim + ANSI.white,
  ceilingOnly: ANSI.cyan,
  walled: ANSI.blue,
  diagonal: ANSI.yellow,
  empty: "",
};

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Classify a cell. Diagonal walls win over edge walls, walls over floors.
 */
export function classifySector(sector: Sector | undefined): SectorKind {
  if (!sector || sector.isEmpty()) return "empty";

  let walled = false;
  for (const direction of ALL_DIRECTIONS) {
    if (sector.walls(direction).length === 0) continue;
    if (isDiagonal(direction)) return "diagonal";
    walled = true;
  }

  if (walled) return "walled";
  if (sector.floor) return "floor";
  return "ceilingOnly";
}

/**
 * Render a room's sector grid
 */
export function renderRoomAscii(room: Room, options: RenderOptions = {}): string {
  const { charset = DEFAULT_CHARSET, showCoordinates = false, useColors = false } = options;
  const lines: string[] = [];

  if (showCoordinates) {
    let coordLine = "    ";
    for (let x = 0; x < room.width; x += 10) {
      coordLine += x.toString().padEnd(10);
    }
    lines.push(coordLine.trimEnd());
  }

  for (let z = 0; z < room.depth; z++) {
    let line = showCoordinates ? `${z.toString().padStart(3)} ` : "";
    for (let x = 0; x < room.width; x++) {
      const kind = classifySector(room.getSector(x, z));
      const char = charset[kind];
      line += useColors && KIND_COLORS[kind] ? colorize(char, KIND_COLORS[kind]) : char;
    }
    lines.push(line);
  }

  return lines.join("\n");
}

/**
 * Room header (id, placement, size, height range) followed by its grid
 */
export function renderRoomDetail(room: Room, options: RenderOptions = {}): string {
  const { x, y, z } = room.position;
  const heights =
    room.minY === undefined || room.maxY === undefined
      ? "no geometry"
      : `${room.minY}..${room.maxY}`;

  return [
    `Room ${room.id}`,
    `Position: (${x}, ${y}, ${z})`,
    `Size: ${room.width}×${room.depth}`,
    `Sectors: ${room.sectorCount}`,
    `Heights: ${heights}`,
    "",
    renderRoomAscii(room, options),
  ].join("\n");
}

/**
 * Every room of a level, one detail block each
 */
export function renderLevelAscii(level: Level, options: RenderOptions = {}): string {
  return level.rooms.map((room) => renderRoomDetail(room, options)).join("\n\n");
}

export function printLevel(level: Level, options: RenderOptions = {}): void {
  console.log(renderLevelAscii(level, options));
}

// =============================================================================
// LEGEND
// =============================================================================

export function renderLegend(charset: AsciiCharset = DEFAULT_CHARSET): string {
  return [
    "Legend:",
    `  ${charset.floor} Floor`,
    `  ${charset.ceilingOnly} Ceiling only`,
    `  ${charset.walled} Walled`,
    `  ${charset.diagonal} Diagonal wall`,
    `  ${charset.empty} Empty`,
  ].join("\n");
}
