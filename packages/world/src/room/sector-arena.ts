/**
 * Sparse backing store for a room's sectors.
 *
 * Cells are addressed by arena coordinates, which never change once a
 * sector is stored. The room maps grid indices onto them through an offset,
 * so inserting rows or columns at index 0 moves no data.
 */

import type { Sector } from "../sector/sector";

/**
 * Arena coordinates live in [-AXIS_BIAS, AXIS_BIAS) on each axis. Rooms
 * re-key on trim, so only a grid wider than AXIS_BIAS can leave the range.
 */
const AXIS_BIAS = 1 << 20;
const STRIDE = AXIS_BIAS * 2;

function packKey(ax: number, az: number): number {
  return (az + AXIS_BIAS) * STRIDE + (ax + AXIS_BIAS);
}

function unpackKey(key: number): { ax: number; az: number } {
  return {
    ax: (key % STRIDE) - AXIS_BIAS,
    az: Math.floor(key / STRIDE) - AXIS_BIAS,
  };
}

export class SectorArena {
  private readonly cells = new Map<number, Sector>();

  get size(): number {
    return this.cells.size;
  }

  get(ax: number, az: number): Sector | undefined {
    return this.cells.get(packKey(ax, az));
  }

  set(ax: number, az: number, sector: Sector): void {
    this.cells.set(packKey(ax, az), sector);
  }

  delete(ax: number, az: number): Sector | undefined {
    const key = packKey(ax, az);
    const sector = this.cells.get(key);
    this.cells.delete(key);
    return sector;
  }

  clear(): void {
    this.cells.clear();
  }

  *entries(): Generator<{ ax: number; az: number; sector: Sector }> {
    for (const [key, sector] of this.cells) {
      yield { ...unpackKey(key), sector };
    }
  }

  /** Deep copy: sectors are cloned, not shared */
  clone(): SectorArena {
    const copy = new SectorArena();
    for (const [key, sector] of this.cells) {
      copy.cells.set(key, sector.clone());
    }
    return copy;
  }
}
