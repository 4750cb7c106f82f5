/**
 * Fixed-capacity stack of walls on one sector edge or diagonal.
 *
 * Capacity lives in the type: the backing tuple can only hold zero to three
 * walls, so a fourth wall has nowhere to go and `add` reports `slot-full`.
 */

import { MAX_WALLS_PER_EDGE } from "../core/constants";
import type { VerticalFace } from "../faces/vertical-face";

export type WallTuple =
  | readonly []
  | readonly [VerticalFace]
  | readonly [VerticalFace, VerticalFace]
  | readonly [VerticalFace, VerticalFace, VerticalFace];

export type WallInsertResult =
  | { readonly success: true; readonly index: number }
  | { readonly success: false; readonly reason: "slot-full" };

/**
 * Pack up to three walls into a tuple; undefined when there are more.
 */
function toWallTuple(faces: readonly VerticalFace[]): WallTuple | undefined {
  if (faces.length > MAX_WALLS_PER_EDGE) return undefined;
  const [a, b, c] = faces;
  if (a === undefined) return [];
  if (b === undefined) return [a];
  if (c === undefined) return [a, b];
  return [a, b, c];
}

export class WallStack implements Iterable<VerticalFace> {
  private items: WallTuple = [];

  /**
   * Build a stack from stored walls. More than MAX_WALLS_PER_EDGE is a
   * caller bug (the level schema already rejects it).
   */
  static from(faces: readonly VerticalFace[]): WallStack {
    const tuple = toWallTuple(faces);
    if (tuple === undefined) {
      throw new RangeError(
        `WallStack.from: ${faces.length} walls exceed the limit of ${MAX_WALLS_PER_EDGE}`,
      );
    }
    const stack = new WallStack();
    stack.items = tuple;
    return stack;
  }

  private list(): readonly VerticalFace[] {
    return this.items;
  }

  get length(): WallTuple["length"] {
    return this.items.length;
  }

  /** Walls in insertion order */
  get walls(): WallTuple {
    return this.items;
  }

  /** Copy of the walls as a plain array */
  toArray(): VerticalFace[] {
    return [...this.list()];
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  isFull(): boolean {
    return this.items.length === MAX_WALLS_PER_EDGE;
  }

  at(index: number): VerticalFace | undefined {
    return this.list()[index];
  }

  add(face: VerticalFace): WallInsertResult {
    const items = this.items;
    switch (items.length) {
      case 0:
        this.items = [face];
        return { success: true, index: 0 };
      case 1:
        this.items = [items[0], face];
        return { success: true, index: 1 };
      case 2:
        this.items = [items[0], items[1], face];
        return { success: true, index: 2 };
      case 3:
        return { success: false, reason: "slot-full" };
    }
  }

  /**
   * Remove the wall at `index`; returns it, or undefined when out of range.
   */
  removeAt(index: number): VerticalFace | undefined {
    const removed = this.list()[index];
    if (removed === undefined) return undefined;
    this.items = toWallTuple(this.list().filter((_, i) => i !== index)) ?? [];
    return removed;
  }

  clear(): void {
    this.items = [];
  }

  /**
   * Walls ordered bottom to top by average bottom height. Equal bottoms keep
   * insertion order.
   */
  sortedByBottom(): VerticalFace[] {
    return [...this.list()].sort((a, b) => a.yBottom() - b.yBottom());
  }

  /** Wall with the lowest average bottom, if any */
  lowest(): VerticalFace | undefined {
    return this.sortedByBottom()[0];
  }

  /** Highest corner of any wall, or undefined when empty */
  maxHeight(): number | undefined {
    if (this.items.length === 0) return undefined;
    return Math.max(...this.list().map((wall) => wall.yMax()));
  }

  /** Lowest corner of any wall, or undefined when empty */
  minHeight(): number | undefined {
    if (this.items.length === 0) return undefined;
    return Math.min(...this.list().map((wall) => wall.yMin()));
  }

  clone(): WallStack {
    return WallStack.from(this.list().map((wall) => wall.clone()));
  }

  [Symbol.iterator](): Iterator<VerticalFace> {
    return this.list()[Symbol.iterator]();
  }
}
