/**
 * Per-vertex colors modulate the texture: 128 is neutral, lower darkens,
 * higher brightens.
 */

import { NEUTRAL_CHANNEL } from "../core/constants";

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** One color per face corner, in the face's corner order. */
export type CornerColors = readonly [Color, Color, Color, Color];

export const NEUTRAL_COLOR: Color = {
  r: NEUTRAL_CHANNEL,
  g: NEUTRAL_CHANNEL,
  b: NEUTRAL_CHANNEL,
};

export function color(r: number, g: number, b: number): Color {
  return { r, g, b };
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

export function uniformColors(c: Color): CornerColors {
  return [c, c, c, c];
}

export function isUniform(colors: CornerColors): boolean {
  const [first] = colors;
  return colors.every((c) => colorsEqual(c, first));
}
