import { z } from "zod";

/**
 * Schemas for the face primitives of a sector.
 *
 * Only `heights` and `texture` belong to the initial format. Every other
 * field carries a default so older saved levels still load.
 */

export const NEUTRAL_CHANNEL = 128;

export const Vec2Schema = z.object({
  x: z.number(),
  y: z.number(),
});

export const Vec3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const TextureRefSchema = z.object({
  pack: z.string(),
  name: z.string(),
});

const ChannelSchema = z
  .number()
  .int("Color channels must be integers")
  .min(0)
  .max(255, { error: "Color channels must fit in 8 bits" });

export const ColorSchema = z.object({
  r: ChannelSchema,
  g: ChannelSchema,
  b: ChannelSchema,
});

export const BlendModeSchema = z.enum([
  "opaque",
  "average",
  "add",
  "subtract",
  "add-quarter",
  "erase",
]);

export const FaceNormalModeSchema = z.enum(["front", "back", "both"]);

export const SplitDirectionSchema = z.enum(["nw-se", "ne-sw"]);

export const UvProjectionSchema = z.enum(["default", "projected"]);

/** Four corner heights; corner order depends on the face kind. */
export const HeightsSchema = z.tuple([
  z.number(),
  z.number(),
  z.number(),
  z.number(),
]);

export const UvQuadSchema = z.tuple([
  Vec2Schema,
  Vec2Schema,
  Vec2Schema,
  Vec2Schema,
]);

export const ColorQuadSchema = z.tuple([
  ColorSchema,
  ColorSchema,
  ColorSchema,
  ColorSchema,
]);

function neutralColors(): z.infer<typeof ColorQuadSchema> {
  const neutral = () => ({
    r: NEUTRAL_CHANNEL,
    g: NEUTRAL_CHANNEL,
    b: NEUTRAL_CHANNEL,
  });
  return [neutral(), neutral(), neutral(), neutral()];
}

/**
 * Floor or ceiling. Heights are ordered [NW, NE, SE, SW].
 * `texture2`/`uv2`/`colors2` override the second triangle of the split.
 */
export const HorizontalFaceSchema = z.object({
  heights: HeightsSchema,
  texture: TextureRefSchema,
  uv: UvQuadSchema.nullable().default(null),
  colors: ColorQuadSchema.default(neutralColors),
  splitDirection: SplitDirectionSchema.default("nw-se"),
  texture2: TextureRefSchema.nullable().default(null),
  uv2: UvQuadSchema.nullable().default(null),
  colors2: ColorQuadSchema.nullable().default(null),
  walkable: z.boolean().default(true),
  blendMode: BlendModeSchema.default("opaque"),
  normalMode: FaceNormalModeSchema.default("front"),
  blackTransparent: z.boolean().default(true),
});

/**
 * Wall segment. Heights are ordered
 * [bottom-left, bottom-right, top-right, top-left].
 */
export const VerticalFaceSchema = z.object({
  heights: HeightsSchema,
  texture: TextureRefSchema,
  uv: UvQuadSchema.nullable().default(null),
  colors: ColorQuadSchema.default(neutralColors),
  solid: z.boolean().default(true),
  blendMode: BlendModeSchema.default("opaque"),
  normalMode: FaceNormalModeSchema.default("front"),
  blackTransparent: z.boolean().default(true),
  uvProjection: UvProjectionSchema.default("default"),
});

export type Vec2Data = z.infer<typeof Vec2Schema>;
export type Vec3Data = z.infer<typeof Vec3Schema>;
export type TextureRefData = z.infer<typeof TextureRefSchema>;
export type ColorData = z.infer<typeof ColorSchema>;
export type BlendMode = z.infer<typeof BlendModeSchema>;
export type FaceNormalMode = z.infer<typeof FaceNormalModeSchema>;
export type SplitDirection = z.infer<typeof SplitDirectionSchema>;
export type UvProjection = z.infer<typeof UvProjectionSchema>;
export type Heights = z.infer<typeof HeightsSchema>;
export type UvQuad = z.infer<typeof UvQuadSchema>;
export type ColorQuad = z.infer<typeof ColorQuadSchema>;
export type HorizontalFaceData = z.infer<typeof HorizontalFaceSchema>;
export type VerticalFaceData = z.infer<typeof VerticalFaceSchema>;
