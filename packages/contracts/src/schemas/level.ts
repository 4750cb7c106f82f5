import { z } from "zod";
import {
  HorizontalFaceSchema,
  Vec3Schema,
  VerticalFaceSchema,
} from "./faces";

/** Hard cap on stacked walls per sector edge or diagonal. */
export const MAX_WALLS_PER_EDGE = 3;

/** Current level format version. */
export const LEVEL_FORMAT_VERSION = 2;

const WallListSchema = z
  .array(VerticalFaceSchema)
  .max(MAX_WALLS_PER_EDGE, {
    error: `An edge holds at most ${MAX_WALLS_PER_EDGE} walls`,
  })
  .default(() => []);

export const SectorSchema = z.object({
  floor: HorizontalFaceSchema.nullable().default(null),
  ceiling: HorizontalFaceSchema.nullable().default(null),
  wallsNorth: WallListSchema,
  wallsEast: WallListSchema,
  wallsSouth: WallListSchema,
  wallsWest: WallListSchema,
  // Diagonal slots arrived with format version 2.
  wallsNwSe: WallListSchema,
  wallsNeSw: WallListSchema,
});

/**
 * Room grid. `sectors` is column-major: `sectors[x][z]`.
 */
export const RoomSchema = z
  .object({
    id: z.number().int().nonnegative(),
    position: Vec3Schema,
    width: z.number().int().positive("Room width must be positive"),
    depth: z.number().int().positive("Room depth must be positive"),
    sectors: z.array(z.array(SectorSchema.nullable())),
    ambient: z.number().min(0).max(1).default(0.5),
  })
  .superRefine((room, ctx) => {
    if (room.sectors.length !== room.width) {
      ctx.addIssue({
        code: "custom",
        message: `sectors array width mismatch (${room.sectors.length} != ${room.width})`,
        path: ["sectors"],
      });
      return;
    }
    room.sectors.forEach((column, x) => {
      if (column.length !== room.depth) {
        ctx.addIssue({
          code: "custom",
          message: `sectors[${x}] depth mismatch (${column.length} != ${room.depth})`,
          path: ["sectors", x],
        });
      }
    });
  });

export const LevelSchema = z.object({
  version: z.number().int().positive().default(1),
  rooms: z.array(RoomSchema),
});

export type SectorData = z.infer<typeof SectorSchema>;
export type RoomData = z.infer<typeof RoomSchema>;
export type LevelData = z.infer<typeof LevelSchema>;
/** Shape accepted by the decoder: every defaulted field may be omitted. */
export type LevelInput = z.input<typeof LevelSchema>;
