import { z } from "zod";

/**
 * Limits enforced by the validation layer between file I/O and the
 * geometry engine. The engine itself assumes finite, in-range values.
 */
export const LevelLimitsSchema = z.object({
  maxRooms: z.number().int().positive().default(256),
  maxRoomSize: z.number().int().positive().default(128),
  maxStringLength: z.number().int().positive().default(256),
  maxCoord: z.number().positive().default(1_000_000),
});

export type LevelLimits = z.infer<typeof LevelLimitsSchema>;

export const DEFAULT_LEVEL_LIMITS: LevelLimits = LevelLimitsSchema.parse({});
