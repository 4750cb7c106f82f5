import { LevelLimitsSchema, type LevelLimits } from "../schemas/limits";
import { LevelError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";
import { formatIssues } from "./issues";

/** Room dimensions above this are never accepted, whatever the caller asks. */
const HARD_MAX_ROOM_SIZE = 1024;
const HARD_MAX_ROOMS = 4096;

export type BuildLimitsInput = Partial<LevelLimits>;

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(Math.floor(value), max));
}

/**
 * Build validation limits from partial input: defaults fill the gaps,
 * counts are clamped to the hard ceilings, then the schema has the last word.
 */
export function buildLevelLimits(
  input: BuildLimitsInput = {},
): Result<LevelLimits, LevelError> {
  const candidate = {
    ...input,
    ...(input.maxRoomSize !== undefined && {
      maxRoomSize: clampInt(input.maxRoomSize, 1, HARD_MAX_ROOM_SIZE),
    }),
    ...(input.maxRooms !== undefined && {
      maxRooms: clampInt(input.maxRooms, 1, HARD_MAX_ROOMS),
    }),
  };

  const parsed = LevelLimitsSchema.safeParse(candidate);
  if (!parsed.success) {
    return Err(
      LevelError.validationFailed("LIMITS_INVALID", formatIssues(parsed.error), {
        input,
      }),
    );
  }
  return Ok(parsed.data);
}
