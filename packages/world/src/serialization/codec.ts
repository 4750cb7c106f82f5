/**
 * Level codec.
 *
 * `serializeLevel`/`deserializeLevel` convert between a live level and plain
 * data; `encodeLevel`/`decodeLevel` add the JSON text layer. Loading always
 * runs the schema (which fills defaults for fields older files lack) and
 * then `validateLevel` before any room is built.
 */

import {
  DEFAULT_LEVEL_LIMITS,
  Err,
  formatIssues,
  LEVEL_FORMAT_VERSION,
  LevelError,
  type LevelData,
  type LevelLimits,
  LevelSchema,
  Result,
} from "@sectorforge/contracts";
import type { Level } from "../level/level";
import { levelFromData, levelToData } from "./convert";
import { validateLevel } from "./validate-level";

export interface EncodeOptions {
  /** Indent the JSON output */
  readonly pretty?: boolean;
}

export function serializeLevel(level: Level): LevelData {
  return levelToData(level);
}

/**
 * Build a level from untrusted data: schema first, then limits.
 */
export function deserializeLevel(
  input: unknown,
  limits: LevelLimits = DEFAULT_LEVEL_LIMITS,
): Result<Level, LevelError> {
  const parsed = LevelSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      LevelError.schemaInvalid(formatIssues(parsed.error), {
        issues: parsed.error.issues.length,
      }),
    );
  }

  const data = parsed.data;
  if (data.version > LEVEL_FORMAT_VERSION) {
    return Err(
      LevelError.schemaInvalid(
        `unsupported level format version ${data.version} (newest is ${LEVEL_FORMAT_VERSION})`,
        { version: data.version },
      ),
    );
  }

  return validateLevel(data, limits).map(() => levelFromData(data));
}

export function encodeLevel(level: Level, options: EncodeOptions = {}): string {
  return JSON.stringify(serializeLevel(level), null, options.pretty ? 2 : undefined);
}

export function decodeLevel(
  text: string,
  limits: LevelLimits = DEFAULT_LEVEL_LIMITS,
): Result<Level, LevelError> {
  return Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (e) => LevelError.parseFailed(e instanceof Error ? e.message : String(e)),
  ).flatMap((data) => deserializeLevel(data, limits));
}
