/**
 * Error codes for level loading, validation and configuration.
 */
export type LevelErrorCode =
  | "PARSE_FAILED"
  | "SCHEMA_INVALID"
  | "LIMITS_INVALID"
  | "TOO_MANY_ROOMS"
  | "ROOM_TOO_LARGE"
  | "ROOM_SHAPE_MISMATCH"
  | "VALUE_OUT_OF_RANGE"
  | "STRING_TOO_LONG"
  | "TOO_MANY_WALLS";

/**
 * Unified error type for everything that sits between file I/O and the
 * geometry engine.
 *
 * @example
 * ```typescript
 * const error = LevelError.validationFailed(
 *   "ROOM_TOO_LARGE",
 *   "room[2]: width too large (200 > 128)",
 *   { room: 2, width: 200 },
 * );
 * ```
 */
export class LevelError extends Error {
  override readonly name = "LevelError";

  constructor(
    public readonly code: LevelErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LevelError);
    }
  }

  static parseFailed(
    message: string,
    details?: Record<string, unknown>,
  ): LevelError {
    return new LevelError("PARSE_FAILED", message, details);
  }

  static schemaInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): LevelError {
    return new LevelError("SCHEMA_INVALID", message, details);
  }

  static validationFailed(
    code: Exclude<LevelErrorCode, "PARSE_FAILED" | "SCHEMA_INVALID">,
    message: string,
    details?: Record<string, unknown>,
  ): LevelError {
    return new LevelError(code, message, details);
  }

  static isLevelError(error: unknown): error is LevelError {
    return error instanceof LevelError;
  }

  toJSON(): {
    name: string;
    code: LevelErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
