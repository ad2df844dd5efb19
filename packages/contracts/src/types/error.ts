/**
 * Error codes for level generation.
 */
export type DungeonErrorCode =
  | "CONFIG_INVALID"
  | "STRATEGY_NOT_FOUND"
  | "ALREADY_BUILT"
  | "NOT_BUILT"
  | "NO_ROOMS_PLACED"
  | "NO_REACHABLE_EXIT"
  | "START_NOT_FOUND"
  | "ITERATION_LIMIT_EXCEEDED"
  | "SOLVER_RETRIES_EXHAUSTED"
  | "GENERATION_FAILED";

/**
 * Codes that invalidate a single generation attempt. The orchestrator
 * retries these with the next draws of the same random stream.
 */
const FATAL_ATTEMPT_CODES: ReadonlySet<DungeonErrorCode> = new Set([
  "NO_ROOMS_PLACED",
  "NO_REACHABLE_EXIT",
  "START_NOT_FOUND",
  "ITERATION_LIMIT_EXCEEDED",
]);

/**
 * Unified error type for all level generation operations.
 *
 * @example
 * ```typescript
 * throw new DungeonError(
 *   "NO_REACHABLE_EXIT",
 *   "No floor tile is reachable from the start",
 *   { start: 1234 },
 * );
 * ```
 */
export class DungeonError extends Error {
  override readonly name = "DungeonError";

  constructor(
    public readonly code: DungeonErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DungeonError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("CONFIG_INVALID", message, details);
  }

  static iterationLimit(
    loop: string,
    limit: number,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError(
      "ITERATION_LIMIT_EXCEEDED",
      `${loop} exceeded its limit of ${limit} iterations`,
      { loop, limit, ...details },
    );
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): DungeonError {
    return new DungeonError("GENERATION_FAILED", message, details);
  }

  static isDungeonError(error: unknown): error is DungeonError {
    return error instanceof DungeonError;
  }

  /**
   * True when the error only spoils the current attempt.
   */
  static isFatalAttemptError(error: unknown): error is DungeonError {
    return error instanceof DungeonError && FATAL_ATTEMPT_CODES.has(error.code);
  }

  toJSON(): {
    name: string;
    code: DungeonErrorCode;
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
