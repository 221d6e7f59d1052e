/**
 * Error codes for maze configuration, generation and solving.
 */
export type MazeErrorCode =
  | "CONFIG_INVALID"
  | "CONFIG_DIMENSION_TOO_SMALL"
  | "CONFIG_DIMENSION_TOO_LARGE"
  | "ALGORITHM_NOT_FOUND"
  | "ALGORITHM_AMBIGUOUS"
  | "SEED_INVALID"
  | "GENERATION_FAILED"
  | "RECURSION_LIMIT_EXCEEDED"
  | "PATHFINDING_FAILED"
  | "RECORD_INVALID";

/**
 * Unified error type for the maze packages.
 *
 * An unreachable end is not an error: pathfinders return `null` for it.
 * A MazeError means the operation itself could not run.
 *
 * @example
 * ```typescript
 * throw MazeError.recursionLimitExceeded("Maze too large for recursive carving", {
 *   cells: 5000,
 *   limit: 4096,
 * });
 * ```
 */
export class MazeError extends Error {
  readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static dimensionTooSmall(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_DIMENSION_TOO_SMALL", message, details);
  }

  static dimensionTooLarge(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("CONFIG_DIMENSION_TOO_LARGE", message, details);
  }

  static algorithmNotFound(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("ALGORITHM_NOT_FOUND", message, details);
  }

  static algorithmAmbiguous(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("ALGORITHM_AMBIGUOUS", message, details);
  }

  static seedInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("SEED_INVALID", message, details);
  }

  static generationFailed(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("GENERATION_FAILED", message, details);
  }

  static recursionLimitExceeded(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("RECURSION_LIMIT_EXCEEDED", message, details);
  }

  static pathfindingFailed(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("PATHFINDING_FAILED", message, details);
  }

  static recordInvalid(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("RECORD_INVALID", message, details);
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: MazeErrorCode;
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
