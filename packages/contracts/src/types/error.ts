/**
 * Error codes for maze construction, generation and search.
 * Using discriminated union for type-safe error handling.
 */
export type MazeErrorCode =
  | "CONFIG_INVALID"
  | "CONFIG_SIZE_TOO_SMALL"
  | "INDEX_OUT_OF_BOUNDS"
  | "NOT_IMPLEMENTED"
  | "ALGORITHM_NOT_FOUND"
  | "GENERATION_FAILED";

/**
 * Unified error type for all maze operations.
 *
 * @example
 * ```typescript
 * const error = new MazeError(
 *   "INDEX_OUT_OF_BOUNDS",
 *   "Cell (4, 4) is outside a 4x4 grid",
 *   { row: 4, col: 4 }
 * );
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

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static sizeTooSmall(size: number, minimum: number): MazeError {
    return new MazeError(
      "CONFIG_SIZE_TOO_SMALL",
      `size must be at least ${minimum}`,
      { size, minimum },
    );
  }

  static indexOutOfBounds(
    row: number,
    col: number,
    rows: number,
    cols: number,
  ): MazeError {
    return new MazeError(
      "INDEX_OUT_OF_BOUNDS",
      `Cell (${row}, ${col}) is outside a ${rows}x${cols} grid`,
      { row, col, rows, cols },
    );
  }

  static notImplemented(operation: string): MazeError {
    return new MazeError(
      "NOT_IMPLEMENTED",
      `${operation} is not implemented`,
    );
  }

  static algorithmNotFound(algorithm: string): MazeError {
    return new MazeError(
      "ALGORITHM_NOT_FOUND",
      `Unknown pathfinding algorithm: ${algorithm}`,
      { algorithm },
    );
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("GENERATION_FAILED", message, details);
  }

  /**
   * Check if an unknown error is a MazeError.
   */
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
