/**
 * Error codes for terrain generation and simulation.
 */
export type TerrainErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "CONFIG_INVALID"
  | "SEED_INVALID"
  | "GENERATION_FAILED";

/**
 * Unified error type for all terrain operations.
 *
 * Contradictions met while collapsing a wave are not errors: the solver
 * repairs them in place and only reports them through its statistics.
 *
 * @example
 * ```typescript
 * throw TerrainError.invalidArgument("Grid width must be positive", { width: 0 });
 * ```
 */
export class TerrainError extends Error {
  override readonly name = "TerrainError";

  constructor(
    public readonly code: TerrainErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TerrainError);
    }
  }

  static invalidArgument(
    message: string,
    details?: Record<string, unknown>,
  ): TerrainError {
    return new TerrainError("INVALID_ARGUMENT", message, details);
  }

  static notFound(
    message: string,
    details?: Record<string, unknown>,
  ): TerrainError {
    return new TerrainError("NOT_FOUND", message, details);
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): TerrainError {
    return new TerrainError("CONFIG_INVALID", message, details);
  }

  static seedInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): TerrainError {
    return new TerrainError("SEED_INVALID", message, details);
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): TerrainError {
    return new TerrainError("GENERATION_FAILED", message, details);
  }

  static isTerrainError(error: unknown): error is TerrainError {
    return error instanceof TerrainError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: TerrainErrorCode;
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
