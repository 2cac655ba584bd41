/**
 * Error codes for grid and tile map operations.
 *
 * `GRID_NOT_RECTANGULAR`, `TILE_SIZE_INVALID`, `COORD_INVALID` and
 * `PIXEL_COORD_INVALID` mark contract violations by the caller.
 * `OUT_OF_BOUNDS`, `NUMERIC_OVERFLOW` and `TOPOLOGY_INVALID` are expected
 * failures the caller may recover from.
 */
export type GridErrorCode =
  | "GRID_NOT_RECTANGULAR"
  | "TILE_SIZE_INVALID"
  | "COORD_INVALID"
  | "PIXEL_COORD_INVALID"
  | "TOPOLOGY_INVALID"
  | "OUT_OF_BOUNDS"
  | "NUMERIC_OVERFLOW";

/**
 * Unified error type for all grid operations.
 *
 * @example
 * ```typescript
 * const error = GridError.outOfBounds("No tile at (5,0)", {
 *   row: 5,
 *   col: 0,
 *   numRows: 5,
 *   numCols: 5,
 * });
 * ```
 */
export class GridError extends Error {
  readonly name = "GridError";

  constructor(
    public readonly code: GridErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridError);
    }
  }

  static notRectangular(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("GRID_NOT_RECTANGULAR", message, details);
  }

  static tileSizeInvalid(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("TILE_SIZE_INVALID", message, details);
  }

  static coordInvalid(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("COORD_INVALID", message, details);
  }

  static pixelCoordInvalid(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("PIXEL_COORD_INVALID", message, details);
  }

  static topologyInvalid(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("TOPOLOGY_INVALID", message, details);
  }

  static outOfBounds(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("OUT_OF_BOUNDS", message, details);
  }

  static numericOverflow(message: string, details?: Record<string, unknown>): GridError {
    return new GridError("NUMERIC_OVERFLOW", message, details);
  }

  /**
   * Check if an unknown error is a GridError.
   */
  static isGridError(error: unknown): error is GridError {
    return error instanceof GridError;
  }

  /**
   * Rethrows anything that is not a GridError. For use as the `onError` of
   * `Result.fromThrowable`.
   */
  static expect(error: unknown): GridError {
    if (GridError.isGridError(error)) {
      return error;
    }
    throw error;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: GridErrorCode;
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
