/**
 * Grid coordinates.
 *
 * Every function dealing with grid positions takes a RowCol, which makes it
 * plain that maps are indexed in row-major order and keeps grid coordinates
 * apart from pixel coordinates.
 */

import {
  Err,
  GridError,
  Ok,
  type Result,
  RowColSchema,
} from "@orthotile/contracts";
import { z } from "zod";

/**
 * A discrete location within a map grid.
 *
 * Either component may be negative; whether a coordinate is valid depends on
 * the grid it is used with.
 */
export class RowCol {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number) {
    if (!Number.isSafeInteger(row) || !Number.isSafeInteger(col)) {
      throw GridError.coordInvalid(
        `Grid coordinates must be safe integers, got (${row},${col})`,
        { row, col },
      );
    }
    this.row = row;
    this.col = col;
  }

  /**
   * Coordinate `dist` tiles above this one.
   */
  north(dist = 1): RowCol {
    return new RowCol(this.row - dist, this.col);
  }

  /**
   * Coordinate `dist` tiles below this one.
   */
  south(dist = 1): RowCol {
    return new RowCol(this.row + dist, this.col);
  }

  /**
   * Coordinate `dist` tiles to the right of this one.
   */
  east(dist = 1): RowCol {
    return new RowCol(this.row, this.col + dist);
  }

  /**
   * Coordinate `dist` tiles to the left of this one.
   */
  west(dist = 1): RowCol {
    return new RowCol(this.row, this.col - dist);
  }

  /**
   * Coordinates adjacent to this one, ordered north to south, then west to
   * east:
   *
   * ```
   * 1 2 3      . 1 .
   * 4 . 5      2 . 3
   * 6 7 8      . 4 .
   * ```
   *
   * The left layout applies with diagonals, the right one without.
   * Each iteration recomputes the sequence.
   */
  adjacent(includeDiagonals = false): Iterable<RowCol> {
    return { [Symbol.iterator]: () => adjacentCoords(this, includeDiagonals) };
  }

  plus(other: RowCol): RowCol {
    return new RowCol(this.row + other.row, this.col + other.col);
  }

  minus(other: RowCol): RowCol {
    return new RowCol(this.row - other.row, this.col - other.col);
  }

  equals(other: RowCol): boolean {
    return this.row === other.row && this.col === other.col;
  }

  toString(): string {
    return `(${this.row},${this.col})`;
  }
}

function* adjacentCoords(center: RowCol, includeDiagonals: boolean): Generator<RowCol> {
  if (includeDiagonals) yield center.north().west();
  yield center.north();
  if (includeDiagonals) yield center.north().east();
  yield center.west();
  yield center.east();
  if (includeDiagonals) yield center.south().west();
  yield center.south();
  if (includeDiagonals) yield center.south().east();
}

/**
 * Manhattan distance between two grid coordinates:
 * `|a.row - b.row| + |a.col - b.col|`.
 */
export function manhattan(a: RowCol, b: RowCol): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

/**
 * Parse an untrusted `{ row, col }` value, e.g. one read from a map file.
 */
export function parseRowCol(input: unknown): Result<RowCol, GridError> {
  const parsed = RowColSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      GridError.coordInvalid(z.prettifyError(parsed.error), { input }),
    );
  }
  return Ok(new RowCol(parsed.data.row, parsed.data.col));
}
