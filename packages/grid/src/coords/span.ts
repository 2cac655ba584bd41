import { RowCol } from "./row-col";

/**
 * Enumerate every coordinate in the rectangle bounded by the corners `start`
 * (inclusive) and `end` (exclusive).
 *
 * All columns of a row are produced before moving to the next row. Rows run
 * in increasing order when `end.row >= start.row` and in decreasing order
 * otherwise; columns likewise. An axis with no extent makes the span empty.
 *
 * @example
 * ```typescript
 * [...span(new RowCol(2, 2), new RowCol(0, 0))];
 * // (2,2) (2,1) (1,2) (1,1)
 * ```
 */
export function span(start: RowCol, end: RowCol): Iterable<RowCol>;
export function span(start: RowCol, endRow: number, endCol: number): Iterable<RowCol>;
export function span(
  start: RowCol,
  endOrRow: RowCol | number,
  endCol?: number,
): Iterable<RowCol> {
  const end =
    endOrRow instanceof RowCol ? endOrRow : new RowCol(endOrRow, endCol ?? start.col);

  const rowStep = end.row >= start.row ? 1 : -1;
  const colStep = end.col >= start.col ? 1 : -1;

  return {
    *[Symbol.iterator]() {
      for (let row = start.row; row !== end.row; row += rowStep) {
        for (let col = start.col; col !== end.col; col += colStep) {
          yield new RowCol(row, col);
        }
      }
    },
  };
}
