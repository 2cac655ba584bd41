/**
 * Checked numeric conversion into fixed-width field types.
 */

import { Err, GridError, Ok, type Result } from "@orthotile/contracts";

export type IntegerKind =
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "int64"
  | "uint64";

export type FloatKind = "float32" | "float64";

export type NumericKind = IntegerKind | FloatKind;

/**
 * `min` is inclusive, `limit` exclusive. Both are powers of two, so they stay
 * exact as doubles for the 64-bit kinds too.
 */
interface IntegerRange {
  readonly min: number;
  readonly limit: number;
}

export const INTEGER_RANGES: Readonly<Record<IntegerKind, IntegerRange>> = {
  int8: { min: -(2 ** 7), limit: 2 ** 7 },
  uint8: { min: 0, limit: 2 ** 8 },
  int16: { min: -(2 ** 15), limit: 2 ** 15 },
  uint16: { min: 0, limit: 2 ** 16 },
  int32: { min: -(2 ** 31), limit: 2 ** 31 },
  uint32: { min: 0, limit: 2 ** 32 },
  int64: { min: -(2 ** 63), limit: 2 ** 63 },
  uint64: { min: 0, limit: 2 ** 64 },
};

export function isIntegerKind(kind: NumericKind): kind is IntegerKind {
  return kind !== "float32" && kind !== "float64";
}

/**
 * Convert `value` into the representation of `kind`.
 *
 * Integer kinds truncate toward zero and fail with `NUMERIC_OVERFLOW` when
 * the result does not fit, or when the value is NaN or infinite.
 * `float32` rounds to single precision; `float64` returns the value as is.
 */
export function checkedNumeric(
  value: number,
  kind: NumericKind,
): Result<number, GridError> {
  if (!isIntegerKind(kind)) {
    return Ok(kind === "float32" ? Math.fround(value) : value);
  }

  const { min, limit } = INTEGER_RANGES[kind];
  // `+ 0` folds -0 into 0
  const truncated = Math.trunc(value) + 0;
  if (!Number.isFinite(truncated) || truncated < min || truncated >= limit) {
    return Err(
      GridError.numericOverflow(`Value ${value} does not fit in ${kind}`, {
        value,
        kind,
        min,
        limit,
      }),
    );
  }
  return Ok(truncated);
}
