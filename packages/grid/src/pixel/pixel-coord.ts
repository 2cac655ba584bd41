/**
 * Pixel coordinates.
 *
 * A pixel coordinate is an (x, y) location in continuous 2D space, measured
 * in the same units as a map's tile width and height.
 *
 * Game libraries usually bring their own vector type. Any value with numeric
 * `x` and `y` fields can be passed where a pixel coordinate is expected, and
 * types that keep their position elsewhere can implement `PixelCoordSource`.
 */

import {
  GridError,
  PixelCoordSchema,
  type Result,
} from "@orthotile/contracts";
import { checkedNumeric, type NumericKind } from "./numeric";

/**
 * A location in continuous 2D space.
 */
export interface PixelCoord {
  readonly x: number;
  readonly y: number;
}

/**
 * Capability for types that can report a pixel position.
 */
export interface PixelCoordSource {
  asPixelCoord(): PixelCoord;
}

export type PixelCoordLike = PixelCoord | PixelCoordSource;

/**
 * Describes a caller-defined vector type to convert into: the numeric kind
 * of each field and how to build a value.
 */
export interface PixelTarget<T> {
  readonly x: NumericKind;
  readonly y: NumericKind;
  create(x: number, y: number): T;
}

export function pixelCoord(x: number, y: number): PixelCoord {
  return { x, y };
}

/**
 * True if `value` can stand in for a pixel coordinate: an object with finite
 * numeric `x` and `y` fields.
 */
export function isPixelCoord(value: unknown): value is PixelCoord {
  return PixelCoordSchema.safeParse(value).success;
}

function isPixelCoordSource(value: unknown): value is PixelCoordSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "asPixelCoord" in value &&
    typeof value.asPixelCoord === "function"
  );
}

/**
 * Normalize anything accepted as a pixel coordinate into a `PixelCoord`.
 * Plain `{ x, y }` fields win over an `asPixelCoord` method.
 */
export function toPixelCoord(value: PixelCoordLike): PixelCoord {
  if (isPixelCoord(value)) {
    return pixelCoord(value.x, value.y);
  }
  if (isPixelCoordSource(value)) {
    const pos = value.asPixelCoord();
    if (isPixelCoord(pos)) {
      return pixelCoord(pos.x, pos.y);
    }
  }
  throw GridError.pixelCoordInvalid(
    "Expected an object with numeric x and y fields",
    { value },
  );
}

/**
 * Build a target producing plain `{ x, y }` objects whose fields both hold
 * `kind`.
 */
export function pixelTarget(kind: NumericKind): PixelTarget<PixelCoord> {
  return { x: kind, y: kind, create: pixelCoord };
}

/**
 * Convert a pixel coordinate into a caller-defined type, checking that each
 * field fits the target's numeric kind.
 */
export function tryConvertPixel<T>(
  pixel: PixelCoordLike,
  target: PixelTarget<T>,
): Result<T, GridError> {
  const pos = toPixelCoord(pixel);
  return checkedNumeric(pos.x, target.x).flatMap((x) =>
    checkedNumeric(pos.y, target.y).map((y) => target.create(x, y)),
  );
}

/**
 * Throwing variant of `tryConvertPixel`; fails with `NUMERIC_OVERFLOW`.
 *
 * @example
 * ```typescript
 * class Vec { constructor(readonly x: number, readonly y: number) {} }
 * const target: PixelTarget<Vec> = {
 *   x: "int32",
 *   y: "int32",
 *   create: (x, y) => new Vec(x, y),
 * };
 * convertPixel(pixelCoord(5.5, 10.2), target); // Vec { x: 5, y: 10 }
 * ```
 */
export function convertPixel<T>(pixel: PixelCoordLike, target: PixelTarget<T>): T {
  return tryConvertPixel(pixel, target).getOrThrow();
}
