/**
 * @orthotile/grid - coordinates and tile maps for orthogonal 2D grids.
 *
 * @example
 * ```typescript
 * import { NeighborType, OrthoMap, RowCol, pixelCoord } from "@orthotile/grid";
 *
 * const map = OrthoMap.create(32, 32, tiles).getOrThrow();
 * const under = map.gridCoordAt(pixelCoord(40, 70)); // (2,1)
 * for (const tile of map.neighbors(under, NeighborType.surround)) {
 *   // ...
 * }
 * ```
 */

export { GRID_CONFIG, type GridConfig } from "./config";
export { RowCol, manhattan, parseRowCol } from "./coords/row-col";
export { span } from "./coords/span";
export {
  type NeighborKind,
  type NeighborTopology,
  NeighborType,
  combineTopology,
  hasNeighborKind,
  parseNeighborTopology,
} from "./map/neighbor-type";
export { type MapPosition, OrthoMap } from "./map/ortho-map";
export {
  type FloatKind,
  INTEGER_RANGES,
  type IntegerKind,
  type NumericKind,
  checkedNumeric,
  isIntegerKind,
} from "./pixel/numeric";
export {
  type PixelCoord,
  type PixelCoordLike,
  type PixelCoordSource,
  type PixelTarget,
  convertPixel,
  isPixelCoord,
  pixelCoord,
  pixelTarget,
  toPixelCoord,
  tryConvertPixel,
} from "./pixel/pixel-coord";
