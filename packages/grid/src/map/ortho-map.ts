/**
 * Generic tile map over a single layer of tiles in an orthogonal grid.
 *
 * A map file loader produces the tiles; an OrthoMap is the structure a game
 * queries while running. `Tile` is whatever the game uses to represent one
 * tile.
 */

import { GridError, Result, TileSizeSchema } from "@orthotile/contracts";
import { z } from "zod";
import { GRID_CONFIG } from "../config";
import { RowCol } from "../coords/row-col";
import { type PixelCoordLike, toPixelCoord } from "../pixel/pixel-coord";
import { type NeighborTopology, hasNeighborKind } from "./neighbor-type";

/**
 * Either a grid coordinate or anything accepted as a pixel coordinate.
 */
export type MapPosition = RowCol | PixelCoordLike;

export class OrthoMap<Tile> {
  private readonly _tiles: Tile[][];
  private readonly _numRows: number;
  private readonly _numCols: number;
  private readonly _tileWidth: number;
  private readonly _tileHeight: number;

  /**
   * Construct an orthogonal tile map. Throws a `GridError` when the tile
   * size is not a positive integer or the grid is jagged.
   *
   * @param tileWidth - width of each tile in pixels
   * @param tileHeight - height of each tile in pixels
   * @param tiles - tiles in row-major order, indexed as `tiles[row][col]`
   */
  constructor(tileWidth: number, tileHeight: number, tiles: readonly (readonly Tile[])[]) {
    const size = TileSizeSchema.safeParse({ tileWidth, tileHeight });
    if (!size.success) {
      throw GridError.tileSizeInvalid(z.prettifyError(size.error), {
        tileWidth,
        tileHeight,
      });
    }

    const numCols = tiles[0]?.length ?? 0;
    tiles.forEach((row, index) => {
      if (row.length !== numCols) {
        throw GridError.notRectangular(
          "All rows of an OrthoMap must have the same length (cannot be a jagged array)",
          { row: index, length: row.length, expected: numCols },
        );
      }
    });

    if (tiles.length === 0 && GRID_CONFIG.DEV_MODE) {
      console.warn("OrthoMap: constructed from an empty tile grid");
    }

    this._tileWidth = tileWidth;
    this._tileHeight = tileHeight;
    this._numRows = tiles.length;
    this._numCols = numCols;
    this._tiles = tiles.map((row) => [...row]);
  }

  /**
   * Fallible counterpart of the constructor: the caller chooses whether a
   * malformed grid is fatal (`getOrThrow`) or handled.
   */
  static create<Tile>(
    tileWidth: number,
    tileHeight: number,
    tiles: readonly (readonly Tile[])[],
  ): Result<OrthoMap<Tile>, GridError> {
    return Result.fromThrowable(
      () => new OrthoMap(tileWidth, tileHeight, tiles),
      GridError.expect,
    );
  }

  /** Number of rows along the tile grid y axis */
  get numRows(): number {
    return this._numRows;
  }

  /** Number of columns along the tile grid x axis */
  get numCols(): number {
    return this._numCols;
  }

  get tileWidth(): number {
    return this._tileWidth;
  }

  get tileHeight(): number {
    return this._tileHeight;
  }

  /** The underlying tile store */
  get tiles(): ReadonlyArray<ReadonlyArray<Tile>> {
    return this._tiles;
  }

  /**
   * Grid location containing a pixel position. Does not check bounds; the
   * result may be negative or beyond numRows/numCols.
   *
   * Division floors, so negative pixels land in negative rows/columns
   * (x = -1 is column -1, not column 0).
   */
  gridCoordAt(pos: PixelCoordLike): RowCol {
    const { x, y } = toPixelCoord(pos);
    return new RowCol(
      Math.floor(y / this._tileHeight),
      Math.floor(x / this._tileWidth),
    );
  }

  /**
   * True if the grid coordinate or pixel position lies within the map.
   */
  contains(pos: MapPosition): boolean {
    const { row, col } = this.toGridCoord(pos);
    return row >= 0 && col >= 0 && row < this._numRows && col < this._numCols;
  }

  /**
   * Tile at a grid coordinate or pixel position. Throws an `OUT_OF_BOUNDS`
   * `GridError` outside the map.
   */
  tileAt(pos: MapPosition): Tile {
    const coord = this.checkedCoord(pos);
    return this._tiles[coord.row][coord.col];
  }

  /**
   * Replace the tile at a grid coordinate or pixel position. Throws like
   * `tileAt`.
   */
  setTileAt(pos: MapPosition, tile: Tile): void {
    const coord = this.checkedCoord(pos);
    this._tiles[coord.row][coord.col] = tile;
  }

  /**
   * In-bounds coordinates around `coord`, in the order center, north, west,
   * south, east, northwest, northeast, southwest, southeast. Kinds missing
   * from `neighbors` are skipped.
   */
  neighborCoords(
    coord: RowCol,
    neighbors: NeighborTopology = GRID_CONFIG.NEIGHBORS.DEFAULT,
  ): Iterable<RowCol> {
    return { [Symbol.iterator]: () => this.inBoundsCandidates(coord, neighbors) };
  }

  /**
   * Tiles around `coord`, in the order of `neighborCoords`. Positions outside
   * the map are left out.
   *
   * @param coord - grid location of the center tile
   * @param neighbors - which neighbors to fetch
   */
  neighbors(
    coord: RowCol,
    neighbors: NeighborTopology = GRID_CONFIG.NEIGHBORS.DEFAULT,
  ): Iterable<Tile> {
    return { [Symbol.iterator]: () => this.neighborTiles(coord, neighbors) };
  }

  private *inBoundsCandidates(coord: RowCol, neighbors: NeighborTopology): Generator<RowCol> {
    for (const candidate of candidates(coord, neighbors)) {
      if (this.contains(candidate)) yield candidate;
    }
  }

  private *neighborTiles(coord: RowCol, neighbors: NeighborTopology): Generator<Tile> {
    for (const neighbor of this.inBoundsCandidates(coord, neighbors)) {
      yield this._tiles[neighbor.row][neighbor.col];
    }
  }

  private toGridCoord(pos: MapPosition): RowCol {
    return pos instanceof RowCol ? pos : this.gridCoordAt(pos);
  }

  private checkedCoord(pos: MapPosition): RowCol {
    const coord = this.toGridCoord(pos);
    if (!this.contains(coord)) {
      throw GridError.outOfBounds(
        `No tile at ${coord.toString()} in a ${this._numRows}x${this._numCols} map`,
        {
          row: coord.row,
          col: coord.col,
          numRows: this._numRows,
          numCols: this._numCols,
        },
      );
    }
    return coord;
  }
}

function* candidates(coord: RowCol, neighbors: NeighborTopology): Generator<RowCol> {
  if (hasNeighborKind(neighbors, "center")) {
    yield coord;
  }

  if (hasNeighborKind(neighbors, "edge")) {
    yield coord.north();
    yield coord.west();
    yield coord.south();
    yield coord.east();
  }

  if (hasNeighborKind(neighbors, "vertex")) {
    yield coord.north().west();
    yield coord.north().east();
    yield coord.south().west();
    yield coord.south().east();
  }
}
