import { describe, expect, it } from "vitest";
import {
  NeighborTopologySchema,
  PixelCoordSchema,
  RowColSchema,
  TileSizeSchema,
} from "../src";

describe("Grid Schemas", () => {
  it("validates a tile size", () => {
    expect(TileSizeSchema.safeParse({ tileWidth: 32, tileHeight: 16 }).success).toBe(true);
  });

  it("rejects zero, negative and fractional tile sizes", () => {
    expect(TileSizeSchema.safeParse({ tileWidth: 0, tileHeight: 16 }).success).toBe(false);
    expect(TileSizeSchema.safeParse({ tileWidth: 32, tileHeight: -1 }).success).toBe(false);
    expect(TileSizeSchema.safeParse({ tileWidth: 32.5, tileHeight: 16 }).success).toBe(false);
  });

  it("accepts negative grid coordinates but not fractional ones", () => {
    expect(RowColSchema.safeParse({ row: -3, col: 4 }).success).toBe(true);
    expect(RowColSchema.safeParse({ row: 1.5, col: 4 }).success).toBe(false);
    expect(RowColSchema.safeParse({ row: 1 }).success).toBe(false);
  });

  it("accepts any object with numeric x and y", () => {
    expect(PixelCoordSchema.safeParse({ x: 1.5, y: -2 }).success).toBe(true);
    expect(PixelCoordSchema.safeParse({ x: 1, y: 2, z: 3 }).success).toBe(true);
    expect(PixelCoordSchema.safeParse({ row: 1, col: 2 }).success).toBe(false);
    expect(PixelCoordSchema.safeParse({ x: "1", y: 2 }).success).toBe(false);
  });

  it("validates neighbor topologies", () => {
    expect(NeighborTopologySchema.safeParse(["edge", "vertex"]).success).toBe(true);
    expect(NeighborTopologySchema.safeParse([]).success).toBe(false);
    expect(NeighborTopologySchema.safeParse(["diagonal"]).success).toBe(false);
  });
});
