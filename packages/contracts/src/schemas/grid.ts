import { z } from "zod";

export const TileDimensionSchema = z
  .number()
  .int({ error: "Tile dimensions must be integers" })
  .positive({ error: "Tile dimensions must be positive" });

export const TileSizeSchema = z.object({
  tileWidth: TileDimensionSchema,
  tileHeight: TileDimensionSchema,
});

export const RowColSchema = z.object({
  row: z.number().int({ error: "Row must be an integer" }),
  col: z.number().int({ error: "Column must be an integer" }),
});

// Extra fields are allowed: any vector type with numeric x/y qualifies.
export const PixelCoordSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const NeighborKindSchema = z.enum(["center", "edge", "vertex"]);

export const NeighborTopologySchema = z
  .array(NeighborKindSchema)
  .min(1, { error: "A neighbor topology needs at least one kind" });

export type TileSize = z.infer<typeof TileSizeSchema>;
export type RowColInput = z.infer<typeof RowColSchema>;
export type NeighborKind = z.infer<typeof NeighborKindSchema>;
