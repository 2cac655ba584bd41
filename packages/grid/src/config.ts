import { NeighborType } from "./map/neighbor-type";

export const GRID_CONFIG = {
  DEV_MODE: process.env.NODE_ENV !== "production",

  NEIGHBORS: {
    DEFAULT: NeighborType.edge,
  },
} as const;

export type GridConfig = typeof GRID_CONFIG;
