/**
 * Which tiles are included when getting the neighbors of a tile.
 *
 * Given the following grid of tiles:
 *
 * ```
 * v e v
 * e c e
 * v e v
 * ```
 *
 * `c` is the center, `e` are the edge neighbors and `v` the vertex
 * neighbors. `surround` includes every `e` and `v` tile, `all` includes
 * the center as well.
 */

import {
  Err,
  GridError,
  type NeighborKind,
  NeighborTopologySchema,
  Ok,
  type Result,
} from "@orthotile/contracts";
import { z } from "zod";

export type { NeighborKind };

export type NeighborTopology = ReadonlySet<NeighborKind>;

const topology = (...kinds: NeighborKind[]): NeighborTopology =>
  new Set(kinds);

export const NeighborType = {
  /** The center tile. */
  center: topology("center"),
  /** Tiles adjacent to the sides of the center. */
  edge: topology("edge"),
  /** Tiles diagonally bordering the corners of the center. */
  vertex: topology("vertex"),
  /** All tiles around the center. */
  surround: topology("edge", "vertex"),
  /** All tiles around and including the center. */
  all: topology("center", "edge", "vertex"),
} as const satisfies Record<string, NeighborTopology>;

export function combineTopology(...parts: NeighborTopology[]): NeighborTopology {
  return topology(...parts.flatMap((part) => [...part]));
}

export function hasNeighborKind(
  neighbors: NeighborTopology,
  kind: NeighborKind,
): boolean {
  return neighbors.has(kind);
}

/**
 * Parse a list of neighbor kind names, e.g. from a map file's properties.
 */
export function parseNeighborTopology(
  input: unknown,
): Result<NeighborTopology, GridError> {
  const parsed = NeighborTopologySchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      GridError.topologyInvalid(z.prettifyError(parsed.error), { input }),
    );
  }
  return Ok(topology(...parsed.data));
}
