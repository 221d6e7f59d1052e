import { CoordSet } from "../core/data-structures/coord-set";
import { FastQueue } from "../core/data-structures/fast-queue";
import { DIRECTIONS_4 } from "../core/grid/position";
import type { ReadonlyMazeGrid } from "../core/grid/types";

/**
 * Graph view of the passable cells, 4-adjacency.
 */
export interface TopologyReport {
  readonly passableCells: number;
  /** Unordered pairs of adjacent passable cells */
  readonly edges: number;
  readonly components: number;
  /** One component and edges = cells - 1, i.e. a spanning tree */
  readonly isPerfect: boolean;
}

export function analyzeTopology(grid: ReadonlyMazeGrid): TopologyReport {
  let passableCells = 0;
  let edges = 0;

  grid.forEach((x, y) => {
    if (!grid.isPassable(x, y)) return;
    passableCells++;
    if (grid.isPassable(x + 1, y)) edges++;
    if (grid.isPassable(x, y + 1)) edges++;
  });

  const visited = new CoordSet(grid.width, grid.height);
  const queue = new FastQueue<number>();
  let components = 0;

  grid.forEach((x, y) => {
    if (!grid.isPassable(x, y) || visited.has(x, y)) return;
    components++;
    visited.add(x, y);
    queue.enqueue(y * grid.width + x);

    while (!queue.isEmpty) {
      const index = queue.dequeue();
      if (index === undefined) break;
      const cx = index % grid.width;
      const cy = Math.floor(index / grid.width);
      for (const dir of DIRECTIONS_4) {
        const nx = cx + dir.x;
        const ny = cy + dir.y;
        if (grid.isPassable(nx, ny) && !visited.has(nx, ny)) {
          visited.add(nx, ny);
          queue.enqueue(ny * grid.width + nx);
        }
      }
    }
  });

  return {
    passableCells,
    edges,
    components,
    isPerfect: components === 1 && edges === passableCells - 1,
  };
}
