import type { PathfinderName } from "@mazeworks/contracts";
import { manhattanDistance } from "../core/grid/position";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";
import { bestFirstSearch } from "./best-first";
import type { Pathfinder } from "./types";

/**
 * A* with the Manhattan distance, which never overestimates on a
 * 4-connected unit-cost grid, so the first path to close the end is
 * optimal.
 */
export class AStarPathfinder implements Pathfinder {
  readonly id: PathfinderName = "astar";
  readonly name = "A* Search";
  readonly description = "Priority search on g + Manhattan distance";

  findPath(grid: ReadonlyMazeGrid, start: Position, end: Position): Path | null {
    return bestFirstSearch(grid, start, end, manhattanDistance);
  }
}

export function createAStarPathfinder(): AStarPathfinder {
  return new AStarPathfinder();
}
