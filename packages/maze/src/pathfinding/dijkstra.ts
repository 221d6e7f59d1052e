import type { PathfinderName } from "@mazeworks/contracts";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";
import { bestFirstSearch } from "./best-first";
import type { Heuristic, Pathfinder } from "./types";

const noHeuristic: Heuristic = () => 0;

/**
 * Dijkstra: A* without a heuristic.
 */
export class DijkstraPathfinder implements Pathfinder {
  readonly id: PathfinderName = "dijkstra";
  readonly name = "Dijkstra";
  readonly description = "Uniform-cost priority search";

  findPath(grid: ReadonlyMazeGrid, start: Position, end: Position): Path | null {
    return bestFirstSearch(grid, start, end, noHeuristic);
  }
}

export function createDijkstraPathfinder(): DijkstraPathfinder {
  return new DijkstraPathfinder();
}
