/**
 * Pathfinding module - search strategies and their registry.
 */

import type { PathfinderName } from "@mazeworks/contracts";
import type { StrategyInfo } from "../generators/types";
import { createAStarPathfinder } from "./astar";
import { createBFSPathfinder } from "./bfs";
import { createDeadEndFillerPathfinder } from "./dead-end-filler";
import { createDijkstraPathfinder } from "./dijkstra";
import type { Pathfinder } from "./types";

export { AStarPathfinder, createAStarPathfinder } from "./astar";
export { bestFirstSearch } from "./best-first";
export { BreadthFirstPathfinder, breadthFirstSearch, createBFSPathfinder } from "./bfs";
export {
  createDeadEndFillerPathfinder,
  type DeadEndFillResult,
  DeadEndFillerPathfinder,
  fillDeadEnds,
} from "./dead-end-filler";
export { createDijkstraPathfinder, DijkstraPathfinder } from "./dijkstra";
export type { Heuristic, Pathfinder } from "./types";

const factories: Record<PathfinderName, () => Pathfinder> = {
  bfs: createBFSPathfinder,
  astar: createAStarPathfinder,
  dijkstra: createDijkstraPathfinder,
  deadend: createDeadEndFillerPathfinder,
};

export function createPathfinder(name: PathfinderName): Pathfinder {
  return factories[name]();
}

/**
 * Registered pathfinders with their display names.
 */
export function getAvailablePathfinders(): StrategyInfo<PathfinderName>[] {
  return Object.values(factories).map((factory) => {
    const { id, name, description } = factory();
    return { id, name, description };
  });
}
