/**
 * Pathfinder contract.
 */

import type { PathfinderName } from "@mazeworks/contracts";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";

/**
 * A pathfinding strategy.
 *
 * `null` means the end cannot be reached: the search ran to completion and
 * found nothing. Degenerate grids (no rows or no columns) and terminals
 * outside the grid also answer `null`. Thrown errors are reserved for
 * searches that could not run at all.
 */
export interface Pathfinder {
  readonly id: PathfinderName;
  readonly name: string;
  readonly description: string;
  findPath(grid: ReadonlyMazeGrid, start: Position, end: Position): Path | null;
}

/**
 * Estimated remaining cost from a cell to the goal.
 */
export type Heuristic = (from: Position, goal: Position) => number;
