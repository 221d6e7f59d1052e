/**
 * Dead-end filling.
 *
 * Repeatedly walls up every open, non-terminal cell with at most one
 * passable neighbor until a full scan changes nothing. On a perfect maze
 * what survives is exactly the start–end corridor; a BFS over the pruned
 * copy then reads the path off.
 *
 * On a maze with cycles the loops survive the filling. The path found is
 * still a shortest one, and `fillDeadEnds` reports `isCorridor: false` so
 * callers can flag the input.
 */

import type { PathfinderName } from "@mazeworks/contracts";
import { DIRECTIONS_4, positionsEqual } from "../core/grid/position";
import {
  CellKind,
  type MutableMazeGrid,
  type Path,
  type Position,
  type ReadonlyMazeGrid,
} from "../core/grid/types";
import { breadthFirstSearch } from "./bfs";
import { resolveTrivialCase } from "./search-node";
import type { Pathfinder } from "./types";

export interface DeadEndFillResult {
  /** Private pruned copy; the input grid is never touched */
  readonly grid: MutableMazeGrid;
  readonly filledCells: number;
  /** Full scans performed, the final unchanged one included */
  readonly passes: number;
  /** Whether the open cells left form one simple start–end corridor */
  readonly isCorridor: boolean;
}

function isFillable(kind: CellKind): boolean {
  return kind === CellKind.EMPTY || kind === CellKind.PATH;
}

/**
 * Walk from start through cells that each continue in exactly one new
 * direction; true when the walk ends on `end` having covered every open cell.
 */
function traceCorridor(grid: ReadonlyMazeGrid, start: Position, end: Position): boolean {
  let openCells = 0;
  grid.forEach((_x, _y, kind) => {
    if (kind !== CellKind.WALL) openCells++;
  });

  let previous: Position | null = null;
  let current = start;
  let walked = 1;

  while (!positionsEqual(current, end)) {
    if (walked > openCells) return false;
    const onward: Position[] = [];
    for (const dir of DIRECTIONS_4) {
      const next = { x: current.x + dir.x, y: current.y + dir.y };
      if (!grid.isPassable(next.x, next.y)) continue;
      if (previous !== null && positionsEqual(next, previous)) continue;
      onward.push(next);
    }
    const [step] = onward;
    if (onward.length !== 1 || step === undefined) return false;

    previous = current;
    current = step;
    walked++;
  }

  return walked === openCells;
}

/**
 * Fill dead ends on a copy of `grid`. Also usable on its own to simplify
 * a maze for display.
 */
export function fillDeadEnds(
  grid: ReadonlyMazeGrid,
  start: Position,
  end: Position,
): DeadEndFillResult {
  const working = grid.clone();
  let filledCells = 0;
  let passes = 0;
  let changed = true;

  while (changed) {
    changed = false;
    passes++;

    for (let y = 0; y < working.height; y++) {
      for (let x = 0; x < working.width; x++) {
        if (!isFillable(working.get(x, y))) continue;
        if ((x === start.x && y === start.y) || (x === end.x && y === end.y)) {
          continue;
        }
        if (working.countPassableNeighbors4(x, y) <= 1) {
          working.set(x, y, CellKind.WALL);
          filledCells++;
          changed = true;
        }
      }
    }
  }

  return {
    grid: working,
    filledCells,
    passes,
    isCorridor:
      working.isPassable(start.x, start.y) &&
      working.isPassable(end.x, end.y) &&
      traceCorridor(working, start, end),
  };
}

export class DeadEndFillerPathfinder implements Pathfinder {
  readonly id: PathfinderName = "deadend";
  readonly name = "Dead-End Filler";
  readonly description =
    "Prunes dead ends to a fixed point, then reads the remaining corridor";

  findPath(grid: ReadonlyMazeGrid, start: Position, end: Position): Path | null {
    const trivial = resolveTrivialCase(grid, start, end);
    if (trivial !== undefined) return trivial;

    return breadthFirstSearch(fillDeadEnds(grid, start, end).grid, start, end);
  }
}

export function createDeadEndFillerPathfinder(): DeadEndFillerPathfinder {
  return new DeadEndFillerPathfinder();
}
