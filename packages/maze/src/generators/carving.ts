/**
 * Carving primitives shared by the backtracking generators.
 */

import { MazeError, type SeededRandom } from "@mazeworks/contracts";
import type { CoordSet } from "../core/data-structures/coord-set";
import { isTerminalKind } from "../core/grid/cell";
import { MazeGrid } from "../core/grid/grid";
import { createPosition, formatPosition } from "../core/grid/position";
import { CellKind, type Position } from "../core/grid/types";

/**
 * Stride-2 steps: right, down, left, up.
 */
export const STRIDE_DIRECTIONS = [
  { x: 2, y: 0 },
  { x: 0, y: 2 },
  { x: -2, y: 0 },
  { x: 0, y: -2 },
] as const;

export type StrideDirection = (typeof STRIDE_DIRECTIONS)[number];

/**
 * Allocate a fully walled grid and mark the terminals (END last, so it
 * wins when both coincide).
 *
 * @throws {MazeError} GENERATION_FAILED when a terminal lies outside the grid
 */
export function initializeGrid(
  width: number,
  height: number,
  start: Position,
  end: Position,
): MazeGrid {
  const grid = MazeGrid.walls(width, height);

  for (const [label, terminal] of [
    ["start", start],
    ["end", end],
  ] as const) {
    if (!grid.isInBounds(terminal.x, terminal.y)) {
      throw MazeError.generationFailed(
        `Cannot place ${label} ${formatPosition(terminal)} in a ${width}x${height} grid`,
        { width, height, [label]: terminal },
      );
    }
  }

  grid.setAt(start, CellKind.START);
  grid.setAt(end, CellKind.END);
  return grid;
}

/**
 * Open a cell unless it is a terminal.
 */
export function openCell(grid: MazeGrid, x: number, y: number): void {
  if (!isTerminalKind(grid.get(x, y))) {
    grid.set(x, y, CellKind.EMPTY);
  }
}

/**
 * Carve the wall halfway between two stride-2 neighbors and open the target.
 */
export function carvePassage(grid: MazeGrid, from: Position, to: Position): void {
  openCell(grid, (from.x + to.x) >> 1, (from.y + to.y) >> 1);
  openCell(grid, to.x, to.y);
}

/**
 * In-bounds stride-2 neighbors not yet visited, in STRIDE_DIRECTIONS order.
 */
export function unvisitedStrideNeighbors(
  grid: MazeGrid,
  visited: CoordSet,
  current: Position,
): Position[] {
  const neighbors: Position[] = [];
  for (const dir of STRIDE_DIRECTIONS) {
    const x = current.x + dir.x;
    const y = current.y + dir.y;
    if (grid.isInBounds(x, y) && !visited.has(x, y)) {
      neighbors.push(createPosition(x, y));
    }
  }
  return neighbors;
}

/**
 * Clear the wall left of or above the end, picked by a fair coin.
 *
 * Runs after every carve and always draws the coin. A pick that would open
 * the outer wall ring falls back to the other side; in a 3x3 grid both
 * sides are border and nothing is opened. A cell that is already open is
 * left alone.
 */
export function ensureExit(grid: MazeGrid, end: Position, rng: SeededRandom): void {
  const left = createPosition(end.x - 1, end.y);
  const top = createPosition(end.x, end.y - 1);
  const candidates = rng.probability(0.5) ? [left, top] : [top, left];
  const target = candidates.find((cell) => isInterior(grid, cell));

  if (target !== undefined && grid.getAt(target) === CellKind.WALL) {
    grid.setAt(target, CellKind.EMPTY);
  }
}

function isInterior(grid: MazeGrid, { x, y }: Position): boolean {
  return x > 0 && y > 0 && x < grid.width - 1 && y < grid.height - 1;
}

/**
 * Number of (odd, odd) cells a generator can carve into.
 */
export function countCarvableCells(width: number, height: number): number {
  return Math.floor(width / 2) * Math.floor(height / 2);
}
