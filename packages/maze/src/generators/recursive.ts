/**
 * Recursive backtracking generator.
 *
 * Same randomized depth-first carving as the iterative form, on the
 * native call stack. Recursion depth can reach the number of carvable
 * cells, so grids above `maxCells` are rejected up front instead of
 * being truncated; use the iterative generator for those.
 */

import { MAX_RECURSION_CELLS, MazeError, type SeededRandom } from "@mazeworks/contracts";
import { CoordSet } from "../core/data-structures/coord-set";
import type { MazeGrid } from "../core/grid/grid";
import { createPosition } from "../core/grid/position";
import type { Position } from "../core/grid/types";
import { BacktrackingGenerator } from "./base";
import { carvePassage, countCarvableCells, STRIDE_DIRECTIONS } from "./carving";
import type { RecursiveGeneratorOptions } from "./types";

export class RecursiveBacktrackGenerator extends BacktrackingGenerator {
  readonly id = "recursive";
  readonly name = "Recursive Backtracking";
  readonly description =
    "Randomized depth-first carving on the call stack; limited maze size";

  readonly maxCells: number;

  constructor(options: RecursiveGeneratorOptions = {}) {
    super(options);
    this.maxCells = options.maxCells ?? MAX_RECURSION_CELLS;
  }

  protected carve(grid: MazeGrid, start: Position, rng: SeededRandom): void {
    const cells = countCarvableCells(grid.width, grid.height);
    if (cells > this.maxCells) {
      throw MazeError.recursionLimitExceeded(
        `A ${grid.width}x${grid.height} maze needs ${cells} nested calls; the recursive generator allows ${this.maxCells}`,
        { width: grid.width, height: grid.height, cells, limit: this.maxCells },
      );
    }

    const visited = new CoordSet(grid.width, grid.height);
    visited.add(start.x, start.y);

    try {
      this.visit(grid, visited, start, rng);
    } catch (error) {
      if (error instanceof RangeError) {
        throw MazeError.recursionLimitExceeded(
          `Call stack exhausted while carving a ${grid.width}x${grid.height} maze`,
          { width: grid.width, height: grid.height, cause: error.message },
        );
      }
      throw error;
    }
  }

  private visit(
    grid: MazeGrid,
    visited: CoordSet,
    current: Position,
    rng: SeededRandom,
  ): void {
    for (const dir of rng.shuffle(STRIDE_DIRECTIONS)) {
      const x = current.x + dir.x;
      const y = current.y + dir.y;
      if (!grid.isInBounds(x, y) || visited.has(x, y)) continue;

      const next = createPosition(x, y);
      carvePassage(grid, current, next);
      visited.add(x, y);
      this.visit(grid, visited, next, rng);
    }
  }
}

export function createRecursiveGenerator(
  options?: RecursiveGeneratorOptions,
): RecursiveBacktrackGenerator {
  return new RecursiveBacktrackGenerator(options);
}
