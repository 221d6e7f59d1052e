/**
 * Iterative backtracking generator.
 *
 * Randomized depth-first carving driven by an explicit stack, so maze
 * size is bounded by memory rather than by the call stack.
 */

import type { SeededRandom } from "@mazeworks/contracts";
import { CoordSet } from "../core/data-structures/coord-set";
import type { MazeGrid } from "../core/grid/grid";
import type { Position } from "../core/grid/types";
import { BacktrackingGenerator } from "./base";
import { carvePassage, unvisitedStrideNeighbors } from "./carving";
import type { GeneratorOptions } from "./types";

export class IterativeBacktrackGenerator extends BacktrackingGenerator {
  readonly id = "iterative";
  readonly name = "Iterative Backtracking";
  readonly description =
    "Randomized depth-first carving with an explicit stack; no size limit";

  protected carve(grid: MazeGrid, start: Position, rng: SeededRandom): void {
    const visited = new CoordSet(grid.width, grid.height);
    const stack: Position[] = [start];
    visited.add(start.x, start.y);

    while (stack.length > 0) {
      const current = stack[stack.length - 1];
      if (current === undefined) break;

      const next = rng.choice(unvisitedStrideNeighbors(grid, visited, current));
      if (next === undefined) {
        stack.pop();
        continue;
      }

      carvePassage(grid, current, next);
      visited.add(next.x, next.y);
      stack.push(next);
    }
  }
}

export function createIterativeGenerator(
  options?: GeneratorOptions,
): IterativeBacktrackGenerator {
  return new IterativeBacktrackGenerator(options);
}
