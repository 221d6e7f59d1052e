import {
  type GeneratorName,
  randomUint32,
  SeededRandom,
} from "@mazeworks/contracts";
import type { MazeGrid } from "../core/grid/grid";
import type { Position } from "../core/grid/types";
import { ensureExit, initializeGrid } from "./carving";
import type { GeneratorOptions, MazeGenerator } from "./types";

/**
 * Skeleton shared by the backtracking generators: allocate, carve from
 * the start, force the exit.
 *
 * Each call builds its own SeededRandom, so a generator instance carries
 * no state between calls.
 */
export abstract class BacktrackingGenerator implements MazeGenerator {
  abstract readonly id: GeneratorName;
  abstract readonly name: string;
  abstract readonly description: string;

  protected readonly seed: number | undefined;

  constructor(options: GeneratorOptions = {}) {
    this.seed = options.seed;
  }

  generate(width: number, height: number, start: Position, end: Position): MazeGrid {
    const rng = new SeededRandom(this.seed ?? randomUint32());
    const grid = initializeGrid(width, height, start, end);

    this.carve(grid, start, rng);
    ensureExit(grid, end, rng);

    return grid;
  }

  /**
   * Carve a spanning tree of stride-2 cells reachable from `start`.
   */
  protected abstract carve(grid: MazeGrid, start: Position, rng: SeededRandom): void;
}
