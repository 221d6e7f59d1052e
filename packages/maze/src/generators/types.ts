/**
 * Generator contract.
 */

import type { GeneratorName } from "@mazeworks/contracts";
import type { MazeGrid } from "../core/grid/grid";
import type { Position } from "../core/grid/types";

/**
 * A maze generation strategy.
 *
 * `width` and `height` arrive already odd-normalized and the terminals
 * already computed; the generator returns a new grid on every call and
 * keeps no reference to it.
 */
export interface MazeGenerator {
  readonly id: GeneratorName;
  readonly name: string;
  readonly description: string;
  generate(width: number, height: number, start: Position, end: Position): MazeGrid;
}

export interface GeneratorOptions {
  /**
   * Unsigned 32-bit seed. Every `generate()` call restarts from it, so the
   * same seed and dimensions always give the same grid. When absent each
   * call draws a fresh seed.
   */
  readonly seed?: number;
}

export interface RecursiveGeneratorOptions extends GeneratorOptions {
  /**
   * Maximum number of carvable (odd, odd) cells, i.e. the deepest call
   * chain the generator may need.
   */
  readonly maxCells?: number;
}

/**
 * Registry listing entry.
 */
export interface StrategyInfo<TName extends string> {
  readonly id: TName;
  readonly name: string;
  readonly description: string;
}
