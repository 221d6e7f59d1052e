/**
 * Maze orchestrator.
 *
 * Owns one grid and at most one cached solution. Generation happens on
 * construction and on `regenerate()`; solving happens on demand.
 *
 * States:
 * - `unsolved`: grid present, no cached path (fresh, or the last solve
 *   found nothing)
 * - `solved`: cached path valid for the current grid
 * - `regenerated`: grid replaced by `regenerate()`, previous path dropped;
 *   behaves as unsolved until the next `solve()`
 */

import { MazeError } from "@mazeworks/contracts";
import type { MazeGrid } from "./core/grid/grid";
import { createPosition, DIRECTIONS_4 } from "./core/grid/position";
import type { Cell, Path, Position, ReadonlyMazeGrid } from "./core/grid/types";
import type { MazeGenerator } from "./generators/types";
import type { Pathfinder } from "./pathfinding/types";

export type MazeState = "unsolved" | "solved" | "regenerated";

/**
 * Read-only view of a maze, as consumed by renderers and exporters.
 */
export interface MazeView {
  readonly width: number;
  readonly height: number;
  readonly start: Position;
  readonly end: Position;
  readonly grid: ReadonlyMazeGrid;
  readonly solutionPath: Path | null;
}

/**
 * Round an even dimension up to the next odd value.
 */
export function normalizeDimension(value: number): number {
  return value % 2 === 1 ? value : value + 1;
}

function toMazeError(
  error: unknown,
  wrap: (message: string, details?: Record<string, unknown>) => MazeError,
  context: string,
): MazeError {
  if (MazeError.isMazeError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return wrap(`${context}: ${message}`, { cause: error });
}

export class Maze implements MazeView {
  readonly width: number;
  readonly height: number;
  readonly start: Position;
  readonly end: Position;
  readonly generator: MazeGenerator;
  readonly pathfinder: Pathfinder;

  private currentGrid: MazeGrid;
  private cachedPath: Path | null = null;
  private currentState: MazeState = "unsolved";

  /**
   * Normalize dimensions to odd, place the terminals at (1, 1) and
   * (width - 2, height - 2), and generate the grid.
   *
   * @throws {MazeError} whatever the generator raised; non-MazeError
   * failures are wrapped as GENERATION_FAILED
   */
  constructor(
    width: number,
    height: number,
    generator: MazeGenerator,
    pathfinder: Pathfinder,
  ) {
    this.width = normalizeDimension(width);
    this.height = normalizeDimension(height);
    this.start = createPosition(1, 1);
    this.end = createPosition(this.width - 2, this.height - 2);
    this.generator = generator;
    this.pathfinder = pathfinder;
    this.currentGrid = this.runGenerator();
  }

  static create(
    width: number,
    height: number,
    generator: MazeGenerator,
    pathfinder: Pathfinder,
  ): Maze {
    return new Maze(width, height, generator, pathfinder);
  }

  get grid(): ReadonlyMazeGrid {
    return this.currentGrid;
  }

  get state(): MazeState {
    return this.currentState;
  }

  get solutionPath(): Path | null {
    return this.cachedPath;
  }

  /**
   * Run the pathfinder on the current grid and cache the outcome.
   * A `null` result clears any previous path.
   *
   * @throws {MazeError} PATHFINDING_FAILED when the strategy itself throws
   */
  solve(): Path | null {
    let path: Path | null;
    try {
      path = this.pathfinder.findPath(this.currentGrid, this.start, this.end);
    } catch (error) {
      throw toMazeError(error, MazeError.pathfindingFailed, "Failed to solve maze");
    }

    this.cachedPath = path;
    this.currentState = path === null ? "unsolved" : "solved";
    return path;
  }

  /**
   * Replace the grid with a freshly generated one and drop the cached path.
   * On failure the current grid and path are kept.
   */
  regenerate(): void {
    const grid = this.runGenerator();
    this.currentGrid = grid;
    this.cachedPath = null;
    this.currentState = "regenerated";
  }

  /**
   * @throws {RangeError} for coordinates outside the grid
   */
  getCell(x: number, y: number): Cell {
    if (!this.currentGrid.isInBounds(x, y)) {
      throw new RangeError(`Invalid position: (${x}, ${y})`);
    }
    return { position: createPosition(x, y), kind: this.currentGrid.get(x, y) };
  }

  /**
   * In-bounds positions `distance` cells away along each axis.
   */
  getNeighbors(position: Position, distance = 1): Position[] {
    const neighbors: Position[] = [];
    for (const dir of DIRECTIONS_4) {
      const x = position.x + dir.x * distance;
      const y = position.y + dir.y * distance;
      if (this.currentGrid.isInBounds(x, y)) {
        neighbors.push(createPosition(x, y));
      }
    }
    return neighbors;
  }

  private runGenerator(): MazeGrid {
    try {
      return this.generator.generate(this.width, this.height, this.start, this.end);
    } catch (error) {
      throw toMazeError(error, MazeError.generationFailed, "Failed to generate maze");
    }
  }
}
