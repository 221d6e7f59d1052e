/**
 * Config-driven entry point.
 */

import {
  type BuildConfigInput,
  buildMazeConfig,
  Err,
  MazeError,
  RECURSION_WARNING_AREA,
  Result,
} from "@mazeworks/contracts";
import { createGenerator } from "./generators";
import { Maze } from "./maze";
import { createPathfinder } from "./pathfinding";

/**
 * Validate the input, pick the strategies and generate a maze.
 *
 * @example
 * ```typescript
 * const result = createMaze({ width: 21, height: 11, pathfinder: "astar", seed: 42 });
 * if (result.isOk()) {
 *   const path = result.value.solve();
 * }
 * ```
 */
export function createMaze(input: BuildConfigInput = {}): Result<Maze, MazeError> {
  const config = buildMazeConfig(input);
  if (config.isErr()) return Err(config.error);

  const { width, height, generator, pathfinder, seed } = config.value;
  const area = width * height;
  if (generator === "recursive" && area > RECURSION_WARNING_AREA) {
    console.warn(
      `[Maze] ${width}x${height} (${area} cells) is large for the recursive generator; prefer "iterative"`,
    );
  }

  return Result.fromThrowable(
    () =>
      new Maze(
        width,
        height,
        createGenerator(generator, { seed }),
        createPathfinder(pathfinder),
      ),
    (error) =>
      MazeError.isMazeError(error)
        ? error
        : MazeError.generationFailed("Failed to generate maze", { cause: error }),
  );
}
