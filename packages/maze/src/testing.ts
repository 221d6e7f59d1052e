/**
 * Testing utilities for maze generation.
 * Kept apart from the validation module, which must not depend on the API.
 */

import type { GeneratorName } from "@mazeworks/contracts";
import { computeGridChecksum } from "./core/hash";
import { createGenerator } from "./generators";
import { Maze } from "./maze";
import { createPathfinder } from "./pathfinding";

export interface DeterminismConfig {
  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly generator: GeneratorName;
}

export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: DeterminismConfig,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Generate the same configuration `runs` times and compare grid checksums.
 *
 * @throws {DeterminismViolationError} If different runs produce different grids
 *
 * @example
 * ```typescript
 * it("iterative generator is deterministic", () => {
 *   assertDeterministic({ width: 31, height: 21, seed: 12345, generator: "iterative" });
 * });
 * ```
 */
export function assertDeterministic(config: DeterminismConfig, runs = 3): void {
  const checksums: string[] = [];

  for (let i = 0; i < runs; i++) {
    const maze = new Maze(
      config.width,
      config.height,
      createGenerator(config.generator, { seed: config.seed }),
      createPathfinder("bfs"),
    );
    checksums.push(computeGridChecksum(maze.grid));
  }

  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}
