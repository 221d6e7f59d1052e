/**
 * Maze generation and solving.
 *
 * @example
 * ```typescript
 * import { createMaze, toText } from "@mazeworks/maze";
 *
 * const result = createMaze({ width: 21, height: 11, pathfinder: "astar", seed: 42 });
 * if (result.isOk()) {
 *   const maze = result.value;
 *   maze.solve();
 *   console.log(toText(maze, { includeSolution: true }));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Strategies
export * from "./generators";
export * from "./pathfinding";
// Orchestrator
export { Maze, type MazeState, type MazeView, normalizeDimension } from "./maze";
export { createMaze } from "./api";
// Validation & statistics
export * from "./validation";
// Rendering & export
export * from "./utils";
// Testing helpers
export {
  assertDeterministic,
  type DeterminismConfig,
  DeterminismViolationError,
} from "./testing";
