/**
 * Names of the built-in generation strategies.
 */
export const GENERATOR_NAMES = ["iterative", "recursive"] as const;
export type GeneratorName = (typeof GENERATOR_NAMES)[number];

/**
 * Names of the built-in pathfinding strategies.
 */
export const PATHFINDER_NAMES = ["bfs", "astar", "dijkstra", "deadend"] as const;
export type PathfinderName = (typeof PATHFINDER_NAMES)[number];

export interface MazeConfig {
  width: number;
  height: number;
  generator: GeneratorName;
  pathfinder: PathfinderName;
  /** Unsigned 32-bit seed; absent means a fresh random seed per generation */
  seed?: number;
}

/**
 * Plain coordinate pair as it appears in exported records.
 */
export interface PositionRecord {
  x: number;
  y: number;
}

/**
 * Structured export of a maze.
 * `grid` holds one single-character code per cell, row by row.
 */
export interface MazeRecord {
  width: number;
  height: number;
  start: PositionRecord;
  end: PositionRecord;
  grid: string[][];
  solutionPath: PositionRecord[] | null;
}
