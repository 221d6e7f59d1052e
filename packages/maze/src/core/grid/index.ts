/**
 * Grid module - cell model, positions and the maze grid.
 */

export * from "./cell";
export { MazeGrid } from "./grid";
export * from "./position";
export * from "./types";
