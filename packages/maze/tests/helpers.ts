import { MazeError } from "@mazeworks/contracts";
import { MazeGrid } from "../src";

/**
 * Code of the MazeError thrown by `fn`, or undefined when it returns or
 * throws something else.
 */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return MazeError.isMazeError(error) ? error.code : undefined;
  }
  return undefined;
}

export function gridOf(...lines: string[]): MazeGrid {
  return MazeGrid.fromRows(lines);
}
