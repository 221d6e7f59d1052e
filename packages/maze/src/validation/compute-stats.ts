import { CellKind, type Path, type ReadonlyMazeGrid } from "../core/grid/types";

/**
 * Summary numbers for a maze and, optionally, its solution.
 */
export interface MazeStats {
  readonly totalCells: number;
  readonly wallCells: number;
  /** Every non-wall cell, terminals included */
  readonly openCells: number;
  readonly wallRatio: number;
  readonly openRatio: number;
  readonly solutionLength: number | null;
  /** solutionLength / openCells, null without a solution */
  readonly pathEfficiency: number | null;
}

export function computeStats(
  grid: ReadonlyMazeGrid,
  path: Path | null = null,
): MazeStats {
  const totalCells = grid.width * grid.height;
  const wallCells = grid.countCells(CellKind.WALL);
  const openCells = totalCells - wallCells;
  const solutionLength = path === null ? null : path.length;

  return {
    totalCells,
    wallCells,
    openCells,
    wallRatio: totalCells > 0 ? wallCells / totalCells : 0,
    openRatio: totalCells > 0 ? openCells / totalCells : 0,
    solutionLength,
    pathEfficiency:
      solutionLength !== null && openCells > 0
        ? solutionLength / openCells
        : null,
  };
}
