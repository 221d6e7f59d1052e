import { CellKind, type Cell } from "./types";

/**
 * Kind of a cell.
 */
export function classify(cell: Cell): CellKind {
  return cell.kind;
}

/**
 * Everything except WALL can be walked on.
 */
export function isPassableKind(kind: CellKind): boolean {
  return kind !== CellKind.WALL;
}

export function isPassable(cell: Cell): boolean {
  return isPassableKind(cell.kind);
}

export function isTerminalKind(kind: CellKind): boolean {
  return kind === CellKind.START || kind === CellKind.END;
}

export function inBounds(
  x: number,
  y: number,
  width: number,
  height: number,
): boolean {
  return x >= 0 && x < width && y >= 0 && y < height;
}
