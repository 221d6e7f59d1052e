/**
 * Grid model types.
 */

/**
 * Cell kinds. WALL is zero so a freshly allocated grid is fully walled.
 *
 * PATH only ever appears in working copies and overlays, never in the
 * output of a generator.
 */
export const CellKind = {
  WALL: 0,
  EMPTY: 1,
  START: 2,
  END: 3,
  PATH: 4,
} as const;

export type CellKind = (typeof CellKind)[keyof typeof CellKind];

/**
 * Immutable integer coordinate pair: x is the column, y the row.
 */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/**
 * A position together with its kind, as handed to renderers.
 */
export interface Cell {
  readonly position: Position;
  readonly kind: CellKind;
}

/**
 * Ordered start-to-end positions, both ends included.
 */
export type Path = readonly Position[];

/**
 * Fixed single-character mapping used by text exports.
 */
export const CELL_CHARS: Readonly<Record<CellKind, string>> = {
  [CellKind.WALL]: "#",
  [CellKind.EMPTY]: " ",
  [CellKind.START]: "S",
  [CellKind.END]: "E",
  [CellKind.PATH]: ".",
};

/**
 * Read-only grid view.
 *
 * Pathfinders, renderers and exporters receive this type so they cannot
 * mutate the grid owned by a maze.
 */
export interface ReadonlyMazeGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): CellKind;
  getAt(p: Position): CellKind;
  isPassable(x: number, y: number): boolean;
  countPassableNeighbors4(x: number, y: number): number;
  forEach(callback: (x: number, y: number, kind: CellKind) => void): void;
  countCells(kind: CellKind): number;
  rows(): Cell[][];
  getRawDataCopy(): Uint8Array;
  clone(): MutableMazeGrid;
  toLines(): string[];
}

/**
 * Grid with single-cell mutation.
 */
export interface MutableMazeGrid extends ReadonlyMazeGrid {
  set(x: number, y: number, kind: CellKind): void;
  setAt(p: Position, kind: CellKind): void;
}
