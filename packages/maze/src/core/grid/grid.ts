/**
 * Maze grid backed by a flat row-major Uint8Array.
 * Cell (x, y) lives at index `y * width + x`.
 */

import { MazeError } from "@mazeworks/contracts";
import { inBounds, isPassableKind } from "./cell";
import { createPosition } from "./position";
import {
  CELL_CHARS,
  type Cell,
  CellKind,
  type MutableMazeGrid,
  type Position,
} from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

const KIND_BY_CHAR: ReadonlyMap<string, CellKind> = new Map(
  Object.values(CellKind).map((kind) => [CELL_CHARS[kind], kind]),
);

/**
 * Rectangular grid of cell kinds.
 *
 * Zero-sized grids are allowed so that degenerate input reaches the
 * pathfinders, which answer it with "no path".
 */
export class MazeGrid implements MutableMazeGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(
    width: number,
    height: number,
    initialValue: CellKind = CellKind.WALL,
  ) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width < 0 ||
      height < 0
    ) {
      throw new RangeError(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (initialValue !== CellKind.WALL) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Grid with every cell set to WALL.
   */
  static walls(width: number, height: number): MazeGrid {
    return new MazeGrid(width, height, CellKind.WALL);
  }

  /**
   * Parse text rows written with the fixed character mapping
   * (`#` wall, space empty, `S` start, `E` end, `.` path).
   *
   * @throws {MazeError} RECORD_INVALID for ragged rows or unknown characters
   */
  static fromRows(lines: readonly string[]): MazeGrid {
    const height = lines.length;
    const width = lines[0]?.length ?? 0;
    const grid = new MazeGrid(width, height);

    lines.forEach((line, y) => {
      if (line.length !== width) {
        throw MazeError.recordInvalid(
          `Row ${y} has ${line.length} cells, expected ${width}`,
          { row: y },
        );
      }
      for (let x = 0; x < width; x++) {
        const char = line.charAt(x);
        const kind = KIND_BY_CHAR.get(char);
        if (kind === undefined) {
          throw MazeError.recordInvalid(
            `Unknown cell character '${char}' at (${x}, ${y})`,
            { x, y, char },
          );
        }
        grid.data[y * width + x] = kind;
      }
    });

    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return inBounds(x, y, this.width, this.height);
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Cell kind with bounds checking (WALL outside the grid)
   */
  get(x: number, y: number): CellKind {
    if (!this.isInBounds(x, y)) return CellKind.WALL;
    return this.data[y * this.width + x] as CellKind;
  }

  getAt(p: Position): CellKind {
    return this.get(p.x, p.y);
  }

  /**
   * Set a cell; out-of-bounds writes are dropped.
   */
  set(x: number, y: number, kind: CellKind): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `[Maze] MazeGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = kind;
  }

  setAt(p: Position, kind: CellKind): void {
    this.set(p.x, p.y, kind);
  }

  isPassable(x: number, y: number): boolean {
    return isPassableKind(this.get(x, y));
  }

  // ===========================================================================
  // NEIGHBORS
  // ===========================================================================

  /**
   * Number of passable cells among the four axis neighbors.
   * Outside the grid counts as wall.
   */
  countPassableNeighbors4(x: number, y: number): number {
    let count = 0;
    if (this.isPassable(x + 1, y)) count++;
    if (this.isPassable(x, y + 1)) count++;
    if (this.isPassable(x - 1, y)) count++;
    if (this.isPassable(x, y - 1)) count++;
    return count;
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  forEach(callback: (x: number, y: number, kind: CellKind) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.data[y * this.width + x] as CellKind);
      }
    }
  }

  countCells(kind: CellKind): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === kind) count++;
    }
    return count;
  }

  /**
   * Ordered rows of cells, top to bottom and left to right.
   */
  rows(): Cell[][] {
    const rows: Cell[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push({
          position: createPosition(x, y),
          kind: this.data[y * this.width + x] as CellKind,
        });
      }
      rows.push(row);
    }
    return rows;
  }

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  clone(): MazeGrid {
    const copy = new MazeGrid(this.width, this.height);
    copy.data.set(this.data);
    return copy;
  }

  /**
   * One string per row using the fixed character mapping.
   */
  toLines(): string[] {
    const lines: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = "";
      for (let x = 0; x < this.width; x++) {
        line += CELL_CHARS[this.data[y * this.width + x] as CellKind];
      }
      lines.push(line);
    }
    return lines;
  }
}
