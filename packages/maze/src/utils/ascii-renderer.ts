/**
 * ASCII Maze Renderer
 *
 * @example
 * ```typescript
 * const maze = createMaze({ width: 21, height: 11, seed: 7 }).getOrThrow();
 * console.log(renderAscii(maze.grid, { path: maze.solve() ?? undefined }));
 * ```
 */

import { positionKey } from "../core/grid/position";
import { CellKind, type Path, type ReadonlyMazeGrid } from "../core/grid/types";
import type { MazeView } from "../maze";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AsciiCharset {
  readonly wall: string;
  readonly empty: string;
  readonly start: string;
  readonly end: string;
  readonly path: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "█",
  empty: " ",
  start: "S",
  end: "E",
  path: "●",
};

/**
 * For terminals without unicode support; matches the text export mapping.
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  empty: " ",
  start: "S",
  end: "E",
  path: ".",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Overlaid on open cells; terminals keep their own glyph */
  readonly path?: Path;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
  /** Print every cell twice horizontally, closer to a square aspect */
  readonly doubleWidth?: boolean;
}

// =============================================================================
// ANSI COLOR CODES
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  red: "\x1b[91m",
  green: "\x1b[92m",
  yellow: "\x1b[93m",
  blue: "\x1b[34m",
} as const;

const KIND_COLORS: Readonly<Record<CellKind, string | null>> = {
  [CellKind.WALL]: ANSI.blue,
  [CellKind.EMPTY]: null,
  [CellKind.START]: ANSI.green,
  [CellKind.END]: ANSI.red,
  [CellKind.PATH]: ANSI.yellow,
};

function glyphFor(kind: CellKind, charset: AsciiCharset): string {
  switch (kind) {
    case CellKind.WALL:
      return charset.wall;
    case CellKind.START:
      return charset.start;
    case CellKind.END:
      return charset.end;
    case CellKind.PATH:
      return charset.path;
    default:
      return charset.empty;
  }
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render a grid as one line per row, joined with "\n".
 */
export function renderAscii(
  grid: ReadonlyMazeGrid,
  options: RenderOptions = {},
): string {
  const {
    charset = DEFAULT_CHARSET,
    path = [],
    useColors = false,
    doubleWidth = false,
  } = options;

  const onPath = new Set<number>();
  for (const p of path) {
    if (grid.isInBounds(p.x, p.y)) onPath.add(positionKey(p, grid.width));
  }

  const lines: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let line = "";
    for (let x = 0; x < grid.width; x++) {
      let kind = grid.get(x, y);
      if (
        onPath.has(y * grid.width + x) &&
        kind !== CellKind.START &&
        kind !== CellKind.END
      ) {
        kind = CellKind.PATH;
      }

      let glyph = glyphFor(kind, charset);
      if (doubleWidth) {
        glyph += kind === CellKind.WALL ? glyph : " ";
      }

      const color = KIND_COLORS[kind];
      line += useColors && color !== null ? color + glyph + ANSI.reset : glyph;
    }
    lines.push(line);
  }

  return lines.join("\n");
}

/**
 * Print a maze with its terminals and, when solved, its solution.
 */
export function printMaze(maze: MazeView, options: RenderOptions = {}): void {
  console.log(
    renderAscii(maze.grid, { path: maze.solutionPath ?? undefined, ...options }),
  );
  console.log(
    `Start: (${maze.start.x}, ${maze.start.y})  End: (${maze.end.x}, ${maze.end.y})`,
  );
  if (maze.solutionPath !== null) {
    console.log(`Solution length: ${maze.solutionPath.length} steps`);
  }
}
