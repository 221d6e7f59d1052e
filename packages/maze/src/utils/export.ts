/**
 * Text and structured-record export, and record import.
 */

import {
  Err,
  type MazeRecord,
  MazeRecordSchema,
  MazeError,
  Ok,
  Result,
} from "@mazeworks/contracts";
import { MazeGrid } from "../core/grid/grid";
import { createPosition, formatPosition } from "../core/grid/position";
import type { Path, Position } from "../core/grid/types";
import type { MazeView } from "../maze";
import { renderAscii, SIMPLE_CHARSET } from "./ascii-renderer";

export interface TextExportOptions {
  /** Overlay `.` on the cached solution, terminals excepted */
  readonly includeSolution?: boolean;
}

/**
 * Header lines, a blank line, then one line per row. Ends with a newline.
 *
 * ```text
 * Maze 5x5
 * Start: (1, 1)
 * End: (3, 3)
 *
 * #####
 * ...
 * ```
 */
export function toText(maze: MazeView, options: TextExportOptions = {}): string {
  const { includeSolution = false } = options;
  const path =
    includeSolution && maze.solutionPath !== null ? maze.solutionPath : [];

  const header = [
    `Maze ${maze.width}x${maze.height}`,
    `Start: ${formatPosition(maze.start)}`,
    `End: ${formatPosition(maze.end)}`,
    "",
  ];
  const body = maze.grid.height > 0
    ? renderAscii(maze.grid, { charset: SIMPLE_CHARSET, path }).split("\n")
    : [];

  return `${[...header, ...body].join("\n")}\n`;
}

/**
 * Plain data suitable for `JSON.stringify`. The grid carries cell kinds
 * only; the solution travels separately in `solutionPath`.
 */
export function toRecord(maze: MazeView): MazeRecord {
  return {
    width: maze.width,
    height: maze.height,
    start: { x: maze.start.x, y: maze.start.y },
    end: { x: maze.end.x, y: maze.end.y },
    grid: maze.grid.toLines().map((line) => Array.from(line)),
    solutionPath:
      maze.solutionPath === null
        ? null
        : maze.solutionPath.map((p) => ({ x: p.x, y: p.y })),
  };
}

/**
 * A maze rebuilt from a record. Holds no strategies, so it cannot be
 * regenerated or re-solved.
 */
export interface LoadedMaze extends MazeView {
  readonly grid: MazeGrid;
}

function toPositions(records: readonly { x: number; y: number }[]): Path {
  return records.map((p): Position => createPosition(p.x, p.y));
}

/**
 * Validate a record (parsed object or JSON text) and rebuild its grid.
 */
export function parseMazeRecord(input: unknown): Result<LoadedMaze, MazeError> {
  let data = input;
  if (typeof input === "string") {
    const parsed = Result.fromThrowable(
      (): unknown => JSON.parse(input),
      (error) =>
        MazeError.recordInvalid("Record is not valid JSON", { cause: error }),
    );
    if (parsed.isErr()) return Err(parsed.error);
    data = parsed.value;
  }

  const result = MazeRecordSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    return Err(
      MazeError.recordInvalid(issue?.message ?? "Invalid maze record", {
        path: issue?.path,
        issues: result.error.issues,
      }),
    );
  }

  const record = result.data;
  const grid = Result.fromThrowable(
    () => MazeGrid.fromRows(record.grid.map((row) => row.join(""))),
    (error) =>
      MazeError.isMazeError(error)
        ? error
        : MazeError.recordInvalid("Invalid grid rows", { cause: error }),
  );
  if (grid.isErr()) return Err(grid.error);

  return Ok({
    width: record.width,
    height: record.height,
    start: createPosition(record.start.x, record.start.y),
    end: createPosition(record.end.x, record.end.y),
    grid: grid.value,
    solutionPath:
      record.solutionPath === null ? null : toPositions(record.solutionPath),
  });
}
