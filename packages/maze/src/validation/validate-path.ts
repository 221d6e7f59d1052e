import { formatPosition, positionKey, positionsEqual } from "../core/grid/position";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";
import {
  hasErrorViolations,
  type PathValidationResult,
  type Violation,
} from "./result-types";

/**
 * Check that `path` is a walkable route from `start` to `end`.
 *
 * Checks:
 * - Path is non-empty
 * - First and last positions are the terminals
 * - Every position is inside the grid and passable
 * - Consecutive positions are 4-adjacent
 * - No position is visited twice
 */
export function validatePath(
  grid: ReadonlyMazeGrid,
  path: Path,
  start: Position,
  end: Position,
): PathValidationResult {
  const violations: Violation[] = [];

  const first = path[0];
  const last = path[path.length - 1];
  if (first === undefined || last === undefined) {
    violations.push({
      type: "path.empty",
      message: "Path is empty",
      severity: "error",
    });
    return { success: false, violations };
  }

  if (!positionsEqual(first, start)) {
    violations.push({
      type: "path.start",
      message: `Path begins at ${formatPosition(first)}, expected ${formatPosition(start)}`,
      severity: "error",
    });
  }
  if (!positionsEqual(last, end)) {
    violations.push({
      type: "path.end",
      message: `Path ends at ${formatPosition(last)}, expected ${formatPosition(end)}`,
      severity: "error",
    });
  }

  const seen = new Set<number>();
  let previous: Position | null = null;

  for (const p of path) {
    if (!grid.isInBounds(p.x, p.y)) {
      violations.push({
        type: "path.bounds",
        message: `Position ${formatPosition(p)} lies outside the grid`,
        severity: "error",
      });
    } else {
      if (!grid.isPassable(p.x, p.y)) {
        violations.push({
          type: "path.wall",
          message: `Position ${formatPosition(p)} is a wall`,
          severity: "error",
        });
      }
      const key = positionKey(p, grid.width);
      if (seen.has(key)) {
        violations.push({
          type: "path.revisit",
          message: `Position ${formatPosition(p)} is visited more than once`,
          severity: "error",
        });
      }
      seen.add(key);
    }

    if (previous !== null) {
      const step = Math.abs(p.x - previous.x) + Math.abs(p.y - previous.y);
      if (step !== 1) {
        violations.push({
          type: "path.adjacency",
          message: `Step ${formatPosition(previous)} -> ${formatPosition(p)} is not between adjacent cells`,
          severity: "error",
        });
      }
    }
    previous = p;
  }

  return hasErrorViolations(violations)
    ? { success: false, violations }
    : { success: true, violations };
}
