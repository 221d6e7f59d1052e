/**
 * Immutable path prefixes carried by frontier entries.
 *
 * Each entry extends its parent's prefix by one position, so sibling
 * entries share their common prefix instead of copying it.
 */

import { positionsEqual } from "../core/grid/position";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";

export interface PathNode {
  readonly position: Position;
  readonly parent: PathNode | null;
  readonly length: number;
}

export function rootNode(position: Position): PathNode {
  return { position, parent: null, length: 1 };
}

export function extendNode(parent: PathNode, position: Position): PathNode {
  return { position, parent, length: parent.length + 1 };
}

/**
 * Unroll a prefix into a start-to-end position list.
 */
export function materializePath(node: PathNode): Position[] {
  const path = new Array<Position>(node.length);
  let current: PathNode | null = node;
  for (let i = node.length - 1; current !== null; i--) {
    path[i] = current.position;
    current = current.parent;
  }
  return path;
}

/**
 * Answers shared by every strategy before searching:
 * `null` for a degenerate grid or a terminal outside it, `[start]` when
 * start equals end, `undefined` when a real search is needed.
 */
export function resolveTrivialCase(
  grid: ReadonlyMazeGrid,
  start: Position,
  end: Position,
): Path | null | undefined {
  if (grid.width === 0 || grid.height === 0) return null;
  if (positionsEqual(start, end)) return [start];
  if (!grid.isInBounds(start.x, start.y) || !grid.isInBounds(end.x, end.y)) {
    return null;
  }
  return undefined;
}
