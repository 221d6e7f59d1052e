/**
 * Breadth-first search.
 *
 * Level-order expansion from a FIFO frontier; the first time the end is
 * dequeued its prefix is a shortest path, since every step costs 1.
 */

import type { PathfinderName } from "@mazeworks/contracts";
import { CoordSet } from "../core/data-structures/coord-set";
import { FastQueue } from "../core/data-structures/fast-queue";
import { createPosition, DIRECTIONS_4, positionsEqual } from "../core/grid/position";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";
import {
  extendNode,
  materializePath,
  type PathNode,
  resolveTrivialCase,
  rootNode,
} from "./search-node";
import type { Pathfinder } from "./types";

export function breadthFirstSearch(
  grid: ReadonlyMazeGrid,
  start: Position,
  end: Position,
): Path | null {
  const trivial = resolveTrivialCase(grid, start, end);
  if (trivial !== undefined) return trivial;

  const visited = new CoordSet(grid.width, grid.height);
  const queue = new FastQueue<PathNode>();
  visited.add(start.x, start.y);
  queue.enqueue(rootNode(start));

  while (!queue.isEmpty) {
    const node = queue.dequeue();
    if (node === undefined) break;

    if (positionsEqual(node.position, end)) {
      return materializePath(node);
    }

    for (const dir of DIRECTIONS_4) {
      const x = node.position.x + dir.x;
      const y = node.position.y + dir.y;
      if (!grid.isInBounds(x, y) || visited.has(x, y) || !grid.isPassable(x, y)) {
        continue;
      }
      visited.add(x, y);
      queue.enqueue(extendNode(node, createPosition(x, y)));
    }
  }

  return null;
}

export class BreadthFirstPathfinder implements Pathfinder {
  readonly id: PathfinderName = "bfs";
  readonly name = "Breadth-First Search";
  readonly description = "Level-order search; shortest path on unit-cost grids";

  findPath(grid: ReadonlyMazeGrid, start: Position, end: Position): Path | null {
    return breadthFirstSearch(grid, start, end);
  }
}

export function createBFSPathfinder(): BreadthFirstPathfinder {
  return new BreadthFirstPathfinder();
}
