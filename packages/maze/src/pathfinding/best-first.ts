/**
 * Best-first search ordered by g + h, shared by A* (Manhattan h) and
 * Dijkstra (h = 0).
 *
 * Entries with equal priority pop in insertion order. A cell's best known
 * g is lowered whenever a cheaper route shows up before the cell is
 * closed; the stale entry is skipped when it surfaces.
 */

import { CoordSet } from "../core/data-structures/coord-set";
import { MinHeap } from "../core/data-structures/min-heap";
import {
  createPosition,
  DIRECTIONS_4,
  positionKey,
  positionsEqual,
} from "../core/grid/position";
import type { Path, Position, ReadonlyMazeGrid } from "../core/grid/types";
import {
  extendNode,
  materializePath,
  type PathNode,
  resolveTrivialCase,
  rootNode,
} from "./search-node";
import type { Heuristic } from "./types";

interface FrontierEntry {
  readonly node: PathNode;
  readonly g: number;
  readonly f: number;
  readonly order: number;
}

function compareEntries(a: FrontierEntry, b: FrontierEntry): number {
  return a.f - b.f || a.order - b.order;
}

export function bestFirstSearch(
  grid: ReadonlyMazeGrid,
  start: Position,
  end: Position,
  heuristic: Heuristic,
): Path | null {
  const trivial = resolveTrivialCase(grid, start, end);
  if (trivial !== undefined) return trivial;

  const open = new MinHeap<FrontierEntry>(compareEntries);
  const closed = new CoordSet(grid.width, grid.height);
  const gScores = new Map<number, number>();
  let counter = 0;

  gScores.set(positionKey(start, grid.width), 0);
  open.push({ node: rootNode(start), g: 0, f: heuristic(start, end), order: counter });

  while (!open.isEmpty) {
    const entry = open.pop();
    if (entry === undefined) break;

    const { position } = entry.node;
    if (closed.has(position.x, position.y)) continue;
    closed.add(position.x, position.y);

    if (positionsEqual(position, end)) {
      return materializePath(entry.node);
    }

    for (const dir of DIRECTIONS_4) {
      const x = position.x + dir.x;
      const y = position.y + dir.y;
      if (!grid.isInBounds(x, y) || closed.has(x, y) || !grid.isPassable(x, y)) {
        continue;
      }

      const next = createPosition(x, y);
      const key = positionKey(next, grid.width);
      const tentative = entry.g + 1;
      const known = gScores.get(key);
      if (known !== undefined && tentative >= known) continue;

      gScores.set(key, tentative);
      counter++;
      open.push({
        node: extendNode(entry.node, next),
        g: tentative,
        f: tentative + heuristic(next, end),
        order: counter,
      });
    }
  }

  return null;
}
