import { describe, expect, it } from "vitest";
import {
  createAStarPathfinder,
  createBFSPathfinder,
  createDeadEndFillerPathfinder,
  createDijkstraPathfinder,
  createIterativeGenerator,
  createPathfinder,
  createPosition,
  createRecursiveGenerator,
  fillDeadEnds,
  getAvailablePathfinders,
  MazeGrid,
  type Pathfinder,
  validatePath,
} from "../src";
import { gridOf } from "./helpers";

const ALL: Pathfinder[] = [
  createBFSPathfinder(),
  createAStarPathfinder(),
  createDijkstraPathfinder(),
  createDeadEndFillerPathfinder(),
];

const pairs = (path: readonly { x: number; y: number }[] | null) =>
  path === null ? null : path.map((p) => [p.x, p.y]);

// Two equally short routes around a block: along the top, or along the bottom.
const LOOP = gridOf(
  "#######",
  "#S    #",
  "# ### #",
  "#    E#",
  "#######",
);

// One corridor winding to the end, plus a dead-end pocket beside it.
const WINDING = gridOf(
  "#########",
  "#S#     #",
  "# # ### #",
  "#   #  E#",
  "#########",
);

describe.each(ALL)("$id", (pathfinder) => {
  it("finds the shortest path around a block", () => {
    const path = pathfinder.findPath(LOOP, createPosition(1, 1), createPosition(5, 3));
    expect(pairs(path)).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 1],
      [5, 1],
      [5, 2],
      [5, 3],
    ]);
  });

  it("follows a winding corridor", () => {
    const path = pathfinder.findPath(WINDING, createPosition(1, 1), createPosition(7, 3));
    expect(pairs(path)).toEqual([
      [1, 1],
      [1, 2],
      [1, 3],
      [2, 3],
      [3, 3],
      [3, 2],
      [3, 1],
      [4, 1],
      [5, 1],
      [6, 1],
      [7, 1],
      [7, 2],
      [7, 3],
    ]);
  });

  it("returns null when the end is walled off", () => {
    const grid = gridOf("#####", "#S#E#", "#####");
    expect(pathfinder.findPath(grid, createPosition(1, 1), createPosition(3, 1))).toBeNull();
  });

  it("returns the single start cell when start equals end", () => {
    const grid = gridOf("###", "#S#", "###");
    expect(pairs(pathfinder.findPath(grid, createPosition(1, 1), createPosition(1, 1)))).toEqual([
      [1, 1],
    ]);
  });

  it("returns null for degenerate input", () => {
    expect(
      pathfinder.findPath(new MazeGrid(0, 0), createPosition(0, 0), createPosition(0, 0)),
    ).toBeNull();
    expect(pathfinder.findPath(LOOP, createPosition(1, 1), createPosition(9, 9))).toBeNull();
  });

  it("leaves the input grid untouched", () => {
    const before = WINDING.toLines();
    pathfinder.findPath(WINDING, createPosition(1, 1), createPosition(7, 3));
    expect(WINDING.toLines()).toEqual(before);
  });
});

describe("strategy agreement", () => {
  it("agrees on path length for generated mazes", () => {
    const mismatches: string[] = [];
    for (let seed = 0; seed < 30; seed++) {
      for (const generator of [
        createIterativeGenerator({ seed }),
        createRecursiveGenerator({ seed }),
      ]) {
        const width = 21;
        const height = 15;
        const start = createPosition(1, 1);
        const end = createPosition(width - 2, height - 2);
        const grid = generator.generate(width, height, start, end);

        const lengths = ALL.map((p) => p.findPath(grid, start, end)?.length ?? -1);
        if (new Set(lengths).size !== 1) {
          mismatches.push(`${generator.id} seed ${seed}: ${lengths.join(", ")}`);
        }
        for (const pathfinder of ALL) {
          const path = pathfinder.findPath(grid, start, end);
          if (path === null || !validatePath(grid, path, start, end).success) {
            mismatches.push(`${generator.id} seed ${seed}: invalid ${pathfinder.id} path`);
          }
        }
      }
    }
    expect(mismatches).toEqual([]);
  });
});

describe("AStarPathfinder", () => {
  // (6, 5) is first reached at cost 10 through the upper detour; the lower
  // route reaches it at cost 8 before it is closed.
  const DETOUR = gridOf(
    "##    # #",
    " #    # #",
    " #   # ##",
    "S #    #E",
    "#    # # ",
    "   #     ",
    "#  ## # #",
  );

  it("lowers a cell's cost when a shorter route turns up later", () => {
    const start = createPosition(0, 3);
    const end = createPosition(8, 3);
    const path = createAStarPathfinder().findPath(DETOUR, start, end);
    const shortest = createBFSPathfinder().findPath(DETOUR, start, end);

    expect(shortest?.length).toBe(13);
    expect(path?.length).toBe(13);
    expect(pairs(path)).toEqual([
      [0, 3],
      [1, 3],
      [1, 4],
      [2, 4],
      [3, 4],
      [4, 4],
      [4, 5],
      [5, 5],
      [6, 5],
      [7, 5],
      [8, 5],
      [8, 4],
      [8, 3],
    ]);
  });
});

describe("fillDeadEnds", () => {
  it("reduces a tree to its start-end corridor", () => {
    const result = fillDeadEnds(WINDING, createPosition(1, 1), createPosition(7, 3));
    expect(result.filledCells).toBe(2);
    expect(result.passes).toBe(2);
    expect(result.isCorridor).toBe(true);
    expect(result.grid.toLines()).toEqual([
      "#########",
      "#S#     #",
      "# # ### #",
      "#   ###E#",
      "#########",
    ]);
  });

  it("flags input containing a loop", () => {
    const result = fillDeadEnds(LOOP, createPosition(1, 1), createPosition(5, 3));
    expect(result.filledCells).toBe(0);
    expect(result.passes).toBe(1);
    expect(result.isCorridor).toBe(false);
  });

  it("fills path marks like open cells", () => {
    const grid = gridOf("######", "#S..E#", "#.####", "######");
    const result = fillDeadEnds(grid, createPosition(1, 1), createPosition(4, 1));
    expect(result.filledCells).toBe(1);
    expect(result.grid.toLines()[2]).toBe("######");
    expect(result.isCorridor).toBe(true);
  });
});

describe("pathfinder registry", () => {
  it("creates pathfinders by name", () => {
    expect(createPathfinder("astar").name).toBe("A* Search");
    expect(createPathfinder("deadend").id).toBe("deadend");
  });

  it("lists the available pathfinders", () => {
    expect(getAvailablePathfinders().map((info) => info.id)).toEqual([
      "bfs",
      "astar",
      "dijkstra",
      "deadend",
    ]);
  });
});
