import { describe, expect, it } from "vitest";
import {
  analyzeTopology,
  CellKind,
  createBFSPathfinder,
  createIterativeGenerator,
  createPosition,
  Maze,
  type MazeGenerator,
  MazeGrid,
  normalizeDimension,
  type Pathfinder,
} from "../src";
import { thrownCode } from "./helpers";

const SEED_1_5X5 = ["#####", "#S# #", "# # #", "#  E#", "#####"];

function seededMaze(width: number, height: number, seed = 1): Maze {
  return new Maze(width, height, createIterativeGenerator({ seed }), createBFSPathfinder());
}

describe("normalizeDimension", () => {
  it("rounds even values up to odd", () => {
    expect(normalizeDimension(4)).toBe(5);
    expect(normalizeDimension(5)).toBe(5);
    expect(normalizeDimension(20)).toBe(21);
  });
});

describe("Maze", () => {
  it("generates on construction", () => {
    const maze = seededMaze(5, 5);
    expect(maze.width).toBe(5);
    expect(maze.height).toBe(5);
    expect(maze.start).toEqual({ x: 1, y: 1 });
    expect(maze.end).toEqual({ x: 3, y: 3 });
    expect(maze.state).toBe("unsolved");
    expect(maze.solutionPath).toBeNull();
    expect(maze.grid.toLines()).toEqual(SEED_1_5X5);
  });

  it("carves a 5x5 seed-1 maze as a tree", () => {
    expect(analyzeTopology(seededMaze(5, 5).grid)).toEqual({
      passableCells: 7,
      edges: 6,
      components: 1,
      isPerfect: true,
    });
  });

  it("keeps odd dimensions and bumps even ones", () => {
    for (const [width, height] of [
      [5, 5],
      [6, 8],
      [9, 12],
    ] as const) {
      const maze = seededMaze(width, height);
      expect([maze.width, maze.height]).toEqual([
        width % 2 === 0 ? width + 1 : width,
        height % 2 === 0 ? height + 1 : height,
      ]);
    }
  });

  it("normalizes even dimensions before placing the end", () => {
    const maze = seededMaze(4, 6);
    expect([maze.width, maze.height]).toEqual([5, 7]);
    expect(maze.end).toEqual({ x: 3, y: 5 });
    expect(maze.grid.get(3, 5)).toBe(CellKind.END);
  });

  it("solves and caches the path", () => {
    const maze = seededMaze(5, 5);
    const path = maze.solve();
    expect(path?.map((p) => [p.x, p.y])).toEqual([
      [1, 1],
      [1, 2],
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(maze.state).toBe("solved");
    expect(maze.solutionPath).toBe(path);
  });

  it("solves the smallest maze with the start alone", () => {
    const maze = seededMaze(3, 3);
    expect(maze.end).toEqual(maze.start);
    expect(maze.solve()).toEqual([{ x: 1, y: 1 }]);
  });

  it("regenerates and drops the cached path", () => {
    const maze = seededMaze(11, 11, 42);
    const before = maze.grid.toLines();
    maze.solve();
    maze.regenerate();
    expect(maze.state).toBe("regenerated");
    expect(maze.solutionPath).toBeNull();
    // a fixed seed restarts on every generation
    expect(maze.grid.toLines()).toEqual(before);

    maze.solve();
    expect(maze.state).toBe("solved");
  });

  it("clears the path when a solve finds nothing", () => {
    let calls = 0;
    const pathfinder: Pathfinder = {
      id: "bfs",
      name: "Flaky",
      description: "Finds a path on the first call only",
      findPath: (_grid, start) => (calls++ === 0 ? [start] : null),
    };
    const maze = new Maze(5, 5, createIterativeGenerator({ seed: 1 }), pathfinder);

    expect(maze.solve()).not.toBeNull();
    expect(maze.solve()).toBeNull();
    expect(maze.state).toBe("unsolved");
    expect(maze.solutionPath).toBeNull();
  });

  it("wraps generator failures", () => {
    const cause = new Error("out of paint");
    const generator: MazeGenerator = {
      id: "iterative",
      name: "Broken",
      description: "Always throws",
      generate: () => {
        throw cause;
      },
    };

    let caught: unknown;
    try {
      new Maze(5, 5, generator, createBFSPathfinder());
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      code: "GENERATION_FAILED",
      message: "Failed to generate maze: out of paint",
      details: { cause },
    });
  });

  it("keeps the current grid when regeneration fails", () => {
    let calls = 0;
    const generator: MazeGenerator = {
      id: "iterative",
      name: "Once",
      description: "Generates once, then throws",
      generate: (width, height) => {
        if (calls++ > 0) throw new Error("exhausted");
        return new MazeGrid(width, height, CellKind.EMPTY);
      },
    };
    const maze = new Maze(5, 5, generator, createBFSPathfinder());
    maze.solve();

    expect(thrownCode(() => maze.regenerate())).toBe("GENERATION_FAILED");
    expect(maze.state).toBe("solved");
    expect(maze.grid.countCells(CellKind.EMPTY)).toBe(25);
  });

  it("wraps pathfinder failures", () => {
    const pathfinder: Pathfinder = {
      id: "astar",
      name: "Broken",
      description: "Always throws",
      findPath: () => {
        throw new TypeError("lost");
      },
    };
    const maze = new Maze(5, 5, createIterativeGenerator({ seed: 1 }), pathfinder);
    expect(thrownCode(() => maze.solve())).toBe("PATHFINDING_FAILED");
    expect(maze.state).toBe("unsolved");
  });

  it("reads cells and rejects out-of-range positions", () => {
    const maze = seededMaze(5, 5);
    expect(maze.getCell(1, 1)).toEqual({ position: { x: 1, y: 1 }, kind: CellKind.START });
    expect(maze.getCell(0, 0).kind).toBe(CellKind.WALL);
    expect(() => maze.getCell(5, 0)).toThrow("Invalid position: (5, 0)");
    expect(() => maze.getCell(0, -1)).toThrow(RangeError);
  });

  it("lists in-bounds neighbors at a distance", () => {
    const maze = seededMaze(5, 5);
    expect(maze.getNeighbors(createPosition(1, 1))).toEqual([
      { x: 2, y: 1 },
      { x: 1, y: 2 },
      { x: 0, y: 1 },
      { x: 1, y: 0 },
    ]);
    expect(maze.getNeighbors(createPosition(1, 1), 2)).toEqual([
      { x: 3, y: 1 },
      { x: 1, y: 3 },
    ]);
  });
});
