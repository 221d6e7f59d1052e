import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CellKind,
  classify,
  createPosition,
  formatPosition,
  isPassable,
  manhattanDistance,
  MazeGrid,
  positionKey,
  positionsEqual,
} from "../src";

describe("MazeGrid", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts fully walled", () => {
    const grid = new MazeGrid(4, 3);
    expect(grid.width).toBe(4);
    expect(grid.height).toBe(3);
    expect(grid.countCells(CellKind.WALL)).toBe(12);
  });

  it("fills with a non-wall initial kind", () => {
    const grid = new MazeGrid(2, 2, CellKind.EMPTY);
    expect(grid.countCells(CellKind.EMPTY)).toBe(4);
  });

  it("rejects negative or fractional dimensions", () => {
    expect(() => new MazeGrid(-1, 3)).toThrow(RangeError);
    expect(() => new MazeGrid(2.5, 3)).toThrow(RangeError);
    expect(new MazeGrid(0, 0).width).toBe(0);
  });

  it("reads and writes cells", () => {
    const grid = MazeGrid.walls(3, 3);
    grid.set(1, 1, CellKind.START);
    grid.setAt(createPosition(2, 1), CellKind.EMPTY);
    expect(grid.get(1, 1)).toBe(CellKind.START);
    expect(grid.getAt(createPosition(2, 1))).toBe(CellKind.EMPTY);
    expect(grid.isPassable(1, 1)).toBe(true);
    expect(grid.isPassable(0, 0)).toBe(false);
  });

  it("treats out-of-bounds reads as walls", () => {
    const grid = new MazeGrid(2, 2, CellKind.EMPTY);
    expect(grid.get(-1, 0)).toBe(CellKind.WALL);
    expect(grid.get(0, 2)).toBe(CellKind.WALL);
    expect(grid.isPassable(5, 5)).toBe(false);
  });

  it("drops out-of-bounds writes with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const grid = MazeGrid.walls(2, 2);
    grid.set(2, 0, CellKind.EMPTY);
    expect(grid.countCells(CellKind.WALL)).toBe(4);
    expect(warn).toHaveBeenCalledWith(
      "[Maze] MazeGrid.set: out of bounds (2, 0) for grid 2x2",
    );
  });

  it("counts passable neighbors", () => {
    const grid = MazeGrid.fromRows(["# #", "   ", "###"]);
    expect(grid.countPassableNeighbors4(1, 1)).toBe(3);
    expect(grid.countPassableNeighbors4(0, 1)).toBe(1);
    expect(grid.countPassableNeighbors4(1, 2)).toBe(1);
  });

  it("round-trips the text mapping", () => {
    const lines = ["#####", "#S. #", "### #", "#  E#", "#####"];
    const grid = MazeGrid.fromRows(lines);
    expect(grid.get(1, 1)).toBe(CellKind.START);
    expect(grid.get(2, 1)).toBe(CellKind.PATH);
    expect(grid.get(3, 3)).toBe(CellKind.END);
    expect(grid.toLines()).toEqual(lines);
  });

  it("rejects ragged rows and unknown characters", () => {
    expect(() => MazeGrid.fromRows(["###", "##"])).toThrow(
      "Row 1 has 2 cells, expected 3",
    );
    expect(() => MazeGrid.fromRows(["#X#"])).toThrow(
      "Unknown cell character 'X' at (1, 0)",
    );
  });

  it("exposes ordered rows of cells", () => {
    const rows = MazeGrid.fromRows(["#S", "E "]).rows();
    expect(rows).toHaveLength(2);
    expect(rows[0]?.[1]).toEqual({ position: { x: 1, y: 0 }, kind: CellKind.START });
    expect(rows[1]?.map((cell) => cell.kind)).toEqual([CellKind.END, CellKind.EMPTY]);
  });

  it("visits cells in row-major order", () => {
    const visited: string[] = [];
    MazeGrid.fromRows(["#S", "E "]).forEach((x, y, kind) => {
      visited.push(`${x},${y}:${kind}`);
    });
    expect(visited).toEqual(["0,0:0", "1,0:2", "0,1:3", "1,1:1"]);
  });

  it("clones independently", () => {
    const grid = MazeGrid.fromRows(["   "]);
    const copy = grid.clone();
    copy.set(0, 0, CellKind.WALL);
    expect(grid.get(0, 0)).toBe(CellKind.EMPTY);
    expect(copy.get(0, 0)).toBe(CellKind.WALL);
  });

  it("hands out raw data copies", () => {
    const grid = MazeGrid.fromRows(["S E"]);
    const data = grid.getRawDataCopy();
    data[1] = CellKind.WALL;
    expect(Array.from(grid.getRawDataCopy())).toEqual([2, 1, 3]);
  });
});

describe("cells", () => {
  it("classifies every kind and only walls block", () => {
    const cells = MazeGrid.fromRows(["# SE."]).rows()[0] ?? [];
    expect(cells.map(classify)).toEqual([
      CellKind.WALL,
      CellKind.EMPTY,
      CellKind.START,
      CellKind.END,
      CellKind.PATH,
    ]);
    expect(cells.map(isPassable)).toEqual([false, true, true, true, true]);
  });
});

describe("positions", () => {
  it("compares, keys and formats", () => {
    const a = createPosition(2, 3);
    expect(Object.isFrozen(a)).toBe(true);
    expect(positionsEqual(a, { x: 2, y: 3 })).toBe(true);
    expect(positionsEqual(a, { x: 3, y: 2 })).toBe(false);
    expect(positionKey(a, 10)).toBe(32);
    expect(manhattanDistance(a, createPosition(5, 1))).toBe(5);
    expect(formatPosition(a)).toBe("(2, 3)");
  });
});
