import { describe, expect, it } from "vitest";
import { createMaze, type Maze, parseMazeRecord, toRecord, toText } from "../src";

function seededMaze(): Maze {
  return createMaze({ width: 5, height: 5, seed: 1 }).getOrThrow();
}

describe("toText", () => {
  it("writes the header and the grid", () => {
    expect(toText(seededMaze())).toBe(
      "Maze 5x5\nStart: (1, 1)\nEnd: (3, 3)\n\n#####\n#S# #\n# # #\n#  E#\n#####\n",
    );
  });

  it("overlays the solution without touching the terminals", () => {
    const maze = seededMaze();
    maze.solve();
    const lines = toText(maze, { includeSolution: true }).split("\n");
    expect(lines.slice(4, 9)).toEqual(["#####", "#S# #", "#.# #", "#..E#", "#####"]);
  });

  it("ignores the overlay flag while unsolved", () => {
    const maze = seededMaze();
    expect(toText(maze, { includeSolution: true })).toBe(toText(maze));
  });
});

describe("toRecord", () => {
  it("captures grid, terminals and solution", () => {
    const maze = seededMaze();
    expect(toRecord(maze).solutionPath).toBeNull();

    maze.solve();
    const record = toRecord(maze);
    expect(record.width).toBe(5);
    expect(record.start).toEqual({ x: 1, y: 1 });
    expect(record.end).toEqual({ x: 3, y: 3 });
    expect(record.grid[1]).toEqual(["#", "S", "#", " ", "#"]);
    expect(record.solutionPath).toEqual([
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 1, y: 3 },
      { x: 2, y: 3 },
      { x: 3, y: 3 },
    ]);
  });
});

describe("parseMazeRecord", () => {
  it("rebuilds a maze from JSON text", () => {
    const maze = seededMaze();
    maze.solve();
    const result = parseMazeRecord(JSON.stringify(toRecord(maze)));
    if (!result.success) throw new Error("unexpected error");

    const loaded = result.value;
    expect(loaded.grid.toLines()).toEqual(maze.grid.toLines());
    expect(loaded.start).toEqual({ x: 1, y: 1 });
    expect(loaded.solutionPath).toHaveLength(5);
    expect(toText(loaded, { includeSolution: true })).toBe(
      toText(maze, { includeSolution: true }),
    );
  });

  it("accepts an already parsed record", () => {
    const record = toRecord(seededMaze());
    expect(parseMazeRecord(record).isOk()).toBe(true);
  });

  it("rejects malformed JSON", () => {
    const result = parseMazeRecord("{ not json");
    expect(result.error.code).toBe("RECORD_INVALID");
    expect(result.error.message).toBe("Record is not valid JSON");
  });

  it("rejects records that fail validation", () => {
    const record = { ...toRecord(seededMaze()), height: 6 };
    const result = parseMazeRecord(record);
    expect(result.error.code).toBe("RECORD_INVALID");
    expect(result.error.message).toBe("Expected 6 rows, found 5");
  });
});
