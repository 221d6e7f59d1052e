/**
 * Maze Preview Script
 *
 * Usage:
 *   npm run preview -- [options]
 *
 * Options:
 *   --width, -w <n>        Maze width (default: 21)
 *   --height, -h <n>       Maze height (default: 21)
 *   --size <preset>        Size preset xs, s, m, l, xl or "W H"
 *   --generator, -g <alg>  iterative, recursive (prefixes accepted)
 *   --pathfinder, -p <alg> bfs, astar, dijkstra, deadend (prefixes accepted)
 *   --seed, -s <n>         Seed for generation (default: random)
 *   --export, -o <file>    Write the maze; .json writes a record, anything else text
 *   --no-solve             Skip solving
 *   --simple               ASCII charset instead of unicode blocks
 *   --no-color             Disable ANSI colors
 *   --help                 Show this help
 *
 * Examples:
 *   npm run preview -- --size m --seed 12345
 *   npm run preview -- --generator rec --pathfinder a --width 31 --height 21
 *   npm run preview -- --seed 7 --export maze.json
 */

import { writeFileSync } from "node:fs";
import {
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  type BuildConfigInput,
  parseSizeInput,
} from "@mazeworks/contracts";
import {
  computeStats,
  createMaze,
  DEFAULT_CHARSET,
  renderAscii,
  SIMPLE_CHARSET,
  toRecord,
  toText,
} from "../src";

// =============================================================================
// CLI PARSING
// =============================================================================

interface Options {
  width: number;
  height: number;
  size?: string;
  generator?: string;
  pathfinder?: string;
  seed?: number;
  exportPath?: string;
  solve: boolean;
  simple: boolean;
  color: boolean;
  help: boolean;
}

function parseInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer, got ${value ?? "nothing"}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function parseArgs(args: readonly string[]): Options {
  const options: Options = {
    width: DEFAULT_WIDTH,
    height: DEFAULT_HEIGHT,
    solve: true,
    simple: false,
    color: process.stdout.isTTY === true,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--width":
      case "-w":
        options.width = parseInteger(arg, next);
        i++;
        break;
      case "--height":
      case "-h":
        options.height = parseInteger(arg, next);
        i++;
        break;
      case "--size":
        options.size = requireValue(arg, next);
        i++;
        break;
      case "--generator":
      case "-g":
        options.generator = requireValue(arg, next);
        i++;
        break;
      case "--pathfinder":
      case "-p":
        options.pathfinder = requireValue(arg, next);
        i++;
        break;
      case "--seed":
      case "-s":
        options.seed = parseInteger(arg, next);
        i++;
        break;
      case "--export":
      case "-o":
        options.exportPath = requireValue(arg, next);
        i++;
        break;
      case "--no-solve":
        options.solve = false;
        break;
      case "--simple":
        options.simple = true;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--help":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Maze Preview Script

Usage:
  npm run preview -- [options]

Options:
  --width, -w <n>         Maze width (default: ${DEFAULT_WIDTH})
  --height, -h <n>        Maze height (default: ${DEFAULT_HEIGHT})
  --size <preset>         Size preset xs, s, m, l, xl or "W H"
  --generator, -g <alg>   iterative, recursive (prefixes accepted)
  --pathfinder, -p <alg>  bfs, astar, dijkstra, deadend (prefixes accepted)
  --seed, -s <n>          Seed for generation (default: random)
  --export, -o <file>     Write the maze; .json writes a record, anything else text
  --no-solve              Skip solving
  --simple                ASCII charset instead of unicode blocks
  --no-color              Disable ANSI colors
  --help                  Show this help
`);
}

// =============================================================================
// COLORS
// =============================================================================

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
};

function c(color: keyof typeof colors, text: string, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

// =============================================================================
// MAIN
// =============================================================================

function main(): number {
  let options: Options;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`[Preview] ${error instanceof Error ? error.message : String(error)}`);
    showHelp();
    return 1;
  }

  if (options.help) {
    showHelp();
    return 0;
  }

  let { width, height } = options;
  if (options.size !== undefined) {
    const size = parseSizeInput(options.size);
    if (size.isErr()) {
      console.error(`[Preview] ${size.error.code}: ${size.error.message}`);
      return 1;
    }
    ({ width, height } = size.value);
  }

  const input: BuildConfigInput = {
    width,
    height,
    generator: options.generator,
    pathfinder: options.pathfinder,
    seed: options.seed,
  };

  const started = performance.now();
  const created = createMaze(input);
  if (created.isErr()) {
    console.error(`[Preview] ${created.error.code}: ${created.error.message}`);
    return 1;
  }
  const maze = created.value;
  const generatedIn = performance.now() - started;

  console.log(c("bold", "\nMaze Preview", options.color));
  console.log(c("dim", "─".repeat(40), options.color));
  console.log(`  Generator:  ${c("cyan", maze.generator.name, options.color)}`);
  console.log(`  Pathfinder: ${c("cyan", maze.pathfinder.name, options.color)}`);
  console.log(
    `  Dimensions: ${c("cyan", `${maze.width}x${maze.height}`, options.color)}`,
  );
  console.log(
    `  Seed:       ${c("cyan", options.seed?.toString() ?? "random", options.color)}`,
  );
  console.log(`  Generated in ${c("yellow", formatDuration(generatedIn), options.color)}`);

  if (options.solve) {
    const solveStarted = performance.now();
    const path = maze.solve();
    const solvedIn = performance.now() - solveStarted;
    if (path === null) {
      console.log(`  ${c("red", "No solution found", options.color)}`);
    } else {
      console.log(
        `  ${c("green", "✓", options.color)} Solved in ${c("yellow", formatDuration(solvedIn), options.color)} (${path.length} steps)`,
      );
    }
  }

  console.log(
    `\n${renderAscii(maze.grid, {
      charset: options.simple ? SIMPLE_CHARSET : DEFAULT_CHARSET,
      path: maze.solutionPath ?? undefined,
      useColors: options.color,
      doubleWidth: true,
    })}\n`,
  );

  const stats = computeStats(maze.grid, maze.solutionPath);
  console.log(c("dim", "─".repeat(40), options.color));
  console.log(`  Total cells: ${stats.totalCells}`);
  console.log(`  Walls:       ${stats.wallCells} (${percent(stats.wallRatio)})`);
  console.log(`  Open:        ${stats.openCells} (${percent(stats.openRatio)})`);
  if (stats.pathEfficiency !== null) {
    console.log(`  Path efficiency: ${percent(stats.pathEfficiency)}`);
  }

  if (options.exportPath !== undefined) {
    const contents = options.exportPath.endsWith(".json")
      ? `${JSON.stringify(toRecord(maze), null, 2)}\n`
      : toText(maze, { includeSolution: maze.solutionPath !== null });
    writeFileSync(options.exportPath, contents);
    console.log(
      `  ${c("dim", "→", options.color)} ${c("cyan", options.exportPath, options.color)}`,
    );
  }

  return 0;
}

process.exitCode = main();
