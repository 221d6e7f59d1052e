import type { Position } from "./types";

/**
 * 4-directional unit steps in the order every search expands them:
 * right, down, left, up.
 */
export const DIRECTIONS_4 = [
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
] as const;

export function createPosition(x: number, y: number): Position {
  return Object.freeze({ x, y });
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Numeric identity of a position inside a grid of the given width.
 */
export function positionKey(p: Position, width: number): number {
  return p.y * width + p.x;
}

export function manhattanDistance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function formatPosition(p: Position): string {
  return `(${p.x}, ${p.y})`;
}
