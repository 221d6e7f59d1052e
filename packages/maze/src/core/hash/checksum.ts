/**
 * Grid checksum for determinism checks.
 *
 * Format: "v{version}:{16 hex chars}". The version changes whenever the
 * hashed content changes, so stored checksums are never compared across
 * incompatible versions.
 */

import type { ReadonlyMazeGrid } from "../grid/types";
import { createFNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

/**
 * Hash width, height and every cell byte of a grid.
 */
export function computeGridChecksum(grid: ReadonlyMazeGrid): string {
  const hash = createFNV64Hasher()
    .updateInt32(grid.width)
    .updateInt32(grid.height)
    .updateBytes(grid.getRawDataCopy())
    .digest();
  return `v${CHECKSUM_VERSION}:${hash}`;
}

/**
 * Split a checksum into version and hash; null when malformed.
 */
export function parseChecksum(
  checksum: string,
): { version: number; hash: string } | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return { version: Number.parseInt(match[1], 10), hash: match[2] };
}
