/**
 * Limits and defaults shared by the config layer and the generators.
 */

export const MIN_DIMENSION = 3;
export const MAX_DIMENSION = 200;
export const MAX_AREA = 40_000;

/** Above this area the recursive generator logs a warning. */
export const RECURSION_WARNING_AREA = 10_000;

/**
 * Maximum number of carvable (odd, odd) cells the recursive generator
 * accepts. Each carved cell costs one stack frame.
 */
export const MAX_RECURSION_CELLS = 4_096;

export const DEFAULT_WIDTH = 21;
export const DEFAULT_HEIGHT = 21;

export const UINT32_MAX = 0xffffffff;

/**
 * Named sizes accepted wherever a size is typed in.
 */
export const SIZE_PRESETS = {
  xs: [9, 9],
  s: [11, 11],
  m: [21, 11],
  l: [31, 21],
  xl: [41, 31],
} as const satisfies Record<string, readonly [number, number]>;

export type SizePreset = keyof typeof SIZE_PRESETS;
