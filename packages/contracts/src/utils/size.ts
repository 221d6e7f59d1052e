import {
  MAX_AREA,
  MAX_DIMENSION,
  MIN_DIMENSION,
  SIZE_PRESETS,
  type SizePreset,
} from "../constants";
import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

export interface MazeSize {
  readonly width: number;
  readonly height: number;
}

function isSizePreset(value: string): value is SizePreset {
  return Object.hasOwn(SIZE_PRESETS, value);
}

/**
 * Check dimension limits. Odd-normalization happens later, in the maze itself.
 */
export function validateDimensions(
  width: number,
  height: number,
): Result<MazeSize, MazeError> {
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    return Err(
      MazeError.configInvalid("Width and height must be integers", {
        width,
        height,
      }),
    );
  }
  if (width < MIN_DIMENSION || height < MIN_DIMENSION) {
    return Err(
      MazeError.dimensionTooSmall(
        `Maze dimensions must be at least ${MIN_DIMENSION}x${MIN_DIMENSION}`,
        { width, height },
      ),
    );
  }
  if (width > MAX_DIMENSION || height > MAX_DIMENSION) {
    return Err(
      MazeError.dimensionTooLarge(
        `Maze dimensions cannot exceed ${MAX_DIMENSION}x${MAX_DIMENSION}`,
        { width, height },
      ),
    );
  }
  const area = width * height;
  if (area > MAX_AREA) {
    return Err(
      MazeError.dimensionTooLarge(
        `Maze area cannot exceed ${MAX_AREA} cells (current: ${area})`,
        { width, height, area },
      ),
    );
  }
  return Ok({ width, height });
}

/**
 * Parse a size typed by a user: a preset name (`xs`, `s`, `m`, `l`, `xl`)
 * or two integers separated by whitespace (`"21 11"`).
 */
export function parseSizeInput(input: string): Result<MazeSize, MazeError> {
  const text = input.trim().toLowerCase();
  if (text.length === 0) {
    return Err(MazeError.configInvalid("Input cannot be empty"));
  }

  if (isSizePreset(text)) {
    const [width, height] = SIZE_PRESETS[text];
    return Ok({ width, height });
  }

  const parts = text.split(/\s+/);
  const [first, second] = parts;
  if (parts.length !== 2 || first === undefined || second === undefined) {
    return Err(
      MazeError.configInvalid(
        "Custom dimensions must be in format 'width height' (e.g., '21 11')",
        { input },
      ),
    );
  }

  if (!/^-?\d+$/.test(first) || !/^-?\d+$/.test(second)) {
    return Err(
      MazeError.configInvalid("Width and height must be integers", { input }),
    );
  }

  return validateDimensions(Number.parseInt(first, 10), Number.parseInt(second, 10));
}
