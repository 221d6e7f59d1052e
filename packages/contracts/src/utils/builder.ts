import { DEFAULT_HEIGHT, DEFAULT_WIDTH } from "../constants";
import { MazeConfigSchema, type ValidatedMazeConfig } from "../schemas/maze";
import { MazeError } from "../types/error";
import {
  GENERATOR_NAMES,
  type GeneratorName,
  PATHFINDER_NAMES,
  type PathfinderName,
} from "../types/maze";
import { Err, Ok, type Result } from "../types/result";
import { resolveAlgorithmName } from "./names";

/**
 * Loose config input: algorithm names may be prefixes, everything but the
 * values to override may be omitted.
 */
export interface BuildConfigInput {
  readonly width?: number;
  readonly height?: number;
  readonly generator?: string;
  readonly pathfinder?: string;
  readonly seed?: number;
}

export const DEFAULT_GENERATOR: GeneratorName = "iterative";
export const DEFAULT_PATHFINDER: PathfinderName = "bfs";

function codeForIssue(path: readonly PropertyKey[], message: string): MazeError {
  const field = path[0];
  if (field === "seed") {
    return MazeError.seedInvalid(message);
  }
  if ((field === "width" || field === "height") && /at least/.test(message)) {
    return MazeError.dimensionTooSmall(message);
  }
  if ((field === "width" || field === "height") && /exceed/.test(message)) {
    return MazeError.dimensionTooLarge(message);
  }
  return MazeError.configInvalid(message);
}

/**
 * Apply defaults, resolve algorithm names and validate.
 *
 * The first failing check decides the error code; every zod issue is kept
 * in `details.issues`.
 */
export function buildMazeConfig(
  input: BuildConfigInput = {},
): Result<ValidatedMazeConfig, MazeError> {
  const generator = resolveAlgorithmName(
    input.generator ?? DEFAULT_GENERATOR,
    GENERATOR_NAMES,
  );
  if (generator.isErr()) return Err(generator.error);

  const pathfinder = resolveAlgorithmName(
    input.pathfinder ?? DEFAULT_PATHFINDER,
    PATHFINDER_NAMES,
  );
  if (pathfinder.isErr()) return Err(pathfinder.error);

  const parsed = MazeConfigSchema.safeParse({
    width: input.width ?? DEFAULT_WIDTH,
    height: input.height ?? DEFAULT_HEIGHT,
    generator: generator.value,
    pathfinder: pathfinder.value,
    seed: input.seed,
  });

  if (!parsed.success) {
    const [first] = parsed.error.issues;
    const error = first
      ? codeForIssue(first.path, first.message)
      : MazeError.configInvalid("Invalid maze configuration");
    return Err(
      new MazeError(error.code, error.message, {
        issues: parsed.error.issues,
      }),
    );
  }

  return Ok(parsed.data);
}
