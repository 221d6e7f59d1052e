import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Resolve a typed algorithm name against the available ones.
 *
 * Matching is case-insensitive: an exact match wins, otherwise a unique
 * prefix is accepted ("dij" → "dijkstra").
 */
export function resolveAlgorithmName<T extends string>(
  input: string,
  available: readonly T[],
): Result<T, MazeError> {
  const needle = input.trim().toLowerCase();
  if (needle.length === 0) {
    return Err(MazeError.configInvalid("Algorithm choice cannot be empty"));
  }

  const exact = available.find((name) => name.toLowerCase() === needle);
  if (exact !== undefined) return Ok(exact);

  const matches = available.filter((name) =>
    name.toLowerCase().startsWith(needle),
  );
  const [only] = matches;
  if (matches.length === 1 && only !== undefined) return Ok(only);

  if (matches.length > 1) {
    return Err(
      MazeError.algorithmAmbiguous(
        `Ambiguous choice '${needle}'. Could be: ${matches.join(", ")}`,
        { input: needle, matches },
      ),
    );
  }

  return Err(
    MazeError.algorithmNotFound(
      `Unknown algorithm '${needle}'. Available: ${available.join(", ")}`,
      { input: needle, available: [...available] },
    ),
  );
}
