/**
 * Generators module - maze carving strategies and their registry.
 */

import type { GeneratorName } from "@mazeworks/contracts";
import { createIterativeGenerator } from "./iterative";
import { createRecursiveGenerator } from "./recursive";
import type {
  MazeGenerator,
  RecursiveGeneratorOptions,
  StrategyInfo,
} from "./types";

export { BacktrackingGenerator } from "./base";
export {
  carvePassage,
  countCarvableCells,
  ensureExit,
  initializeGrid,
  STRIDE_DIRECTIONS,
} from "./carving";
export { createIterativeGenerator, IterativeBacktrackGenerator } from "./iterative";
export { createRecursiveGenerator, RecursiveBacktrackGenerator } from "./recursive";
export type {
  GeneratorOptions,
  MazeGenerator,
  RecursiveGeneratorOptions,
  StrategyInfo,
} from "./types";

const factories: Record<
  GeneratorName,
  (options: RecursiveGeneratorOptions) => MazeGenerator
> = {
  iterative: createIterativeGenerator,
  recursive: createRecursiveGenerator,
};

/**
 * Create a generator by name. Options a strategy does not use are ignored.
 */
export function createGenerator(
  name: GeneratorName,
  options: RecursiveGeneratorOptions = {},
): MazeGenerator {
  return factories[name](options);
}

/**
 * Registered generators with their display names.
 */
export function getAvailableGenerators(): StrategyInfo<GeneratorName>[] {
  return Object.values(factories).map((factory) => {
    const { id, name, description } = factory({});
    return { id, name, description };
  });
}
