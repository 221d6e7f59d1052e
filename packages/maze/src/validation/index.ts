export { type MazeStats, computeStats } from "./compute-stats";
export {
  hasErrorViolations,
  type PathValidationResult,
  type ValidationFailure,
  type ValidationSuccess,
  type Violation,
} from "./result-types";
export { analyzeTopology, type TopologyReport } from "./topology";
export { validatePath } from "./validate-path";
