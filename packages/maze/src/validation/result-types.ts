/**
 * A single problem found while checking a path or a grid.
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}

export interface ValidationSuccess {
  readonly success: true;
  readonly violations: readonly Violation[];
}

/**
 * Contains at least one error-level violation.
 */
export interface ValidationFailure {
  readonly success: false;
  readonly violations: readonly Violation[];
}

/**
 * Use `if (result.success)` to narrow.
 */
export type PathValidationResult = ValidationSuccess | ValidationFailure;

export function hasErrorViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}
