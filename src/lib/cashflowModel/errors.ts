/**
 * Cashflow Model — Error Taxonomy
 *
 * Three families, each with a stable code:
 * - ConfigurationError: bad or missing definitions, raised before any computation
 * - DependencyError: driver graph problems, raised while building the evaluation order
 * - ComputationError: internal shape/index defects, always fatal
 *
 * IRR root-finding failure is NOT an error; see IRR_NO_SOLUTION in the indicator engine.
 */

export type CashflowErrorCode =
  | "CONFIG_INVALID"
  | "CONFIG_MISSING_PARAMETER"
  | "CONFIG_LENGTH_MISMATCH"
  | "CONFIG_MISSING_MULTIPLIER"
  | "CONFIG_DRIVER_LENGTH"
  | "CONFIG_ACTIVE_NOT_FOUND"
  | "CONFIG_DUPLICATE_NAME"
  | "CONFIG_DEPRECIATION_SCHEME"
  | "DEPENDENCY_INVALID"
  | "DEPENDENCY_CYCLE"
  | "DEPENDENCY_LIFETIME_MISMATCH"
  | "DEPENDENCY_UNRESOLVED_DRIVER"
  | "COMPUTATION_DEFECT"
  | "COMPUTATION_PROJECTION_INDEX"
  | "COMPUTATION_EVALUATION_ORDER"
  | "COMPUTATION_INDICATOR";

export class CashflowError extends Error {
  readonly code: CashflowErrorCode;

  constructor(code: CashflowErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = new.target.name;
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigurationError extends CashflowError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], code: CashflowErrorCode = "CONFIG_INVALID") {
    super(code, message);
    this.issues = issues;
  }
}

export class MissingCashflowParameterError extends ConfigurationError {
  constructor(
    readonly cashflow: string,
    readonly missing: string[],
  ) {
    super(
      `CashFlow "${cashflow}" is missing required parameter(s): ${missing.join(", ")}`,
      missing,
      "CONFIG_MISSING_PARAMETER",
    );
  }
}

export class CashflowLengthError extends ConfigurationError {
  constructor(
    readonly cashflow: string,
    readonly parameter: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `CashFlow "${cashflow}" parameter "${parameter}" has ${actual} entries, expected ${expected}`,
      [parameter],
      "CONFIG_LENGTH_MISMATCH",
    );
  }
}

export class MissingMultiplierError extends ConfigurationError {
  constructor(
    readonly component: string,
    readonly multiplier: string,
  ) {
    super(
      `multiplier "${multiplier}" required for Component "${component}" but not found among variables`,
      [multiplier],
      "CONFIG_MISSING_MULTIPLIER",
    );
  }
}

export class DriverLengthMismatchError extends ConfigurationError {
  constructor(
    readonly component: string,
    readonly cashflow: string,
    readonly driver: string,
    readonly entries: number,
    readonly lifetime: number,
  ) {
    super(
      `Component "${component}" CashFlow "${cashflow}" driver variable "${driver}" has ${entries} entries, ` +
        `but "${component}" has a lifetime of ${lifetime} (expected 1 or ${lifetime + 1})`,
      [driver],
      "CONFIG_DRIVER_LENGTH",
    );
  }
}

export class ActiveCashflowNotFoundError extends ConfigurationError {
  constructor(readonly pair: string, options: string[]) {
    super(
      `Requested active cash flow "${pair}" was not found. Options are: ${options.join(", ")}`,
      [pair],
      "CONFIG_ACTIVE_NOT_FOUND",
    );
  }
}

export class DuplicateNameError extends ConfigurationError {
  constructor(
    readonly kind: "Component" | "CashFlow",
    readonly duplicate: string,
  ) {
    super(`${kind} names need to be unique; "${duplicate}" appears more than once`, [duplicate], "CONFIG_DUPLICATE_NAME");
  }
}

export class DepreciationSchemeError extends ConfigurationError {
  constructor(message: string) {
    super(message, [], "CONFIG_DEPRECIATION_SCHEME");
  }
}

// ---------------------------------------------------------------------------
// Dependency graph
// ---------------------------------------------------------------------------

export class DependencyError extends CashflowError {
  constructor(message: string, code: CashflowErrorCode = "DEPENDENCY_INVALID") {
    super(code, message);
  }
}

export class CyclicDependencyError extends DependencyError {
  constructor(readonly cycle: string[]) {
    super(`driver cycle detected: ${cycle.join(" -> ")}`, "DEPENDENCY_CYCLE");
  }
}

export class LifetimeMismatchError extends DependencyError {
  constructor(
    readonly dependent: string,
    readonly driverComponent: string,
  ) {
    super(
      `Lifetimes for Component "${dependent}" and cross-referenced Component "${driverComponent}" do not match, ` +
        "so no cross-reference is possible",
      "DEPENDENCY_LIFETIME_MISMATCH",
    );
  }
}

export class UnresolvedDriverError extends DependencyError {
  constructor(
    readonly component: string,
    readonly cashflow: string,
    readonly driver: string,
  ) {
    super(
      `Component "${component}" CashFlow "${cashflow}" driver "${driver}" was not found among variables or other cash flows`,
      "DEPENDENCY_UNRESOLVED_DRIVER",
    );
  }
}

// ---------------------------------------------------------------------------
// Computation defects
// ---------------------------------------------------------------------------

export class ComputationError extends CashflowError {
  constructor(message: string, code: CashflowErrorCode = "COMPUTATION_DEFECT") {
    super(code, message);
  }
}

export class ProjectionIndexError extends ComputationError {
  constructor(component: string, cashflow: string, index: number, length: number) {
    super(
      `lifetime index ${index} out of range [0, ${length - 1}] while projecting ${component}|${cashflow}`,
      "COMPUTATION_PROJECTION_INDEX",
    );
  }
}

export class EvaluationOrderError extends ComputationError {
  constructor(dependent: string, missing: string) {
    super(`"${dependent}" was evaluated before its driver "${missing}"`, "COMPUTATION_EVALUATION_ORDER");
  }
}

export class IndicatorFailureError<P = unknown> extends ComputationError {
  constructor(
    readonly indicator: string,
    readonly partial: P,
    readonly reason: unknown,
  ) {
    super(
      `indicator ${indicator} failed: ${reason instanceof Error ? reason.message : String(reason)}`,
      "COMPUTATION_INDICATOR",
    );
  }
}
