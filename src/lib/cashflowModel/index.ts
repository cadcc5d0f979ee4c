/**
 * Cashflow Model — Public API
 *
 * Immutable project definitions and the error taxonomy shared by the
 * cashflow engine. Pure data: no evaluation happens here.
 */

export type {
  ActivePair,
  AmortizorCashFlow,
  AmortizorRole,
  CapexCashFlow,
  CashFlow,
  CashFlowKind,
  CashflowId,
  CashflowRef,
  CashflowTables,
  Component,
  DepreciationDescriptor,
  DriverSpec,
  GlobalSettings,
  IndicatorName,
  InflationMode,
  MultiplierSpec,
  ParamValue,
  ProjectDefinition,
  RecurringCashFlow,
  VariableValue,
  Variables,
} from "./types";
export { INDICATOR_NAMES } from "./types";

export type { Arithmetic } from "./arithmetic";
export { numberArithmetic, sumSeries } from "./arithmetic";

export type { Expr, ExprOp } from "./expression";
export {
  constant,
  variable,
  symbolicArithmetic,
  evaluateExpression,
  renderExpression,
  expressionVariables,
} from "./expression";

export type { CapexInput, RecurringInput } from "./definitions";
export {
  activeComponents,
  cashflowId,
  computeIntrayearCashflow,
  computeYearlyCashflow,
  countMultTargets,
  createCapex,
  createComponent,
  createGlobalSettings,
  createRecurring,
  describeDriver,
  findCashflow,
  isActiveCashflow,
  isCashflowRef,
  parseCashflowId,
  requiredParameterNames,
  toDriverSpec,
  toMultiplierSpec,
  withCashflows,
} from "./definitions";

export { checkRunSettings, validateCashflow, validateComponents } from "./validation";

export type { ProjectDefinitionInput } from "./schema";
export {
  CashFlowSchema,
  ComponentSchema,
  GlobalSettingsSchema,
  ProjectDefinitionSchema,
  parseProjectDefinition,
  projectDefinitionJsonSchema,
} from "./schema";

export type { CashflowErrorCode } from "./errors";
export {
  ActiveCashflowNotFoundError,
  CashflowError,
  CashflowLengthError,
  ComputationError,
  ConfigurationError,
  CyclicDependencyError,
  DependencyError,
  DepreciationSchemeError,
  DriverLengthMismatchError,
  DuplicateNameError,
  EvaluationOrderError,
  IndicatorFailureError,
  LifetimeMismatchError,
  MissingCashflowParameterError,
  MissingMultiplierError,
  ProjectionIndexError,
  UnresolvedDriverError,
} from "./errors";
