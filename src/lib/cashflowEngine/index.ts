/**
 * Cashflow Engine — Public API
 */

export type { CashflowLogger, LogMeta } from "./logger";
export { consoleLogger, recordingLogger, silentLogger } from "./logger";

export { isSeries, requiredComponents, resolveEvaluationOrder, variableLength } from "./dependencyResolver";

export type { ExtendedParameters, LifetimeTables } from "./lifetime";
export { computeLifetime, computeLifetimeTables, extendParameters } from "./lifetime";

export type { DepreciationLookup } from "./depreciation";
export {
  creditLegName,
  defaultDepreciationLookup,
  depreciationLegName,
  expandDepreciation,
  withDepreciationLegs,
} from "./depreciation";

export type { ProjectionOptions } from "./projection";
export {
  inflationFactor,
  lcm,
  projectCashflows,
  projectHorizon,
  projectLifetimeTable,
  taxFactor,
} from "./projection";

export type { IndicatorOptions, IndicatorResults, IrrOptions, NpvSearchOptions, ProjectedEntry } from "./indicators";
export {
  IRR_NO_SOLUTION,
  activeEntries,
  computeIndicators,
  freeCashFlowToFirm,
  internalRateOfReturn,
  netPresentValue,
  npvSearch,
  profitabilityIndex,
} from "./indicators";

export type { CashflowAnalysisResult, CashflowTablesResult, PipelineOptions, TableOptions } from "./runAnalysis";
export { buildCashflowTables, runCashflowAnalysis } from "./runAnalysis";
