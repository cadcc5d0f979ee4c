/**
 * Cashflow Engine — Pipeline
 *
 * validate → expand depreciation → check run settings → resolve order →
 * lifetime tables → project tables → indicators
 *
 * Every call recomputes from the immutable definition and the variables
 * snapshot it is given; nothing is cached between runs.
 */

import type {
  Arithmetic,
  CashflowId,
  CashflowTables,
  Component,
  ProjectDefinition,
  Variables,
} from "@/lib/cashflowModel";
import { checkRunSettings, numberArithmetic, validateComponents } from "@/lib/cashflowModel";
import type { ServerEnv } from "@/lib/env/server";
import { serverEnv } from "@/lib/env/server";
import type { CashflowLogger } from "./logger";
import { consoleLogger } from "./logger";
import { requiredComponents, resolveEvaluationOrder } from "./dependencyResolver";
import { computeLifetimeTables } from "./lifetime";
import type { DepreciationLookup } from "./depreciation";
import { defaultDepreciationLookup, withDepreciationLegs } from "./depreciation";
import { projectCashflows, projectHorizon } from "./projection";
import type { IndicatorResults } from "./indicators";
import { activeEntries, computeIndicators, freeCashFlowToFirm, netPresentValue } from "./indicators";

export interface PipelineOptions {
  depreciationLookup?: DepreciationLookup;
  logger?: CashflowLogger;
  /** Defaults to serverEnv() */
  env?: ServerEnv;
}

export interface TableOptions<T> extends PipelineOptions {
  arithmetic: Arithmetic<T>;
}

export interface CashflowTablesResult<T> {
  horizon: number;
  order: CashflowId[];
  /** Components after depreciation expansion, restricted to those evaluated */
  components: Component[];
  lifetimeTables: Map<CashflowId, T[]>;
  projectTables: CashflowTables<T>;
  /** Active free cash flow per project year */
  fcff: T[];
  NPV: T;
}

export interface CashflowAnalysisResult extends IndicatorResults {
  horizon: number;
  order: CashflowId[];
  /** Present when settings.output is true */
  projectCashflows?: CashflowTables<number>;
}

function resolveLogger(options: PipelineOptions): { logger: CashflowLogger; env: ServerEnv } {
  const env = options.env ?? serverEnv();
  return { env, logger: options.logger ?? consoleLogger("cashflowEngine", env.CASHFLOW_LOG_LEVEL) };
}

function runTables<T>(
  definition: ProjectDefinition,
  variables: Variables<T>,
  arith: Arithmetic<T>,
  lookup: DepreciationLookup,
  logger: CashflowLogger,
): CashflowTablesResult<T> {
  const { settings } = definition;

  validateComponents(definition.components);
  const expanded = withDepreciationLegs(definition.components, lookup);
  validateComponents(expanded);
  checkRunSettings(settings, expanded);

  const components = requiredComponents(settings, expanded);
  const order = resolveEvaluationOrder(components, variables);
  logger.debug("evaluation order resolved", { order });

  const lifetimeTables = computeLifetimeTables(arith, components, order, variables);

  const horizon = projectHorizon(settings, expanded);
  logger.info("project horizon", { horizon, explicit: settings.projectTime !== undefined });

  const projectTables = projectCashflows(arith, settings, components, lifetimeTables, horizon, { logger });
  const fcff = freeCashFlowToFirm(arith, activeEntries(settings, components, projectTables), horizon);

  return {
    horizon,
    order,
    components,
    lifetimeTables,
    projectTables,
    fcff,
    NPV: netPresentValue(arith, fcff, settings.discountRate),
  };
}

/**
 * Lifetime and project tables over any arithmetic, e.g. symbolicArithmetic
 * to hand the cash flows to an external optimizer.
 */
export function buildCashflowTables<T>(
  definition: ProjectDefinition,
  variables: Variables<T>,
  options: TableOptions<T>,
): CashflowTablesResult<T> {
  const { logger } = resolveLogger(options);
  return runTables(
    definition,
    variables,
    options.arithmetic,
    options.depreciationLookup ?? defaultDepreciationLookup,
    logger,
  );
}

/** Run the full numeric analysis and return the requested indicators. */
export function runCashflowAnalysis(
  definition: ProjectDefinition,
  variables: Variables<number> = {},
  options: PipelineOptions = {},
): CashflowAnalysisResult {
  const { logger, env } = resolveLogger(options);
  const tables = runTables(
    definition,
    variables,
    numberArithmetic,
    options.depreciationLookup ?? defaultDepreciationLookup,
    logger,
  );

  const indicators = computeIndicators(definition.settings, tables.components, tables.projectTables, tables.horizon, {
    irrMaxIterations: env.CASHFLOW_IRR_MAX_ITERATIONS,
    npvSearchTolerance: env.CASHFLOW_NPV_SEARCH_TOLERANCE,
    logger,
  });

  return {
    ...indicators,
    horizon: tables.horizon,
    order: tables.order,
    ...(definition.settings.output ? { projectCashflows: tables.projectTables } : {}),
  };
}
