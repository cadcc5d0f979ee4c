/**
 * Cashflow Engine — Indicators
 *
 * FCFF[y]  = Σ active projected values in year y (mult_target ones scaled by m)
 * NPV      = Σ FCFF[y] / (1 + discountRate)^y
 * IRR      = rate r with Σ FCFF[y] / (1 + r)^y = 0, or IRR_NO_SOLUTION
 * PI       = -NPV / FCFF[0]
 * NPV_mult = (target - NPV_others) / NPV_multTargets   (NPV is linear in m)
 */

import type {
  Arithmetic,
  CashflowTables,
  Component,
  GlobalSettings,
  IndicatorName,
} from "@/lib/cashflowModel";
import {
  ComputationError,
  IndicatorFailureError,
  isActiveCashflow,
  numberArithmetic,
  sumSeries,
} from "@/lib/cashflowModel";
import type { CashflowLogger } from "./logger";
import { silentLogger } from "./logger";

/** Reported as IRR when no real root is found. */
export const IRR_NO_SOLUTION = -10;

export interface ProjectedEntry<T> {
  component: string;
  cashflow: string;
  multTarget: boolean;
  values: readonly T[];
}

export interface IndicatorResults {
  NPV?: number;
  IRR?: number;
  PI?: number;
  NPV_mult?: number;
}

// ---------------------------------------------------------------------------
// Aggregation (generic)
// ---------------------------------------------------------------------------

/** Projected series of every active cash flow, in declaration order. */
export function activeEntries<T>(
  settings: GlobalSettings,
  components: readonly Component[],
  tables: CashflowTables<T>,
): ProjectedEntry<T>[] {
  const entries: ProjectedEntry<T>[] = [];
  for (const comp of components) {
    for (const cf of comp.cashflows) {
      if (!isActiveCashflow(settings, comp.name, cf)) continue;
      const values = tables[comp.name]?.[cf.name];
      if (!values) throw new ComputationError(`no project table for active cash flow ${comp.name}|${cf.name}`);
      entries.push({ component: comp.name, cashflow: cf.name, multTarget: cf.multTarget, values });
    }
  }
  return entries;
}

export function freeCashFlowToFirm<T>(
  arith: Arithmetic<T>,
  entries: readonly ProjectedEntry<T>[],
  horizon: number,
  multiplier: T = arith.one,
): T[] {
  return Array.from({ length: horizon }, (_, y) =>
    sumSeries(
      arith,
      entries.map((e) => {
        const v = e.values[y] ?? arith.zero;
        return e.multTarget ? arith.mul(multiplier, v) : v;
      }),
    ),
  );
}

export function netPresentValue<T>(arith: Arithmetic<T>, series: readonly T[], rate: number): T {
  const base = arith.lift(1 + rate);
  return sumSeries(
    arith,
    series.map((v, y) => (y === 0 ? v : arith.div(v, arith.pow(base, arith.lift(y))))),
  );
}

// ---------------------------------------------------------------------------
// Numeric indicators
// ---------------------------------------------------------------------------

export interface IrrOptions {
  maxIterations?: number;
  guess?: number;
  logger?: CashflowLogger;
}

const npvAt = (series: readonly number[], rate: number) => netPresentValue(numberArithmetic, series, rate);

/**
 * Newton-Raphson from `guess`, then bisection over [-0.99, 10].
 * Returns IRR_NO_SOLUTION when neither finds a root, or when every entry
 * of the series is 0.
 */
export function internalRateOfReturn(series: readonly number[], options: IrrOptions = {}): number {
  const maxIter = options.maxIterations ?? 100;
  const logger = options.logger ?? silentLogger;
  if (series.every((v) => v === 0)) {
    logger.warn("IRR is undefined for an all-zero series; reporting sentinel", { sentinel: IRR_NO_SOLUTION });
    return IRR_NO_SOLUTION;
  }
  const df = (rate: number) => series.reduce((acc, cf, i) => acc - (i * cf) / Math.pow(1 + rate, i + 1), 0);

  let r = options.guess ?? 0.1;
  for (let i = 0; i < maxIter; i++) {
    const d = df(r);
    if (Math.abs(d) < 1e-12) break;
    const next = r - npvAt(series, r) / d;
    if (!Number.isFinite(next) || next <= -1) break;
    if (Math.abs(next - r) < 1e-10) return next;
    r = next;
  }

  let lo = -0.99;
  let hi = 10;
  let flo = npvAt(series, lo);
  const fhi = npvAt(series, hi);
  if (flo === 0) return lo;
  if (fhi === 0) return hi;
  if (flo * fhi < 0) {
    for (let i = 0; i < 200; i++) {
      const mid = (lo + hi) / 2;
      const fm = npvAt(series, mid);
      if (Math.abs(fm) < 1e-9 || hi - lo < 1e-12) return mid;
      if (flo * fm < 0) {
        hi = mid;
      } else {
        lo = mid;
        flo = fm;
      }
    }
  }

  logger.warn("IRR root finding failed; reporting sentinel", { sentinel: IRR_NO_SOLUTION });
  return IRR_NO_SOLUTION;
}

/** A zero year-0 free cash flow yields ±Infinity or NaN, with a warning. */
export function profitabilityIndex(
  npv: number,
  fcff: readonly number[],
  options: { logger?: CashflowLogger } = {},
): number {
  const initial = fcff[0] ?? 0;
  if (initial === 0) {
    (options.logger ?? silentLogger).warn("PI divides by a zero year-0 free cash flow", { npv });
  }
  return -npv / initial;
}

export interface NpvSearchOptions {
  tolerance?: number;
  logger?: CashflowLogger;
}

/**
 * Multiplier m on mult_target cash flows that brings NPV to `target`.
 * Substitutes m back and warns when the recomputed NPV misses the target.
 * When the mult_target cash flows discount to 0 there is no finite m; the
 * quotient is returned as is (±Infinity or NaN) with a warning.
 */
export function npvSearch(
  entries: readonly ProjectedEntry<number>[],
  horizon: number,
  discountRate: number,
  target: number,
  options: NpvSearchOptions = {},
): number {
  const tolerance = options.tolerance ?? 1e-6;
  const logger = options.logger ?? silentLogger;

  const others = entries.filter((e) => !e.multTarget);
  const targets = entries.filter((e) => e.multTarget);
  const npvOthers = npvAt(freeCashFlowToFirm(numberArithmetic, others, horizon), discountRate);
  const npvTargets = npvAt(freeCashFlowToFirm(numberArithmetic, targets, horizon), discountRate);
  const mult = (target - npvOthers) / npvTargets;
  if (npvTargets === 0) {
    logger.warn("NPV_search has no finite solution: mult_target cash flows have zero NPV", { target, npvOthers });
    return mult;
  }

  const check = npvAt(freeCashFlowToFirm(numberArithmetic, entries, horizon, mult), discountRate);
  if (Math.abs(check - target) > tolerance * Math.max(1, Math.abs(target))) {
    logger.warn("NPV_search round trip missed the target", { target, recomputed: check, mult });
  }
  return mult;
}

export interface IndicatorOptions {
  irrMaxIterations?: number;
  npvSearchTolerance?: number;
  logger?: CashflowLogger;
}

/**
 * Compute every requested indicator over the active cash flows. Each one
 * runs independently; a failure raises IndicatorFailureError carrying the
 * indicators already computed.
 */
export function computeIndicators(
  settings: GlobalSettings,
  components: readonly Component[],
  tables: CashflowTables<number>,
  horizon: number,
  options: IndicatorOptions = {},
): IndicatorResults {
  const logger = options.logger ?? silentLogger;
  const entries = activeEntries(settings, components, tables);
  const fcff = freeCashFlowToFirm(numberArithmetic, entries, horizon);
  const results: IndicatorResults = {};

  const run = (name: IndicatorName, compute: () => void): void => {
    try {
      compute();
    } catch (err) {
      logger.error(`indicator ${name} failed`, { error: err instanceof Error ? err.message : String(err) });
      throw new IndicatorFailureError<IndicatorResults>(name, { ...results }, err);
    }
  };

  for (const name of settings.indicators) {
    switch (name) {
      case "NPV":
        run(name, () => {
          results.NPV = npvAt(fcff, settings.discountRate);
        });
        break;
      case "IRR":
        run(name, () => {
          results.IRR = internalRateOfReturn(fcff, { maxIterations: options.irrMaxIterations, logger });
        });
        break;
      case "PI":
        run(name, () => {
          results.PI = profitabilityIndex(npvAt(fcff, settings.discountRate), fcff, { logger });
        });
        break;
      case "NPV_search":
        run(name, () => {
          if (settings.target === undefined) throw new ComputationError("NPV_search requires a target");
          results.NPV_mult = npvSearch(entries, horizon, settings.discountRate, settings.target, {
            tolerance: options.npvSearchTolerance,
            logger,
          });
        });
        break;
    }
  }

  logger.info("indicators computed", { ...results });
  return results;
}
