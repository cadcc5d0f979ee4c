/**
 * Cashflow Engine — Project Projection
 *
 * Maps lifetime tables onto the project calendar (indices 0..horizon-1).
 *
 * For a component starting at s with lifetime L, builds end at
 * e = s + L * repetitions (or the horizon when repetitions = 0). In an
 * operating year y (s <= y < e), with r = (y - s) mod L:
 *   r != 0  → lifetime[r]
 *   r == 0  → lifetime[0] unless y is the last project year (new build)
 *             + lifetime[L] unless y == s (retiring build)
 * At y == e < horizon only the retiring build's lifetime[L] remains.
 *
 * Every value is then scaled by (1 - tax) when taxable and by
 * (1 + inflation)^-y when inflation is "real".
 */

import type {
  Arithmetic,
  CashFlow,
  CashflowId,
  CashflowTables,
  Component,
  GlobalSettings,
} from "@/lib/cashflowModel";
import { ComputationError, ProjectionIndexError, cashflowId } from "@/lib/cashflowModel";
import type { CashflowLogger } from "./logger";
import { silentLogger } from "./logger";
import type { LifetimeTables } from "./lifetime";

// ---------------------------------------------------------------------------
// Horizon
// ---------------------------------------------------------------------------

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

export function lcm(values: readonly number[]): number {
  return values.reduce((acc, v) => (acc * v) / gcd(acc, v), 1);
}

/** Number of project years: ProjectTime when set, else lcm(lifetimes) + 1. */
export function projectHorizon(settings: GlobalSettings, components: readonly Component[]): number {
  if (settings.projectTime !== undefined) return settings.projectTime;
  return lcm(components.map((c) => c.lifetime)) + 1;
}

// ---------------------------------------------------------------------------
// Tax / inflation factors
// ---------------------------------------------------------------------------

export function taxFactor(settings: GlobalSettings, comp: Component, cf: CashFlow): number {
  return cf.taxable ? 1 - (comp.tax ?? settings.tax) : 1;
}

export function inflationFactor(
  settings: GlobalSettings,
  comp: Component,
  cf: CashFlow,
  year: number,
  logger: CashflowLogger = silentLogger,
): number {
  switch (cf.inflation) {
    case "none":
      return 1;
    case "real":
      return Math.pow(1 + (comp.inflation ?? settings.inflation), -year);
    case "nominal":
      // Not modelled: nominal cash flows are left undeflated.
      if (year === 0) {
        logger.warn("nominal inflation is not supported; using a factor of 1", {
          cashflow: cashflowId(comp.name, cf.name),
        });
      }
      return 1;
  }
}

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

function lifetimeValue<T>(comp: Component, cf: CashFlow, table: readonly T[], index: number): T {
  if (index < 0 || index >= table.length) throw new ProjectionIndexError(comp.name, cf.name, index, table.length);
  return table[index];
}

/** Project one lifetime table onto the calendar, before tax and inflation. */
export function projectLifetimeTable<T>(
  arith: Arithmetic<T>,
  comp: Component,
  cf: CashFlow,
  table: readonly T[],
  horizon: number,
): T[] {
  const L = comp.lifetime;
  if (table.length !== L + 1) throw new ProjectionIndexError(comp.name, cf.name, L, table.length);

  const start = comp.startTime;
  const end = comp.repetitions === 0 ? horizon : start + L * comp.repetitions;

  return Array.from({ length: horizon }, (_, y) => {
    if (y === end && end < horizon && end > start) return lifetimeValue(comp, cf, table, L);
    if (y < start || y >= end) return arith.zero;

    const r = (y - start) % L;
    if (r !== 0) return lifetimeValue(comp, cf, table, r);

    const build = y !== horizon - 1 ? lifetimeValue(comp, cf, table, 0) : arith.zero;
    const retire = y - start > 0 ? lifetimeValue(comp, cf, table, L) : arith.zero;
    return arith.add(build, retire);
  });
}

export interface ProjectionOptions {
  logger?: CashflowLogger;
}

/**
 * Project every cash flow of the given components. The result is keyed
 * component → cash flow → per-year values with tax and inflation applied.
 */
export function projectCashflows<T>(
  arith: Arithmetic<T>,
  settings: GlobalSettings,
  components: readonly Component[],
  lifetimeTables: LifetimeTables<T>,
  horizon: number,
  options: ProjectionOptions = {},
): CashflowTables<T> {
  const logger = options.logger ?? silentLogger;
  if (!Number.isInteger(horizon) || horizon < 1) {
    throw new ComputationError(`project horizon must be a positive integer, got ${horizon}`);
  }

  const result: CashflowTables<T> = {};
  for (const comp of components) {
    const perCashflow: Record<string, T[]> = {};
    for (const cf of comp.cashflows) {
      const id: CashflowId = cashflowId(comp.name, cf.name);
      const table = lifetimeTables.get(id);
      if (!table) throw new ComputationError(`no lifetime table computed for ${id}`);

      const tax = taxFactor(settings, comp, cf);
      perCashflow[cf.name] = projectLifetimeTable(arith, comp, cf, table, horizon).map((v, y) => {
        const factor = tax * inflationFactor(settings, comp, cf, y, logger);
        return factor === 1 ? v : arith.mul(v, arith.lift(factor));
      });
      logger.debug("projected cash flow", { cashflow: id, horizon, tax });
    }
    result[comp.name] = perCashflow;
  }
  return result;
}
