/**
 * Cashflow Engine — Lifetime
 *
 * Per-build value tables over a component's own lifetime (indices 0..L).
 *
 * Capex:     value[y] = m * alpha[y] * (driver[y] / reference) ^ X
 * Recurring: value[y] = m * yearly[y], or m * alpha[y] * driver[y] for y >= 1
 * Amortizor: Capex formula with reference = X = 1; the credit leg's driver
 *            is reshaped from the source Capex's construction-year value.
 */

import type {
  Arithmetic,
  CashFlow,
  CashflowId,
  Component,
  DriverSpec,
  ParamValue,
  Variables,
} from "@/lib/cashflowModel";
import {
  CashflowLengthError,
  ConfigurationError,
  EvaluationOrderError,
  MissingCashflowParameterError,
  UnresolvedDriverError,
  cashflowId,
  describeDriver,
} from "@/lib/cashflowModel";
import { isSeries } from "./dependencyResolver";

export type LifetimeTables<T> = ReadonlyMap<CashflowId, readonly T[]>;

// ---------------------------------------------------------------------------
// Parameter extension
// ---------------------------------------------------------------------------

/** Where a scalar lands once expanded to lifetime + 1 entries. */
type ScalarPlacement = "construction" | "operating" | "every";

function placementFor(cf: CashFlow): ScalarPlacement {
  return cf.kind === "recurring" ? "operating" : "construction";
}

function spread<T>(arith: Arithmetic<T>, value: T, lifetime: number, placement: ScalarPlacement): T[] {
  return Array.from({ length: lifetime + 1 }, (_, y) => {
    if (placement === "every") return value;
    if (placement === "construction") return y === 0 ? value : arith.zero;
    return y === 0 ? arith.zero : value;
  });
}

function literalSeries<T>(
  arith: Arithmetic<T>,
  cf: CashFlow,
  parameter: string,
  value: ParamValue,
  lifetime: number,
): T[] {
  if (typeof value === "number") return spread(arith, arith.lift(value), lifetime, placementFor(cf));
  if (value.length !== lifetime + 1) throw new CashflowLengthError(cf.name, parameter, lifetime + 1, value.length);
  return value.map((v) => arith.lift(v));
}

function driverSeries<T>(
  arith: Arithmetic<T>,
  comp: Component,
  cf: CashFlow,
  driver: DriverSpec,
  variables: Variables<T>,
  computed: LifetimeTables<T>,
): T[] {
  const lifetime = comp.lifetime;
  switch (driver.kind) {
    case "literal":
      return literalSeries(arith, cf, "driver", driver.value, lifetime);
    case "variable": {
      const value = variables[driver.name];
      if (value === undefined) throw new UnresolvedDriverError(comp.name, cf.name, driver.name);
      if (!isSeries(value)) return spread(arith, value, lifetime, "every");
      if (value.length === 1) return spread(arith, value[0], lifetime, "every");
      if (value.length !== lifetime + 1) {
        throw new CashflowLengthError(cf.name, "driver", lifetime + 1, value.length);
      }
      return [...value];
    }
    case "cashflow": {
      const id = cashflowId(driver.component, driver.cashflow);
      const source = computed.get(id);
      if (!source) throw new EvaluationOrderError(cashflowId(comp.name, cf.name), describeDriver(driver));
      if (source.length !== lifetime + 1) {
        throw new CashflowLengthError(cf.name, "driver", lifetime + 1, source.length);
      }
      return [...source];
    }
  }
}

function multiplierValue<T>(arith: Arithmetic<T>, comp: Component, cf: CashFlow, variables: Variables<T>): T {
  if (cf.multiplier.kind === "constant") return arith.lift(cf.multiplier.value);
  const value = variables[cf.multiplier.name];
  if (value === undefined) throw new UnresolvedDriverError(comp.name, cf.name, cf.multiplier.name);
  if (!isSeries(value)) return value;
  if (value.length !== 1) {
    throw new ConfigurationError(`multiplier "${cf.multiplier.name}" must be a scalar`, [cf.multiplier.name]);
  }
  return value[0];
}

export interface ExtendedParameters<T> {
  multiplier: T;
  alpha: T[];
  driver: T[];
  reference: T;
  scale: T;
}

/**
 * Expand a cash flow's parameters to full lifetime + 1 arrays. Scalars
 * sit in the construction year for Capex and Amortizor, and in the
 * operating years for Recurring; a scalar variable broadcasts to all years.
 */
export function extendParameters<T>(
  arith: Arithmetic<T>,
  comp: Component,
  cf: CashFlow,
  variables: Variables<T>,
  computed: LifetimeTables<T>,
): ExtendedParameters<T> {
  const lifetime = comp.lifetime;
  if (cf.alpha === undefined || cf.driver === undefined) {
    throw new MissingCashflowParameterError(
      cf.name,
      [cf.alpha === undefined ? "alpha" : "", cf.driver === undefined ? "driver" : ""].filter(Boolean),
    );
  }

  const alpha = literalSeries(arith, cf, "alpha", cf.alpha, lifetime);
  let driver = driverSeries(arith, comp, cf, cf.driver, variables, computed);

  if (cf.kind === "amortizor" && cf.role === "credit") {
    const magnitude = arith.neg(driver[0]);
    driver = alpha.map((a, y) => (y === 0 || arith.isZero(a) ? arith.zero : magnitude));
  }

  return {
    multiplier: multiplierValue(arith, comp, cf, variables),
    alpha,
    driver,
    reference: arith.lift(cf.reference ?? 1),
    scale: arith.lift(cf.scale ?? 1),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Lifetime table for one cash flow. `computed` must already hold every
 * cash flow this one is driven by.
 */
export function computeLifetime<T>(
  arith: Arithmetic<T>,
  comp: Component,
  cf: CashFlow,
  variables: Variables<T>,
  computed: LifetimeTables<T>,
): T[] {
  const lifetime = comp.lifetime;

  if (cf.kind === "recurring" && cf.yearly) {
    if (cf.yearly.length !== lifetime + 1) {
      throw new CashflowLengthError(cf.name, "yearly", lifetime + 1, cf.yearly.length);
    }
    const m = multiplierValue(arith, comp, cf, variables);
    return cf.yearly.map((v) => arith.mul(m, arith.lift(v)));
  }

  const { multiplier, alpha, driver, reference, scale } = extendParameters(arith, comp, cf, variables, computed);

  if (cf.kind === "recurring") {
    return alpha.map((a, y) => (y === 0 ? arith.zero : arith.mul(arith.mul(multiplier, a), driver[y])));
  }

  return alpha.map((a, y) => {
    if (arith.isZero(a)) return arith.zero;
    const ratio = arith.div(driver[y], reference);
    return arith.mul(arith.mul(multiplier, a), arith.pow(ratio, scale));
  });
}

/**
 * Evaluate cash flows in the resolved order and return their lifetime tables.
 */
export function computeLifetimeTables<T>(
  arith: Arithmetic<T>,
  components: readonly Component[],
  order: readonly CashflowId[],
  variables: Variables<T>,
): Map<CashflowId, T[]> {
  const owners = new Map<CashflowId, { comp: Component; cf: CashFlow }>();
  for (const comp of components) {
    for (const cf of comp.cashflows) owners.set(cashflowId(comp.name, cf.name), { comp, cf });
  }

  const tables = new Map<CashflowId, T[]>();
  for (const id of order) {
    const owner = owners.get(id);
    if (!owner) throw new EvaluationOrderError(id, id);
    tables.set(id, computeLifetime(arith, owner.comp, owner.cf, variables, tables));
  }
  return tables;
}
