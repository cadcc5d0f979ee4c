/**
 * Cashflow Model — Validation
 *
 * Eager checks that run before any computation. Everything thrown here is
 * a ConfigurationError.
 */

import type { CashFlow, Component, GlobalSettings, ParamValue } from "./types";
import {
  ActiveCashflowNotFoundError,
  CashflowLengthError,
  ConfigurationError,
  DuplicateNameError,
  MissingCashflowParameterError,
} from "./errors";
import { cashflowId, findCashflow, isActiveCashflow, requiredParameterNames } from "./definitions";

function checkSeriesLength(cf: CashFlow, parameter: string, value: ParamValue | undefined, lifetime: number): void {
  if (value === undefined || typeof value === "number") return;
  if (value.length !== lifetime + 1) {
    throw new CashflowLengthError(cf.name, parameter, lifetime + 1, value.length);
  }
}

function missingParameters(cf: CashFlow): string[] {
  const present: Record<string, boolean> = {
    alpha: cf.alpha !== undefined,
    driver: cf.driver !== undefined,
    reference: cf.reference !== undefined,
    scale: cf.scale !== undefined,
  };
  return requiredParameterNames(cf).filter((name) => !present[name]);
}

/** Validate one cash flow against the lifetime of the component that owns it. */
export function validateCashflow(cf: CashFlow, lifetime: number): void {
  const missing = missingParameters(cf);
  if (missing.length > 0) throw new MissingCashflowParameterError(cf.name, missing);

  checkSeriesLength(cf, "alpha", cf.alpha, lifetime);
  if (cf.driver?.kind === "literal") checkSeriesLength(cf, "driver", cf.driver.value, lifetime);
  if (cf.kind === "recurring") checkSeriesLength(cf, "yearly", cf.yearly, lifetime);

  if (cf.reference === 0) {
    throw new ConfigurationError(`CashFlow "${cf.name}" has a reference driver of 0`, ["reference"]);
  }
  if (cf.kind === "capex" && cf.depreciation && cf.depreciation.plan.length === 0) {
    throw new MissingCashflowParameterError(cf.name, ["depreciation plan"]);
  }
}

/**
 * Structural checks over all components: unique names (cash flow names
 * across the whole project), integer lifetimes and repetitions, and
 * per-cash-flow parameters.
 */
export function validateComponents(components: readonly Component[]): void {
  const componentNames = new Set<string>();
  const cashflowNames = new Set<string>();

  for (const comp of components) {
    if (componentNames.has(comp.name)) throw new DuplicateNameError("Component", comp.name);
    componentNames.add(comp.name);

    if (!Number.isInteger(comp.lifetime) || comp.lifetime < 1) {
      throw new ConfigurationError(`Component "${comp.name}" lifetime must be a positive integer`, ["Life_time"]);
    }
    if (!Number.isInteger(comp.startTime)) {
      throw new ConfigurationError(`Component "${comp.name}" start time must be an integer`, ["StartTime"]);
    }
    if (!Number.isInteger(comp.repetitions) || comp.repetitions < 0) {
      throw new ConfigurationError(`Component "${comp.name}" repetitions must be a non-negative integer`, [
        "Repetitions",
      ]);
    }

    for (const cf of comp.cashflows) {
      if (cashflowNames.has(cf.name)) throw new DuplicateNameError("CashFlow", cf.name);
      cashflowNames.add(cf.name);
      validateCashflow(cf, comp.lifetime);
    }
  }
}

/**
 * Cross checks between global settings and components. Run after
 * depreciation legs have been added, since active pairs may name them.
 */
export function checkRunSettings(settings: GlobalSettings, components: readonly Component[]): void {
  const byName = new Map(components.map((c) => [c.name, c]));

  if (settings.indicators.length === 0) {
    throw new ConfigurationError("at least one indicator must be requested", ["Indicator"]);
  }

  for (const pair of settings.active) {
    const comp = byName.get(pair.component);
    if (!comp || !findCashflow(comp, pair.cashflow)) {
      const options = components.flatMap((c) => c.cashflows.map((cf) => cashflowId(c.name, cf.name)));
      throw new ActiveCashflowNotFoundError(cashflowId(pair.component, pair.cashflow), options);
    }
  }

  if (settings.projectTime === undefined) {
    for (const comp of components) {
      if (comp.startTime !== 0) {
        throw new ConfigurationError(
          `StartTime given for component "${comp.name}" but no ProjectTime in global settings`,
          ["StartTime"],
        );
      }
      if (comp.repetitions !== 0) {
        throw new ConfigurationError(
          `Repetitions given for component "${comp.name}" but no ProjectTime in global settings`,
          ["Repetitions"],
        );
      }
    }
  } else if (!Number.isInteger(settings.projectTime) || settings.projectTime < 1) {
    throw new ConfigurationError("ProjectTime must be a positive integer", ["ProjectTime"]);
  }

  if (settings.indicators.includes("NPV_search")) {
    if (settings.target === undefined) {
      throw new ConfigurationError('"target" is required when NPV_search is requested', ["target"]);
    }
    const targets = components.flatMap((comp) =>
      comp.cashflows.filter((cf) => cf.multTarget && isActiveCashflow(settings, comp.name, cf)),
    );
    if (targets.length === 0) {
      throw new ConfigurationError('NPV_search requested but no active cash flow has "mult_target" set', [
        "mult_target",
      ]);
    }
  }
}
