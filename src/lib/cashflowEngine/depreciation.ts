/**
 * Cashflow Engine — Depreciation
 *
 * A depreciating Capex gains two synthetic legs on its own component:
 *
 *   <component>_<capex>_amortize    credit leg, untaxed, +|C| * p[y]
 *   <component>_<capex>_depreciate  depreciation leg, taxed, -|C| * p[y]
 *
 * where C is the Capex's construction-year value and p the schedule
 * fractions, placed from lifetime year 1 onward. After tax the pair nets
 * to the depreciation tax shield.
 */

import type { AmortizorCashFlow, CapexCashFlow, CashFlow, Component } from "@/lib/cashflowModel";
import { CashflowLengthError, DepreciationSchemeError, withCashflows } from "@/lib/cashflowModel";
import tables from "./depreciationTables.json";

/** scheme + plan → schedule fractions (0..1) per recovery year */
export type DepreciationLookup = (scheme: string, plan: readonly number[]) => readonly number[];

const MACRS: Readonly<Record<string, readonly number[]>> = tables.MACRS;

export const defaultDepreciationLookup: DepreciationLookup = (scheme, plan) => {
  switch (scheme.toLowerCase()) {
    case "macrs": {
      const period = plan[0];
      const pcts = period === undefined ? undefined : MACRS[String(period)];
      if (!pcts) {
        throw new DepreciationSchemeError(
          `MACRS recovery period "${String(period)}" is not available. Options are: ${Object.keys(MACRS).join(", ")}`,
        );
      }
      return pcts.map((p) => p / 100);
    }
    case "custom":
      return plan.map((p) => p / 100);
    default:
      throw new DepreciationSchemeError(`depreciation scheme "${scheme}" is not implemented`);
  }
};

export function creditLegName(component: string, capex: string): string {
  return `${component}_${capex}_amortize`;
}

export function depreciationLegName(component: string, capex: string): string {
  return `${component}_${capex}_depreciate`;
}

/**
 * Build the credit and depreciation legs for one Capex, or none when it
 * carries no depreciation descriptor.
 */
export function expandDepreciation(
  component: Component,
  capex: CapexCashFlow,
  lookup: DepreciationLookup = defaultDepreciationLookup,
): AmortizorCashFlow[] {
  if (!capex.depreciation) return [];

  const schedule = lookup(capex.depreciation.scheme, capex.depreciation.plan);
  if (schedule.length > component.lifetime) {
    throw new CashflowLengthError(capex.name, "depreciation", component.lifetime, schedule.length);
  }

  const creditAlpha = Array.from({ length: component.lifetime + 1 }, (_, y) =>
    y >= 1 && y <= schedule.length ? schedule[y - 1] : 0,
  );
  const depreciationAlpha = creditAlpha.map((a) => (a === 0 ? 0 : -1));

  const creditName = creditLegName(component.name, capex.name);
  const shared = {
    kind: "amortizor" as const,
    source: capex.name,
    multiplier: { kind: "constant" as const, value: 1 },
    multTarget: capex.multTarget,
    reference: 1,
    scale: 1,
  };

  const credit: AmortizorCashFlow = Object.freeze({
    ...shared,
    role: "credit" as const,
    name: creditName,
    taxable: false,
    inflation: "none" as const,
    alpha: Object.freeze(creditAlpha),
    driver: { kind: "cashflow" as const, component: component.name, cashflow: capex.name },
  });

  const depreciation: AmortizorCashFlow = Object.freeze({
    ...shared,
    role: "depreciation" as const,
    name: depreciationLegName(component.name, capex.name),
    taxable: true,
    inflation: capex.inflation,
    alpha: Object.freeze(depreciationAlpha),
    driver: { kind: "cashflow" as const, component: component.name, cashflow: creditName },
  });

  return [credit, depreciation];
}

function legsFor(component: Component, cf: CashFlow, lookup: DepreciationLookup): AmortizorCashFlow[] {
  return cf.kind === "capex" ? expandDepreciation(component, cf, lookup) : [];
}

/** Components with every depreciation leg appended after the user-defined cash flows. */
export function withDepreciationLegs(
  components: readonly Component[],
  lookup: DepreciationLookup = defaultDepreciationLookup,
): Component[] {
  return components.map((comp) => withCashflows(comp, comp.cashflows.flatMap((cf) => legsFor(comp, cf, lookup))));
}
