/**
 * Cashflow Model — Definitions
 *
 * Constructors and accessors for the immutable definitions. Nothing here
 * evaluates a cash flow; see the cashflow engine for that.
 */

import type {
  ActivePair,
  CapexCashFlow,
  CashFlow,
  CashflowId,
  CashflowRef,
  Component,
  DriverSpec,
  GlobalSettings,
  MultiplierSpec,
  ParamValue,
  RecurringCashFlow,
} from "./types";
import { CashflowLengthError, ConfigurationError } from "./errors";

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

export function cashflowId(component: string, cashflow: string): CashflowId {
  return `${component}|${cashflow}`;
}

export function parseCashflowId(id: string): ActivePair | null {
  const parts = id.split("|");
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  return { component: parts[0], cashflow: parts[1] };
}

// ---------------------------------------------------------------------------
// Parameter shorthands
// ---------------------------------------------------------------------------

/**
 * Interpret a driver as written in a definition: numbers and arrays are
 * literals, "Component|CashFlow" is a cross reference, any other string
 * names an external variable.
 */
export function toDriverSpec(raw: ParamValue | string): DriverSpec {
  if (typeof raw !== "string") return { kind: "literal", value: raw };
  const ref = parseCashflowId(raw);
  if (ref) return { kind: "cashflow", component: ref.component, cashflow: ref.cashflow };
  return { kind: "variable", name: raw };
}

export function toMultiplierSpec(raw: number | string | undefined): MultiplierSpec {
  if (raw === undefined) return { kind: "constant", value: 1 };
  if (typeof raw === "number") return { kind: "constant", value: raw };
  return { kind: "variable", name: raw };
}

export function describeDriver(driver: DriverSpec | undefined): string {
  if (!driver) return "(none)";
  switch (driver.kind) {
    case "literal":
      return typeof driver.value === "number" ? String(driver.value) : "(from input)";
    case "variable":
      return driver.name;
    case "cashflow":
      return cashflowId(driver.component, driver.cashflow);
  }
}

export function isCashflowRef(driver: DriverSpec | undefined): driver is CashflowRef {
  return driver?.kind === "cashflow";
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

type CommonInput = {
  name: string;
  taxable?: boolean;
  inflation?: CashFlow["inflation"];
  multiplier?: number | string;
  multTarget?: boolean;
  driver?: ParamValue | string;
  alpha?: ParamValue;
  reference?: number;
  scale?: number;
};

export type CapexInput = CommonInput & { depreciation?: CapexCashFlow["depreciation"] };
export type RecurringInput = CommonInput & { yearly?: readonly number[] };

function common(input: CommonInput) {
  return {
    name: input.name,
    taxable: input.taxable ?? false,
    inflation: input.inflation ?? "none",
    multiplier: toMultiplierSpec(input.multiplier),
    multTarget: input.multTarget ?? false,
    driver: input.driver === undefined ? undefined : toDriverSpec(input.driver),
    alpha: input.alpha,
    reference: input.reference,
    scale: input.scale,
  };
}

export function createCapex(input: CapexInput): CapexCashFlow {
  return Object.freeze({ kind: "capex" as const, ...common(input), depreciation: input.depreciation });
}

export function createRecurring(input: RecurringInput): RecurringCashFlow {
  return Object.freeze({ kind: "recurring" as const, ...common(input), yearly: input.yearly });
}

export function createComponent(input: {
  name: string;
  lifetime: number;
  startTime?: number;
  repetitions?: number;
  tax?: number;
  inflation?: number;
  cashflows?: readonly CashFlow[];
}): Component {
  return Object.freeze({
    name: input.name,
    lifetime: input.lifetime,
    startTime: input.startTime ?? 0,
    repetitions: input.repetitions ?? 0,
    tax: input.tax,
    inflation: input.inflation,
    cashflows: Object.freeze([...(input.cashflows ?? [])]),
  });
}

export function createGlobalSettings(input: {
  discountRate: number;
  tax?: number;
  inflation?: number;
  indicators: GlobalSettings["indicators"];
  target?: number;
  projectTime?: number;
  active: readonly (ActivePair | string)[];
  output?: boolean;
}): GlobalSettings {
  const active = input.active.map((pair) => {
    if (typeof pair !== "string") return pair;
    const parsed = parseCashflowId(pair);
    if (!parsed) {
      throw new ConfigurationError(`active entry "${pair}" must have the form "Component|CashFlow"`, [pair]);
    }
    return parsed;
  });
  return Object.freeze({
    discountRate: input.discountRate,
    tax: input.tax ?? 0,
    inflation: input.inflation ?? 0,
    indicators: Object.freeze([...input.indicators]),
    target: input.target,
    projectTime: input.projectTime,
    active: Object.freeze(active),
    output: input.output ?? false,
  });
}

/** A copy of the component with extra cash flows appended. */
export function withCashflows(component: Component, extra: readonly CashFlow[]): Component {
  if (extra.length === 0) return component;
  return createComponent({ ...component, cashflows: [...component.cashflows, ...extra] });
}

// ---------------------------------------------------------------------------
// Recurring aggregation
// ---------------------------------------------------------------------------

/**
 * Pre-aggregate a Recurring cash flow from one alpha/driver point per year:
 * yearly[y] = alpha[y] * driver[y]. Year 0 is taken as given.
 */
export function computeYearlyCashflow(
  cf: RecurringCashFlow,
  alpha: readonly number[],
  driver: readonly number[],
): RecurringCashFlow {
  if (alpha.length !== driver.length) {
    throw new CashflowLengthError(cf.name, "driver", alpha.length, driver.length);
  }
  const yearly = alpha.map((a, y) => a * (driver[y] ?? 0));
  return Object.freeze({ ...cf, yearly: Object.freeze(yearly) });
}

/**
 * Collapse sub-year alpha/driver samples into a single lifetime year:
 * yearly[year] = sum(alpha_i * driver_i). Other years keep their value.
 */
export function computeIntrayearCashflow(
  cf: RecurringCashFlow,
  lifetime: number,
  year: number,
  alpha: readonly number[],
  driver: readonly number[],
): RecurringCashFlow {
  if (alpha.length !== driver.length) {
    throw new CashflowLengthError(cf.name, "driver", alpha.length, driver.length);
  }
  if (!Number.isInteger(year) || year < 0 || year > lifetime) {
    throw new CashflowLengthError(cf.name, "yearly", lifetime + 1, year + 1);
  }
  const yearly = cf.yearly ? [...cf.yearly] : new Array<number>(lifetime + 1).fill(0);
  if (yearly.length !== lifetime + 1) {
    throw new CashflowLengthError(cf.name, "yearly", lifetime + 1, yearly.length);
  }
  let total = 0;
  for (let i = 0; i < alpha.length; i++) total += alpha[i] * driver[i];
  yearly[year] = total;
  return Object.freeze({ ...cf, yearly: Object.freeze(yearly) });
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export function findCashflow(component: Component, name: string): CashFlow | undefined {
  return component.cashflows.find((cf) => cf.name === name);
}

export function countMultTargets(component: Component): number {
  return component.cashflows.filter((cf) => cf.multTarget).length;
}

/** Parameter names a cash flow must define before it can be evaluated. */
export function requiredParameterNames(cf: CashFlow): string[] {
  switch (cf.kind) {
    case "capex":
      return ["alpha", "driver", "reference", "scale"];
    case "recurring":
      return cf.yearly ? [] : ["alpha", "driver"];
    case "amortizor":
      return ["alpha", "driver"];
  }
}

/**
 * Whether a cash flow takes part in indicator aggregation. Depreciation
 * legs follow the activity of the Capex they were generated from.
 */
export function isActiveCashflow(settings: GlobalSettings, component: string, cf: CashFlow): boolean {
  const listed = (name: string) =>
    settings.active.some((pair) => pair.component === component && pair.cashflow === name);
  if (listed(cf.name)) return true;
  return cf.kind === "amortizor" && listed(cf.source);
}

/** Components owning at least one active cash flow. */
export function activeComponents(settings: GlobalSettings, components: readonly Component[]): Component[] {
  return components.filter((comp) => comp.cashflows.some((cf) => isActiveCashflow(settings, comp.name, cf)));
}
