/**
 * Cashflow Model — Types
 *
 * Immutable project definitions: global settings, components and the
 * tagged CashFlow variant (Capex | Recurring | Amortizor).
 *
 * C = m * alpha * (D / D')^X
 *   m      multiplier (constant or external scalar)
 *   alpha  price per unit driver, per lifetime year
 *   D      driver (literal, external variable or another cash flow)
 *   D'     reference driver
 *   X      economy-of-scale exponent
 */

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const INDICATOR_NAMES = ["NPV", "IRR", "PI", "NPV_search"] as const;

export type IndicatorName = (typeof INDICATOR_NAMES)[number];

export interface ActivePair {
  component: string;
  cashflow: string;
}

export interface GlobalSettings {
  /** Discount rate (WACC) as decimal */
  readonly discountRate: number;
  /** Tax rate as decimal */
  readonly tax: number;
  /** Inflation rate as decimal */
  readonly inflation: number;
  readonly indicators: readonly IndicatorName[];
  /** Target NPV for NPV_search */
  readonly target?: number;
  /** Number of project years; defaults to lcm(lifetimes) + 1 */
  readonly projectTime?: number;
  readonly active: readonly ActivePair[];
  /** Include the per-cash-flow project tables in the result */
  readonly output: boolean;
}

// ---------------------------------------------------------------------------
// Cash flow parameters
// ---------------------------------------------------------------------------

export type ParamValue = number | readonly number[];

export type InflationMode = "real" | "nominal" | "none";

export type CashflowRef = { readonly kind: "cashflow"; readonly component: string; readonly cashflow: string };

export type DriverSpec =
  | { readonly kind: "literal"; readonly value: ParamValue }
  | { readonly kind: "variable"; readonly name: string }
  | CashflowRef;

export type MultiplierSpec =
  | { readonly kind: "constant"; readonly value: number }
  | { readonly kind: "variable"; readonly name: string };

export interface DepreciationDescriptor {
  /** "MACRS" or "custom" (case-insensitive) */
  readonly scheme: string;
  /** MACRS: [recoveryYears]; custom: percentage per recovery year */
  readonly plan: readonly number[];
}

interface CashFlowCommon {
  readonly name: string;
  readonly taxable: boolean;
  readonly inflation: InflationMode;
  readonly multiplier: MultiplierSpec;
  readonly multTarget: boolean;
  readonly driver?: DriverSpec;
  readonly alpha?: ParamValue;
  readonly reference?: number;
  readonly scale?: number;
}

export interface CapexCashFlow extends CashFlowCommon {
  readonly kind: "capex";
  readonly depreciation?: DepreciationDescriptor;
}

export interface RecurringCashFlow extends CashFlowCommon {
  readonly kind: "recurring";
  /** Pre-aggregated per-year values (before multiplier), length lifetime + 1 */
  readonly yearly?: readonly number[];
}

export type AmortizorRole = "credit" | "depreciation";

/** Synthetic leg produced from a depreciating Capex. Never user-defined. */
export interface AmortizorCashFlow extends CashFlowCommon {
  readonly kind: "amortizor";
  readonly role: AmortizorRole;
  /** Name of the originating Capex */
  readonly source: string;
  readonly alpha: readonly number[];
  readonly driver: CashflowRef;
}

export type CashFlow = CapexCashFlow | RecurringCashFlow | AmortizorCashFlow;

export type CashFlowKind = CashFlow["kind"];

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

export interface Component {
  readonly name: string;
  /** Years per build */
  readonly lifetime: number;
  /** Project year of the first build */
  readonly startTime: number;
  /** Number of builds; 0 rebuilds until the project ends */
  readonly repetitions: number;
  /** Overrides GlobalSettings.tax */
  readonly tax?: number;
  /** Overrides GlobalSettings.inflation */
  readonly inflation?: number;
  readonly cashflows: readonly CashFlow[];
}

export interface ProjectDefinition {
  readonly settings: GlobalSettings;
  readonly components: readonly Component[];
}

// ---------------------------------------------------------------------------
// Run-time values and derived tables
// ---------------------------------------------------------------------------

/** "Component|CashFlow" */
export type CashflowId = `${string}|${string}`;

export type VariableValue<T> = T | readonly T[];

/** Externally supplied drivers and multipliers, read-only. */
export type Variables<T> = Readonly<Record<string, VariableValue<T>>>;

/** component name → cash flow name → per-year values */
export type CashflowTables<T> = Record<string, Record<string, T[]>>;
