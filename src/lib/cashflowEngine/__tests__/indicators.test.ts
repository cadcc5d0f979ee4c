/**
 * Cashflow Engine — Indicator Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { CashflowTables } from "@/lib/cashflowModel";
import {
  ComputationError,
  IndicatorFailureError,
  createCapex,
  createComponent,
  createGlobalSettings,
  createRecurring,
  numberArithmetic,
} from "@/lib/cashflowModel";
import type { ProjectedEntry } from "../indicators";
import {
  IRR_NO_SOLUTION,
  activeEntries,
  computeIndicators,
  freeCashFlowToFirm,
  internalRateOfReturn,
  netPresentValue,
  npvSearch,
  profitabilityIndex,
} from "../indicators";
import { recordingLogger } from "../logger";

function assertNear(actual: number | undefined, expected: number, eps = 1e-9): void {
  assert.ok(actual !== undefined && Math.abs(actual - expected) < eps, `expected ${expected}, got ${actual}`);
}

function entry(cashflow: string, values: number[], multTarget = false): ProjectedEntry<number> {
  return { component: "Plant", cashflow, multTarget, values };
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const plant = createComponent({
  name: "Plant",
  lifetime: 1,
  cashflows: [
    createCapex({ name: "Build", alpha: -100, driver: 1, reference: 1, scale: 1 }),
    createRecurring({ name: "Sales", alpha: 110, driver: 1 }),
  ],
});

const TABLES: CashflowTables<number> = { Plant: { Build: [-100, 0], Sales: [0, 110] } };

// ---------------------------------------------------------------------------
// FCFF / NPV
// ---------------------------------------------------------------------------

describe("freeCashFlowToFirm", () => {
  it("sums active entries per year and scales mult_target entries", () => {
    const entries = [entry("A", [-10, 1, 2]), entry("B", [0, 5, 5], true)];
    assert.deepEqual(freeCashFlowToFirm(numberArithmetic, entries, 3), [-10, 6, 7]);
    assert.deepEqual(freeCashFlowToFirm(numberArithmetic, entries, 3, 2), [-10, 11, 12]);
  });

  it("keeps only active cash flows", () => {
    const settings = createGlobalSettings({ discountRate: 0.1, indicators: ["NPV"], active: ["Plant|Sales"] });
    const entries = activeEntries(settings, [plant], TABLES);
    assert.deepEqual(
      entries.map((e) => e.cashflow),
      ["Sales"],
    );
  });
});

describe("netPresentValue", () => {
  it("leaves year 0 undiscounted", () => {
    assertNear(netPresentValue(numberArithmetic, [-100, 110], 0.1), 0);
    assert.equal(netPresentValue(numberArithmetic, [-1000, 0, 0, 0, 0], 0.1), -1000);
  });

  it("is additive over disjoint sets of cash flows", () => {
    const a = [entry("A", [-300, 120, 130])];
    const b = [entry("B", [-50, 20, 80])];
    const npv = (entries: ProjectedEntry<number>[]) =>
      netPresentValue(numberArithmetic, freeCashFlowToFirm(numberArithmetic, entries, 3), 0.08);
    assertNear(npv([...a, ...b]), npv(a) + npv(b));
  });
});

// ---------------------------------------------------------------------------
// IRR / PI
// ---------------------------------------------------------------------------

describe("internalRateOfReturn", () => {
  it("finds the discount rate where NPV is zero", () => {
    assertNear(internalRateOfReturn([-100, 110]), 0.1, 1e-8);
    assertNear(internalRateOfReturn([-100, 0, 121]), 0.1, 1e-8);
  });

  it("reports the sentinel when no root exists", () => {
    const logger = recordingLogger();
    assert.equal(internalRateOfReturn([100, 10], { logger }), IRR_NO_SOLUTION);
    assert.equal(IRR_NO_SOLUTION, -10);
    assert.equal(logger.entries.filter((e) => e.level === "warn").length, 1);
  });

  it("reports the sentinel for an all-zero series", () => {
    const logger = recordingLogger();
    assert.equal(internalRateOfReturn([0, 0, 0], { logger }), IRR_NO_SOLUTION);
    assert.equal(logger.entries.filter((e) => e.level === "warn").length, 1);
  });
});

describe("profitabilityIndex", () => {
  it("divides -NPV by the year-0 free cash flow", () => {
    assert.equal(profitabilityIndex(50, [-200, 300]), 0.25);
  });

  it("returns the IEEE quotient and warns when the year-0 free cash flow is zero", () => {
    const logger = recordingLogger();
    assert.equal(profitabilityIndex(50, [0, 300], { logger }), -Infinity);
    assert.ok(Number.isNaN(profitabilityIndex(0, [0, 300])));
    assert.equal(logger.entries.filter((e) => e.level === "warn").length, 1);
  });
});

// ---------------------------------------------------------------------------
// NPV_search
// ---------------------------------------------------------------------------

describe("npvSearch", () => {
  const entries = [entry("Build", [-1000, 0, 0]), entry("Sales", [0, 550, 605], true)];

  it("solves the multiplier linearly", () => {
    assertNear(npvSearch(entries, 3, 0.1, 0), 1);
    assertNear(npvSearch(entries, 3, 0.1, 500), 1.5);
  });

  it("reproduces the target when the multiplier is substituted back", () => {
    const logger = recordingLogger();
    const mult = npvSearch(entries, 3, 0.1, 250, { logger });
    const npv = netPresentValue(numberArithmetic, freeCashFlowToFirm(numberArithmetic, entries, 3, mult), 0.1);
    assertNear(npv, 250, 1e-6);
    assert.equal(logger.entries.length, 0);
  });

  it("returns an infinite multiplier and warns when the mult_target cash flows have zero NPV", () => {
    const logger = recordingLogger();
    const flat = [entry("Build", [-1000, 0, 0]), entry("Sales", [0, 0, 0], true)];
    assert.equal(npvSearch(flat, 3, 0.1, 0, { logger }), Infinity);
    assert.equal(logger.entries.length, 1);
    assert.equal(logger.entries[0].level, "warn");
  });
});

// ---------------------------------------------------------------------------
// computeIndicators
// ---------------------------------------------------------------------------

describe("computeIndicators", () => {
  it("computes each requested indicator", () => {
    const settings = createGlobalSettings({
      discountRate: 0.1,
      indicators: ["NPV", "IRR", "PI"],
      active: ["Plant|Build", "Plant|Sales"],
    });
    const results = computeIndicators(settings, [plant], TABLES, 2);
    assertNear(results.NPV, 0);
    assertNear(results.IRR, 0.1, 1e-8);
    assertNear(results.PI, 0);
    assert.equal(results.NPV_mult, undefined);
  });

  it("keeps computing after a zero-divisor PI", () => {
    const settings = createGlobalSettings({
      discountRate: 0.1,
      indicators: ["NPV", "PI", "IRR"],
      active: ["Plant|Sales"],
    });
    const logger = recordingLogger();
    const results = computeIndicators(settings, [plant], TABLES, 2, { logger });
    assertNear(results.NPV, 100);
    assert.equal(results.PI, -Infinity);
    assert.equal(results.IRR, IRR_NO_SOLUTION);
    assert.equal(logger.entries.filter((e) => e.level === "warn").length, 2);
  });

  it("carries earlier results when a later indicator fails", () => {
    const settings = createGlobalSettings({
      discountRate: 0.1,
      indicators: ["NPV", "NPV_search"],
      active: ["Plant|Sales"],
    });
    assert.throws(
      () => computeIndicators(settings, [plant], TABLES, 2),
      (err: unknown) => {
        assert.ok(err instanceof IndicatorFailureError);
        assert.equal(err.indicator, "NPV_search");
        assert.ok(err.reason instanceof ComputationError);
        assert.equal(err.code, "COMPUTATION_INDICATOR");
        const partial: unknown = err.partial;
        assert.ok(typeof partial === "object" && partial !== null && "NPV" in partial);
        assertNear(typeof partial.NPV === "number" ? partial.NPV : undefined, 100, 1e-9);
        return true;
      },
    );
  });
});
