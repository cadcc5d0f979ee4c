/**
 * Cashflow Engine — Dependency Resolver Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  CyclicDependencyError,
  DriverLengthMismatchError,
  LifetimeMismatchError,
  MissingMultiplierError,
  UnresolvedDriverError,
  createCapex,
  createComponent,
  createGlobalSettings,
  createRecurring,
} from "@/lib/cashflowModel";
import { requiredComponents, resolveEvaluationOrder } from "../dependencyResolver";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const plant = createComponent({
  name: "Plant",
  lifetime: 3,
  cashflows: [
    createRecurring({ name: "Fuel", alpha: 2, driver: "Plant|Output" }),
    createRecurring({ name: "Output", alpha: 10, driver: "load" }),
  ],
});

const grid = createComponent({
  name: "Grid",
  lifetime: 3,
  cashflows: [createCapex({ name: "Line", alpha: -50, driver: "Plant|Fuel", reference: 1, scale: 1 })],
});

const storage = createComponent({
  name: "Storage",
  lifetime: 2,
  cashflows: [createCapex({ name: "Tank", alpha: -20, driver: 1, reference: 1, scale: 1 })],
});

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe("resolveEvaluationOrder", () => {
  it("places drivers before their dependents", () => {
    const order = resolveEvaluationOrder([plant], { load: 1 });
    assert.deepEqual(order, ["Plant|Output", "Plant|Fuel"]);
  });

  it("follows cross-component references", () => {
    const order = resolveEvaluationOrder([grid, plant], { load: [1, 1, 1, 1] });
    assert.deepEqual(order, ["Plant|Output", "Plant|Fuel", "Grid|Line"]);
  });

  it("lists every cash flow exactly once", () => {
    const order = resolveEvaluationOrder([plant, grid, storage], { load: 1 });
    assert.equal(order.length, 4);
    assert.equal(new Set(order).size, 4);
    assert.ok(order.indexOf("Plant|Fuel") < order.indexOf("Grid|Line"));
  });

  it("keeps declaration order when nothing constrains it", () => {
    const comp = createComponent({
      name: "Site",
      lifetime: 2,
      cashflows: [
        createCapex({ name: "B", alpha: -1, driver: 1, reference: 1, scale: 1 }),
        createCapex({ name: "A", alpha: -1, driver: 1, reference: 1, scale: 1 }),
      ],
    });
    assert.deepEqual(resolveEvaluationOrder([comp], {}), ["Site|B", "Site|A"]);
  });
});

// ---------------------------------------------------------------------------
// Rejections
// ---------------------------------------------------------------------------

describe("resolveEvaluationOrder rejections", () => {
  it("rejects a direct self-reference", () => {
    const comp = createComponent({
      name: "Plant",
      lifetime: 3,
      cashflows: [createRecurring({ name: "Loop", alpha: 1, driver: "Plant|Loop" })],
    });
    assert.throws(
      () => resolveEvaluationOrder([comp], {}),
      (err: unknown) => {
        assert.ok(err instanceof CyclicDependencyError);
        assert.deepEqual(err.cycle, ["Plant|Loop", "Plant|Loop"]);
        return true;
      },
    );
  });

  it("reports the path of a longer cycle", () => {
    const comp = createComponent({
      name: "P",
      lifetime: 2,
      cashflows: [
        createRecurring({ name: "A", alpha: 1, driver: "P|B" }),
        createRecurring({ name: "B", alpha: 1, driver: "P|A" }),
      ],
    });
    assert.throws(
      () => resolveEvaluationOrder([comp], {}),
      (err: unknown) => {
        assert.ok(err instanceof CyclicDependencyError);
        assert.deepEqual(err.cycle, ["P|A", "P|B", "P|A"]);
        assert.equal(err.code, "DEPENDENCY_CYCLE");
        return true;
      },
    );
  });

  it("rejects references between components with different lifetimes", () => {
    const comp = createComponent({
      name: "Pump",
      lifetime: 4,
      cashflows: [createRecurring({ name: "Power", alpha: 1, driver: "Storage|Tank" })],
    });
    assert.throws(() => resolveEvaluationOrder([storage, comp], {}), LifetimeMismatchError);
  });

  it("requires named multipliers among the variables", () => {
    const comp = createComponent({
      name: "Plant",
      lifetime: 3,
      cashflows: [createRecurring({ name: "Sales", alpha: 1, driver: 1, multiplier: "price" })],
    });
    assert.throws(() => resolveEvaluationOrder([comp], {}), MissingMultiplierError);
    assert.deepEqual(resolveEvaluationOrder([comp], { price: 3 }), ["Plant|Sales"]);
  });

  it("accepts variable drivers of length 1 or lifetime + 1 only", () => {
    assert.throws(
      () => resolveEvaluationOrder([plant], { load: [1, 2, 3] }),
      (err: unknown) => {
        assert.ok(err instanceof DriverLengthMismatchError);
        assert.equal(err.entries, 3);
        assert.equal(err.lifetime, 3);
        return true;
      },
    );
    assert.doesNotThrow(() => resolveEvaluationOrder([plant], { load: [5] }));
  });

  it("rejects drivers found neither among variables nor cash flows", () => {
    assert.throws(() => resolveEvaluationOrder([plant], {}), UnresolvedDriverError);
    assert.throws(() => resolveEvaluationOrder([grid], { load: 1 }), UnresolvedDriverError);
  });
});

// ---------------------------------------------------------------------------
// Component selection
// ---------------------------------------------------------------------------

describe("requiredComponents", () => {
  it("adds components reached through drivers and drops the rest", () => {
    const settings = createGlobalSettings({ discountRate: 0.1, indicators: ["NPV"], active: ["Grid|Line"] });
    const names = requiredComponents(settings, [plant, grid, storage]).map((c) => c.name);
    assert.deepEqual(names, ["Plant", "Grid"]);
  });
});
