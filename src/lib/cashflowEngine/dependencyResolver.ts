/**
 * Cashflow Engine — Dependency Resolver
 *
 * Builds the driver graph over cash flows and returns an evaluation order:
 * - Named multipliers must exist among the variables
 * - Literal drivers add no edge
 * - Variable drivers must hold 1 or lifetime + 1 entries
 * - "Component|CashFlow" drivers add an edge and require equal lifetimes
 *
 * Order is a DFS topological sort that follows declaration order, so an
 * unconstrained definition evaluates top to bottom.
 */

import type { CashFlow, CashflowId, Component, GlobalSettings, VariableValue, Variables } from "@/lib/cashflowModel";
import {
  CyclicDependencyError,
  DriverLengthMismatchError,
  LifetimeMismatchError,
  MissingMultiplierError,
  UnresolvedDriverError,
  cashflowId,
  describeDriver,
  findCashflow,
  isActiveCashflow,
} from "@/lib/cashflowModel";

export function isSeries<T>(value: VariableValue<T>): value is readonly T[] {
  return Array.isArray(value);
}

export function variableLength<T>(value: VariableValue<T>): number {
  return isSeries(value) ? value.length : 1;
}

interface GraphNode {
  id: CashflowId;
  dependsOn: CashflowId[];
}

// ---------------------------------------------------------------------------
// Edge construction
// ---------------------------------------------------------------------------

function dependenciesOf<T>(
  comp: Component,
  cf: CashFlow,
  byName: ReadonlyMap<string, Component>,
  variables: Variables<T>,
): CashflowId[] {
  if (cf.multiplier.kind === "variable" && !(cf.multiplier.name in variables)) {
    throw new MissingMultiplierError(comp.name, cf.multiplier.name);
  }

  const driver = cf.driver;
  if (!driver || driver.kind === "literal") return [];

  if (driver.kind === "variable") {
    const value = variables[driver.name];
    if (value === undefined) throw new UnresolvedDriverError(comp.name, cf.name, driver.name);
    const entries = variableLength(value);
    if (entries !== 1 && entries !== comp.lifetime + 1) {
      throw new DriverLengthMismatchError(comp.name, cf.name, driver.name, entries, comp.lifetime);
    }
    return [];
  }

  const target = byName.get(driver.component);
  if (!target || !findCashflow(target, driver.cashflow)) {
    throw new UnresolvedDriverError(comp.name, cf.name, describeDriver(driver));
  }
  const self = cashflowId(comp.name, cf.name);
  const dep = cashflowId(driver.component, driver.cashflow);
  if (dep === self) throw new CyclicDependencyError([self, self]);
  if (target.lifetime !== comp.lifetime) throw new LifetimeMismatchError(comp.name, target.name);
  return [dep];
}

// ---------------------------------------------------------------------------
// Topological sort
// ---------------------------------------------------------------------------

function topologicalSort(nodes: GraphNode[]): CashflowId[] {
  const byId = new Map<CashflowId, GraphNode>();
  for (const n of nodes) byId.set(n.id, n);

  const visited = new Set<CashflowId>();
  const path: CashflowId[] = []; // current DFS stack, for cycle reporting
  const sorted: CashflowId[] = [];

  function visit(id: CashflowId): void {
    if (visited.has(id)) return;
    const onPath = path.indexOf(id);
    if (onPath >= 0) {
      throw new CyclicDependencyError([...path.slice(onPath), id]);
    }

    const node = byId.get(id);
    if (!node) return;

    path.push(id);
    for (const dep of node.dependsOn) visit(dep);
    path.pop();
    visited.add(id);
    sorted.push(id);
  }

  for (const n of nodes) visit(n.id);
  return sorted;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Order every cash flow of the given components so each one comes after
 * all cash flows it transitively depends on. Each id appears exactly once.
 */
export function resolveEvaluationOrder<T>(components: readonly Component[], variables: Variables<T>): CashflowId[] {
  const byName = new Map(components.map((c) => [c.name, c]));
  const nodes: GraphNode[] = [];
  for (const comp of components) {
    for (const cf of comp.cashflows) {
      nodes.push({ id: cashflowId(comp.name, cf.name), dependsOn: dependenciesOf(comp, cf, byName, variables) });
    }
  }
  return topologicalSort(nodes);
}

/**
 * Components owning an active cash flow, plus every component their
 * drivers reach, in declaration order.
 */
export function requiredComponents(settings: GlobalSettings, components: readonly Component[]): Component[] {
  const byName = new Map(components.map((c) => [c.name, c]));
  const needed = new Set<string>();
  const queue = components
    .filter((comp) => comp.cashflows.some((cf) => isActiveCashflow(settings, comp.name, cf)))
    .map((comp) => comp.name);

  while (queue.length > 0) {
    const name = queue.pop();
    if (name === undefined || needed.has(name)) continue;
    needed.add(name);
    for (const cf of byName.get(name)?.cashflows ?? []) {
      if (cf.driver?.kind === "cashflow" && byName.has(cf.driver.component)) queue.push(cf.driver.component);
    }
  }
  return components.filter((comp) => needed.has(comp.name));
}
