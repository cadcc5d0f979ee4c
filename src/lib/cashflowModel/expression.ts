/**
 * Cashflow Model — Symbolic Expressions
 *
 * Deferred-evaluation values for embedding cash flows in an external
 * optimization model. Variables stay named; constants fold eagerly so
 * years that are structurally zero stay literally zero.
 */

import type { Arithmetic } from "./arithmetic";

export type ExprOp = "add" | "sub" | "mul" | "div" | "pow";

export type Expr =
  | { readonly kind: "const"; readonly value: number }
  | { readonly kind: "var"; readonly name: string }
  | { readonly kind: "op"; readonly op: ExprOp; readonly left: Expr; readonly right: Expr };

export function constant(value: number): Expr {
  return { kind: "const", value };
}

export function variable(name: string): Expr {
  return { kind: "var", name };
}

const ZERO = constant(0);
const ONE = constant(1);

function isConst(e: Expr, value: number): boolean {
  return e.kind === "const" && e.value === value;
}

function fold(op: ExprOp, a: number, b: number): number {
  switch (op) {
    case "add":
      return a + b;
    case "sub":
      return a - b;
    case "mul":
      return a * b;
    case "div":
      return a / b;
    case "pow":
      return Math.pow(a, b);
  }
}

function build(op: ExprOp, left: Expr, right: Expr): Expr {
  if (left.kind === "const" && right.kind === "const") {
    return constant(fold(op, left.value, right.value));
  }
  switch (op) {
    case "add":
      if (isConst(left, 0)) return right;
      if (isConst(right, 0)) return left;
      break;
    case "sub":
      if (isConst(right, 0)) return left;
      break;
    case "mul":
      if (isConst(left, 0) || isConst(right, 0)) return ZERO;
      if (isConst(left, 1)) return right;
      if (isConst(right, 1)) return left;
      break;
    case "div":
      if (isConst(left, 0)) return ZERO;
      if (isConst(right, 1)) return left;
      break;
    case "pow":
      if (isConst(right, 1)) return left;
      if (isConst(right, 0)) return ONE;
      break;
  }
  return { kind: "op", op, left, right };
}

export const symbolicArithmetic: Arithmetic<Expr> = {
  zero: ZERO,
  one: ONE,
  lift: constant,
  add: (a, b) => build("add", a, b),
  sub: (a, b) => build("sub", a, b),
  mul: (a, b) => build("mul", a, b),
  div: (a, b) => build("div", a, b),
  pow: (a, b) => build("pow", a, b),
  neg: (a) => build("mul", constant(-1), a),
  isZero: (a) => isConst(a, 0),
};

/**
 * Evaluate an expression against variable bindings.
 * Throws when a variable has no binding.
 */
export function evaluateExpression(expr: Expr, bindings: Readonly<Record<string, number>>): number {
  switch (expr.kind) {
    case "const":
      return expr.value;
    case "var": {
      const value = bindings[expr.name];
      if (value === undefined) {
        throw new Error(`Unbound variable in expression: ${expr.name}`);
      }
      return value;
    }
    case "op":
      return fold(expr.op, evaluateExpression(expr.left, bindings), evaluateExpression(expr.right, bindings));
  }
}

const SYMBOLS: Record<ExprOp, string> = { add: "+", sub: "-", mul: "*", div: "/", pow: "**" };

export function renderExpression(expr: Expr): string {
  switch (expr.kind) {
    case "const":
      return String(expr.value);
    case "var":
      return expr.name;
    case "op":
      return `(${renderExpression(expr.left)} ${SYMBOLS[expr.op]} ${renderExpression(expr.right)})`;
  }
}

/** Names of every variable referenced by the expression, in first-seen order. */
export function expressionVariables(expr: Expr): string[] {
  const seen = new Set<string>();
  const walk = (e: Expr): void => {
    if (e.kind === "var") seen.add(e.name);
    else if (e.kind === "op") {
      walk(e.left);
      walk(e.right);
    }
  };
  walk(expr);
  return [...seen];
}
