/** Expression tree for arithmetic over floating point numbers */

export type Expr = NumberExpr | BinOpExpr | UnaryMinusExpr | FunctionExpr;

export type BinaryOp =
  | "add"
  | "subtract"
  | "multiply"
  | "divide"
  | "modulo"
  | "power";

export interface NumberExpr {
  readonly kind: "number";
  readonly value: number;
}

export interface BinOpExpr {
  readonly kind: "binOp";
  readonly lhs: Expr;
  readonly op: BinaryOp;
  readonly rhs: Expr;
}

export interface UnaryMinusExpr {
  readonly kind: "unaryMinus";
  readonly operand: Expr;
}

/** a call to a named function. names are not checked against any known set */
export interface FunctionExpr {
  readonly kind: "function";
  readonly name: string;
  readonly args: readonly Expr[];
}

export const opSymbols: Readonly<Record<BinaryOp, string>> = {
  add: "+",
  subtract: "-",
  multiply: "*",
  divide: "/",
  modulo: "%",
  power: "^",
};

export function numberExpr(value: number): NumberExpr {
  return { kind: "number", value };
}

export function binOpExpr(lhs: Expr, op: BinaryOp, rhs: Expr): BinOpExpr {
  return { kind: "binOp", lhs, op, rhs };
}

export function unaryMinusExpr(operand: Expr): UnaryMinusExpr {
  return { kind: "unaryMinus", operand };
}

export function functionExpr(
  name: string,
  args: readonly Expr[]
): FunctionExpr {
  return { kind: "function", name, args };
}

/**
 * Render an expression with explicit grouping:
 *  every binary operation is wrapped in parentheses,
 *  negation shows as -(operand), and calls as name(arg, arg).
 */
export function exprToString(expr: Expr): string {
  switch (expr.kind) {
    case "number":
      return String(expr.value);
    case "binOp": {
      const { lhs, op, rhs } = expr;
      return `(${exprToString(lhs)}${opSymbols[op]}${exprToString(rhs)})`;
    }
    case "unaryMinus":
      return `-(${exprToString(expr.operand)})`;
    case "function": {
      const args = expr.args.map(exprToString).join(", ");
      return `${expr.name}(${args})`;
    }
  }
}
