import { decimalNumeral } from "./CalcTokens.js";
import { InternalParseError } from "./ExprErrors.js";
import {
  binOpExpr,
  functionExpr,
  numberExpr,
  unaryMinusExpr,
  type BinaryOp,
  type Expr,
} from "./Expr.js";
import type { NodeKind, OperatorKind, TokenNode } from "./TokenTree.js";

/** Precedence climbing over the flat operator/operand sequences
 * in the token tree.
 *
 * Each expr node holds: prefixed (operator prefixed)*
 * where prefixed is any number of unary_minus nodes followed by a primary
 * (number, function, or a nested expr node for a parenthesized group).
 */

export type Associativity = "left" | "right";

export interface InfixRule {
  op: BinaryOp;

  /** higher binds tighter */
  precedence: number;

  associativity: Associativity;
}

export const infixRules: Readonly<Record<OperatorKind, InfixRule>> = {
  add: { op: "add", precedence: 1, associativity: "left" },
  subtract: { op: "subtract", precedence: 1, associativity: "left" },
  multiply: { op: "multiply", precedence: 2, associativity: "left" },
  divide: { op: "divide", precedence: 2, associativity: "left" },
  modulo: { op: "modulo", precedence: 2, associativity: "left" },
  power: { op: "power", precedence: 3, associativity: "right" },
};

/** prefix operators bind tighter than any infix operator, so -2^2 is (-2)^2 */
export const prefixRules = {
  unary_minus: { precedence: 4, wrap: unaryMinusExpr },
} as const;

/** convert the token tree for a whole equation */
export function exprFromTokenTree(equation: TokenNode): Expr {
  const { kind, children } = equation;
  if (kind !== "equation" || children.length !== 1) {
    const found = `${kind} with ${children.length} children`;
    throw new InternalParseError(
      `expected equation holding one expr, found ${found}`
    );
  }
  return exprFromNode(children[0]);
}

/** convert an expr node (a whole equation, a group, or a function argument) */
export function exprFromNode(node: TokenNode): Expr {
  if (node.kind !== "expr") throw unexpected("expr", node);
  return exprFromNodes(node.children);
}

/** convert the operator/operand sequence from an expr node */
export function exprFromNodes(nodes: readonly TokenNode[]): Expr {
  return climb(new NodeCursor(nodes), 0);
}

class NodeCursor {
  private index = 0;

  constructor(private readonly nodes: readonly TokenNode[]) {}

  peek(): TokenNode | undefined {
    return this.nodes[this.index];
  }

  next(): TokenNode | undefined {
    const node = this.peek();
    if (node) this.index++;
    return node;
  }
}

/** parse an operand and the operators that follow it,
 * stopping at an operator that binds less tightly than minPrecedence */
function climb(cursor: NodeCursor, minPrecedence: number): Expr {
  let lhs = prefixed(cursor);
  for (let node = cursor.peek(); node; node = cursor.peek()) {
    const rule = infixRule(node);
    if (rule.precedence < minPrecedence) break;
    cursor.next();

    const { precedence, associativity } = rule;
    const rhsPrecedence =
      associativity === "left" ? precedence + 1 : precedence;
    const rhs = climb(cursor, rhsPrecedence);
    lhs = binOpExpr(lhs, rule.op, rhs);
  }
  return lhs;
}

function prefixed(cursor: NodeCursor): Expr {
  let minuses = 0;
  while (cursor.peek()?.kind === "unary_minus") {
    cursor.next();
    minuses++;
  }

  if (minuses === 0) {
    const node = cursor.next();
    if (!node) {
      throw new InternalParseError("expected operand, found end of expr");
    }
    return primary(node);
  }

  const { precedence, wrap } = prefixRules.unary_minus;
  let operand = climb(cursor, precedence);
  for (let i = 0; i < minuses; i++) {
    operand = wrap(operand);
  }
  return operand;
}

function primary(node: TokenNode): Expr {
  switch (node.kind) {
    case "number":
      return numberExpr(numberValue(node));
    case "expr":
      return exprFromNodes(node.children);
    case "function":
      return functionCall(node);
    default:
      throw unexpected("primary", node);
  }
}

function numberValue(node: TokenNode): number {
  const { text } = node;
  if (!decimalNumeral.test(text)) {
    throw new InternalParseError(`number '${text}' is not numeric`);
  }
  return Number(text);
}

function functionCall(node: TokenNode): Expr {
  const { children } = node;
  if (children.length !== 2) {
    throw new InternalParseError(
      `expected function name and args, found ${children.length} children`
    );
  }
  const [name, args] = children;
  if (name.kind !== "function_name") throw unexpected("function_name", name);
  if (args.kind !== "function_args") throw unexpected("function_args", args);

  return functionExpr(name.text, args.children.map(exprFromNode));
}

function infixRule(node: TokenNode): InfixRule {
  if (isOperatorKind(node.kind)) return infixRules[node.kind];
  throw unexpected("infix operator", node);
}

function isOperatorKind(kind: NodeKind): kind is OperatorKind {
  return Object.hasOwn(infixRules, kind);
}

function unexpected(expected: string, node: TokenNode): InternalParseError {
  return new InternalParseError(
    `expected ${expected}, found ${node.kind} '${node.text}'`
  );
}
