import { srcLog } from "mini-parse";
import { parseTokenTree, type GrammarOptions } from "./CalcGrammar.js";
import {
  ExprLimitError,
  ExprSyntaxError,
  type LimitFailure,
  type SyntaxFailure,
} from "./ExprErrors.js";
import type { Expr } from "./Expr.js";
import { exprFromTokenTree } from "./PrattParser.js";

export interface ExprParseOptions extends GrammarOptions {
  /** log failures along with the src line (default true) */
  logErrors?: boolean;
}

export type ExprParseResult =
  | { kind: "expr"; expr: Expr }
  | { kind: "syntaxError"; failure: SyntaxFailure }
  | { kind: "limitExceeded"; failure: LimitFailure };

/**
 * Parse an arithmetic expression.
 *
 * Syntax failures and exceeded limits are returned
 * (and logged unless logErrors is false).
 * A malformed token tree from the grammar throws InternalParseError.
 */
export function parseExpression(
  src: string,
  opts: ExprParseOptions = {}
): ExprParseResult {
  const { logErrors = true } = opts;
  const parsed = parseTokenTree(src, opts);
  if (parsed.kind !== "tree") {
    const { failure } = parsed;
    if (logErrors) srcLog(src, failure.position, failure.message);
    return parsed;
  }

  return { kind: "expr", expr: exprFromTokenTree(parsed.tree) };
}

/** parse an arithmetic expression,
 * throwing ExprSyntaxError or ExprLimitError if the src doesn't parse */
export function parseExpr(src: string, opts: ExprParseOptions = {}): Expr {
  const result = parseExpression(src, opts);
  switch (result.kind) {
    case "syntaxError":
      throw new ExprSyntaxError(result.failure);
    case "limitExceeded":
      throw new ExprLimitError(result.failure);
    default:
      return result.expr;
  }
}
