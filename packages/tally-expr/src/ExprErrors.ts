/** Why the expression grammar rejected a src text. */
export interface SyntaxFailure {
  /** e.g. "unexpected ')', expected number or '('" */
  message: string;

  /** furthest src position the grammar reached */
  position: number;

  /** token or character found at the position, or "end of input" */
  found: string;

  /** descriptions of the tokens tried at the position, in the order tried */
  expected: string[];
}

export type LimitKind = "parseSteps" | "nestingDepth";

/** The parse stopped at a configured limit, the text may well be valid. */
export interface LimitFailure {
  limit: LimitKind;

  /** e.g. "nesting depth limit (256) exceeded" */
  message: string;

  /** src position where the limit was reached */
  position: number;
}

/** thrown by parseExpr() for text the grammar doesn't accept */
export class ExprSyntaxError extends Error {
  readonly failure: SyntaxFailure;

  constructor(failure: SyntaxFailure) {
    super(failure.message);
    this.name = "ExprSyntaxError";
    this.failure = failure;
  }
}

/** thrown by parseExpr() when parsing stops at a step or nesting limit */
export class ExprLimitError extends Error {
  readonly failure: LimitFailure;

  constructor(failure: LimitFailure) {
    super(failure.message);
    this.name = "ExprLimitError";
    this.failure = failure;
  }
}

/**
 * The token tree handed to the precedence parser doesn't have the shape
 * the grammar promises (an unknown node in an operator slot, a number
 * that isn't numeric..).
 */
export class InternalParseError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = "InternalParseError";
  }
}
