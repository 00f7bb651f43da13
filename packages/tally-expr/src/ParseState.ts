import type { ParserContext } from "mini-parse";
import type { LimitFailure } from "./ExprErrors.js";

/**
 * The furthest position at which a token failed to match,
 * and descriptions of the tokens that were tried there.
 */
export interface FailureRecord {
  /** -1 until some token fails to match */
  position: number;
  expected: string[];
}

export interface ParseLimits {
  /** fail after this many token match attempts */
  maxParseCount?: number;

  /** fail on groups or argument lists nested deeper than this */
  maxNestingDepth: number;
}

/** Bookkeeping for one parse, shared by the grammar's terminal parsers
 * through the parser app state. */
export class ParseState {
  readonly failure: FailureRecord = { position: -1, expected: [] };

  /** set once a limit is reached, after which every token match fails */
  limitHit: LimitFailure | undefined;

  private steps = 0;
  private depth = 0;

  constructor(readonly limits: ParseLimits) {}

  /** count a token match attempt
   * @return false if a limit has been reached */
  step(position: number): boolean {
    if (this.limitHit) return false;

    const { maxParseCount } = this.limits;
    this.steps++;
    if (maxParseCount !== undefined && this.steps > maxParseCount) {
      const message = `parse step limit (${maxParseCount}) exceeded`;
      this.limitHit = { limit: "parseSteps", message, position };
      return false;
    }
    return true;
  }

  /** enter a nested expr, call leave() after if this returns true */
  enter(position: number): boolean {
    if (this.limitHit) return false;

    const { maxNestingDepth } = this.limits;
    if (this.depth >= maxNestingDepth) {
      const message = `nesting depth limit (${maxNestingDepth}) exceeded`;
      this.limitHit = { limit: "nestingDepth", message, position };
      return false;
    }
    this.depth++;
    return true;
  }

  leave(): void {
    this.depth--;
  }

  /**
   * Record that a token was expected at a src position.
   *
   * Only the furthest position is kept. Descriptions noted at that position
   * accumulate in the order they were tried.
   */
  noteExpected(position: number, expected: string): void {
    const { failure } = this;
    if (position > failure.position) {
      failure.position = position;
      failure.expected = [expected];
    } else if (
      position === failure.position &&
      !failure.expected.includes(expected)
    ) {
      failure.expected.push(expected);
    }
  }
}

/** @return the ParseState for the current parse, if the parse has one */
export function parseState(ctx: ParserContext): ParseState | undefined {
  const state: unknown = ctx.app.state;
  return state instanceof ParseState ? state : undefined;
}
