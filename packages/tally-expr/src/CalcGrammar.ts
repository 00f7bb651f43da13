import {
  matchingLexer,
  opt,
  or,
  repeat,
  seq,
  simpleParser,
  type Parser,
  type ParserContext,
  type TraceOptions,
} from "mini-parse";
import { calcTokens } from "./CalcTokens.js";
import type { LimitFailure, SyntaxFailure } from "./ExprErrors.js";
import { ParseState, parseState, type FailureRecord } from "./ParseState.js";
import { makeNode, type OperatorKind, type TokenNode } from "./TokenTree.js";

/** Grammar for arithmetic expressions.
 *
 * The grammar only recognizes the structure of the text,
 * operators and operands are collected into a flat sequence in an expr node.
 * Precedence and associativity are resolved afterwards, by exprFromTokenTree().
 *
 *  equation      = expr EOF
 *  expr          = prefixed (infix_operator prefixed)*
 *  prefixed      = unary_minus* primary
 *  primary       = number | function | '(' expr ')'
 *  function      = function_name '(' function_args ')'
 *  function_args = (expr (',' expr)*)?
 */

type LexedToken = ReturnType<ParserContext["lexer"]["next"]>;

/**
 * Match one token.
 *
 * Tokens that don't match are noted in the ParseState (if the parse has one),
 * so that a failed parse can report what was expected.
 * @param expected description of the token for failure messages
 */
function terminal(
  traceName: string,
  expected: string,
  accept: (token: LexedToken) => boolean
): Parser<string> {
  return simpleParser(traceName, (ctx: ParserContext): string | null => {
    const { lexer } = ctx;
    const state = parseState(ctx);
    if (state && !state.step(lexer.position())) return null;

    const token = lexer.next();
    if (accept(token)) return token?.text ?? "";

    const end = lexer.position();
    state?.noteExpected(token ? end - token.text.length : end, expected);
    return null;
  });
}

function tokenKind(kind: string): Parser<string> {
  return terminal(`kind ${kind}`, kind, (t) => t?.kind === kind);
}

function symbol(sym: string): Parser<string> {
  const quotedSym = quoted(sym);
  return terminal(`text ${quotedSym}`, quotedSym, (t) => t?.text === sym);
}

/** matches only if no tokens remain (trailing ws is skipped) */
const endOfInput = terminal("endOfInput", "end of input", (t) => !t);

const lParen = symbol("(");
const rParen = symbol(")");
const comma = symbol(",");

/** an expr inside parentheses, counted against the nesting depth limit */
const nestedExpr: Parser<TokenNode> = simpleParser("nested", (ctx) => {
  const state = parseState(ctx);
  if (state && !state.enter(ctx.lexer.position())) return null;
  try {
    return expr._run(ctx)?.value ?? null;
  } finally {
    state?.leave();
  }
});

function operator(
  sym: string,
  nodeKind: OperatorKind | "unary_minus"
): Parser<TokenNode> {
  return symbol(sym)
    .map((r) => makeNode(nodeKind, r))
    .traceName(nodeKind);
}

export const number = tokenKind(calcTokens.number)
  .map((r) => makeNode("number", r))
  .traceName("number");

export const unaryMinus = operator("-", "unary_minus");

export const infixOperator = or(
  operator("+", "add"),
  operator("-", "subtract"),
  operator("*", "multiply"),
  operator("/", "divide"),
  operator("%", "modulo"),
  operator("^", "power")
).traceName("infix_operator");

const functionName = tokenKind(calcTokens.identifier)
  .map((r) => makeNode("function_name", r))
  .traceName("function_name");

const argList = seq(nestedExpr, repeat(seq(comma, nestedExpr)))
  .map((r) => {
    const [first, rest] = r.value;
    const args = [first, ...rest.map(([, arg]) => arg)];
    return makeNode("function_args", r, args);
  })
  .traceName("function_args");

export const functionCall = seq(functionName, lParen, opt(argList), rParen)
  .map((r) => {
    const [name, , args] = r.value;
    // empty args span the closing paren's start
    const emptyAt = r.end - 1;
    const emptySpan = { src: r.src, start: emptyAt, end: emptyAt };
    return makeNode("function", r, [
      name,
      args ?? makeNode("function_args", emptySpan),
    ]);
  })
  .traceName("function");

/** a parenthesized group is an expr node nested in the enclosing sequence */
const group = seq(lParen, nestedExpr, rParen)
  .map((r) => r.value[1])
  .traceName("group");

const primary = or(number, functionCall, group).traceName("primary");

const prefixed = seq(repeat(unaryMinus), primary)
  .map((r) => {
    const [minuses, operand] = r.value;
    return [...minuses, operand];
  })
  .traceName("prefixed");

export const expr: Parser<TokenNode> = seq(
  prefixed,
  repeat(seq(infixOperator, prefixed))
)
  .map((r) => {
    const [first, rest] = r.value;
    const operations = rest.flatMap(([op, operand]) => [op, ...operand]);
    return makeNode("expr", r, [...first, ...operations]);
  })
  .traceName("expr");

export const equation = seq(expr, endOfInput)
  .map((r) => makeNode("equation", r, [r.value[0]]))
  .traceName("equation");

export const defaultMaxNestingDepth = 64;

export interface GrammarOptions {
  /** fail after this many token match attempts */
  maxParseCount?: number;

  /** fail on parentheses nested deeper than this (default 64) */
  maxNestingDepth?: number;

  /** trace the grammar rules
   * (tracing must also be enabled with enableTracing()) */
  trace?: TraceOptions;
}

export type TokenTreeResult =
  | { kind: "tree"; tree: TokenNode }
  | { kind: "syntaxError"; failure: SyntaxFailure }
  | { kind: "limitExceeded"; failure: LimitFailure };

/** recognize an entire src text as an equation */
export function parseTokenTree(
  src: string,
  opts: GrammarOptions = {}
): TokenTreeResult {
  const { maxParseCount, trace } = opts;
  const { maxNestingDepth = defaultMaxNestingDepth } = opts;
  const state = new ParseState({ maxParseCount, maxNestingDepth });
  const app = { context: undefined, state };
  const lexer = matchingLexer(src, calcTokens);
  const root = trace ? equation.trace(trace) : equation;

  const parsed = root.parse({ lexer, app });
  if (state.limitHit) {
    return { kind: "limitExceeded", failure: state.limitHit };
  }
  if (parsed) {
    return { kind: "tree", tree: parsed.value };
  }
  return { kind: "syntaxError", failure: syntaxFailure(src, state.failure) };
}

function syntaxFailure(src: string, record: FailureRecord): SyntaxFailure {
  const position = Math.max(record.position, 0);
  const expected = [...record.expected];
  const found = foundAt(src, position);

  const message = expected.length
    ? `unexpected ${found}, expected ${alternatives(expected)}`
    : `unexpected ${found}`;
  return { message, position, found, expected };
}

/** describe the token at a src position */
function foundAt(src: string, position: number): string {
  const lexer = matchingLexer(src, calcTokens);
  lexer.position(position);
  const token = lexer.next();
  if (!token) return "end of input";

  const codePoint = src.codePointAt(position);
  if (token.kind === calcTokens.invalid && codePoint !== undefined) {
    return quoted(String.fromCodePoint(codePoint));
  }
  return quoted(token.text);
}

function quoted(text: string): string {
  return `'${text}'`;
}

/** @return "a", "a or b", "a, b or c" */
function alternatives(descriptions: string[]): string {
  const last = descriptions[descriptions.length - 1];
  if (descriptions.length === 1) return last;
  return `${descriptions.slice(0, -1).join(", ")} or ${last}`;
}
