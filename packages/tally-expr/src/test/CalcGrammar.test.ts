import { expect, test } from "vitest";
import { testParse } from "mini-parse/test-util";
import {
  expr,
  functionCall,
  infixOperator,
  parseTokenTree,
  unaryMinus,
} from "../CalcGrammar.js";
import { calcTokens } from "../CalcTokens.js";
import { tokenTreeToString, type TokenNode } from "../TokenTree.js";

function tree(src: string): TokenNode {
  const result = parseTokenTree(src);
  if (result.kind !== "tree") {
    throw new Error(result.failure.message);
  }
  return result.tree;
}

test("binary operation is a flat sequence", () => {
  expect(tokenTreeToString(tree("2+5"))).eq(
    "equation(expr(number '2', add '+', number '5'))"
  );
});

test("group nests an expr", () => {
  expect(tokenTreeToString(tree("-2 * (3)"))).eq(
    "equation(expr(unary_minus '-', number '2', " +
      "multiply '*', expr(number '3')))"
  );
});

test("function call with arguments", () => {
  const expected =
    "equation(expr(function(function_name 'f', function_args(" +
    "expr(number '1'), expr(function(function_name 'g', function_args()))" +
    "))))";
  expect(tokenTreeToString(tree("f(1, g())"))).eq(expected);
});

test("equation holds one expr", () => {
  const equation = tree("1 + 2 * 3");
  expect(equation.kind).eq("equation");
  expect(equation.children.length).eq(1);
  expect(equation.children[0].children.map((n) => n.kind)).deep.eq([
    "number",
    "add",
    "number",
    "multiply",
    "number",
  ]);
});

test("leaf nodes span their token", () => {
  const [number] = tree("  12.5 ").children[0].children;
  expect(number).deep.eq({
    kind: "number",
    text: "12.5",
    start: 2,
    end: 6,
    children: [],
  });
});

test("minus in operand position is unary", () => {
  const { parsed } = testParse(unaryMinus, "-", calcTokens);
  expect(parsed?.value.kind).eq("unary_minus");
});

test("infix operators", () => {
  const kinds = ["+", "-", "*", "/", "%", "^"].map(
    (src) => testParse(infixOperator, src, calcTokens).parsed?.value.kind
  );
  expect(kinds).deep.eq([
    "add",
    "subtract",
    "multiply",
    "divide",
    "modulo",
    "power",
  ]);
});

test("function call without arguments", () => {
  const { parsed } = testParse(functionCall, "now()", calcTokens);
  expect(parsed && tokenTreeToString(parsed.value)).eq(
    "function(function_name 'now', function_args())"
  );
});

test("expr stops before an unmatched paren", () => {
  const { parsed, position } = testParse(expr, "1 - 2) * 3", calcTokens);
  expect(parsed?.value.text).eq("1 - 2");
  expect(position).eq(5);
});

test("token tree failure reports furthest position", () => {
  const result = parseTokenTree("1 + * 2");
  expect(result.kind).eq("syntaxError");
  if (result.kind === "syntaxError") {
    expect(result.failure.position).eq(4);
    expect(result.failure.found).eq("'*'");
  }
});

test("nested parentheses beyond the depth limit", () => {
  const result = parseTokenTree("(((1)))", { maxNestingDepth: 2 });
  expect(result).deep.eq({
    kind: "limitExceeded",
    failure: {
      limit: "nestingDepth",
      message: "nesting depth limit (2) exceeded",
      position: 3,
    },
  });
});

test("nesting depth counts function arguments", () => {
  expect(parseTokenTree("f(g(1))", { maxNestingDepth: 2 }).kind).eq("tree");
  expect(parseTokenTree("f(g(h(1)))", { maxNestingDepth: 2 }).kind).eq(
    "limitExceeded"
  );
});
