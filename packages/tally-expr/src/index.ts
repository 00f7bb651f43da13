export * from "./CalcGrammar.js";
export * from "./CalcTokens.js";
export * from "./Expr.js";
export * from "./ExprErrors.js";
export * from "./ParseExpression.js";
export * from "./ParseState.js";
export * from "./PrattParser.js";
export * from "./TokenTree.js";
