import { matchOneOf, tokenMatcher } from "mini-parse";

/** token matchers for arithmetic expressions */

const numeral = /\d+(?:\.\d+)?/;

/** matches the complete text of a number token */
export const decimalNumeral = new RegExp(`^(?:${numeral.source})$`);

const symbolSet = "+ - * / % ^ ( ) ,";

export const calcTokens = tokenMatcher({
  number: numeral,
  identifier: /[a-zA-Z_]\w*/,
  symbol: matchOneOf(symbolSet),
  ws: /\s+/,
  invalid: /[^]/, // any character not matched above
});
