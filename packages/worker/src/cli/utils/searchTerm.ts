import { collapseWhitespace } from "@quotegraph/core";

const CURLY_DOUBLE_RE = /[“”„«»]/g;
const CURLY_SINGLE_RE = /[‘’‚]/g;
const WRAPPED_RE = /^"([^"]*)"$/;
// an apostrophe with no letter on one side; `Pudd'nhead` keeps its own
const LOOSE_APOSTROPHE_RE = /(^|\s)'+|'+(?=\s|$)/g;

/**
 * Cleans a term pasted from a quote page before it reaches the store: curly
 * quotes become straight ones, quotes wrapping the whole term are dropped,
 * an unbalanced edge quote is dropped, and whitespace is collapsed.
 */
export function normalizeSearchTerm(input: string): string {
  let term = collapseWhitespace(input.replace(CURLY_DOUBLE_RE, '"').replace(CURLY_SINGLE_RE, "'"));

  const wrapped = term.match(WRAPPED_RE);
  if (wrapped) term = wrapped[1];
  if ((term.match(/"/g) ?? []).length % 2 !== 0) term = term.replace(/^"|"$/g, "");

  return collapseWhitespace(term.replace(LOOSE_APOSTROPHE_RE, "$1"));
}
