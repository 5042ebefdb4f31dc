const WHITESPACE_RE = /\s+/g;
const EDGE_PUNCTUATION_RE = /^[\p{P}\s]+|[\p{P}\s]+$/gu;

export function collapseWhitespace(input: string): string {
  return input.replace(WHITESPACE_RE, " ").trim();
}

/**
 * Canonical form of a display string used for duplicate detection:
 * lower-cased, whitespace collapsed, leading/trailing punctuation trimmed.
 * Applying it to its own output is a no-op.
 */
export function normalizeKey(input: string): string {
  let key = input.toLowerCase();
  key = collapseWhitespace(key);
  key = key.replace(EDGE_PUNCTUATION_RE, "");
  return key;
}
