export const QUOTE_CONSTANTS = {
  AUTHOR_HEADING_LEVEL: 2,
  PROGRESS_EVERY_PAGES: 100,
  CONTENT_NAMESPACE: "0",
};

/** Top-level list markers that introduce a quotation. */
export const QUOTE_BULLETS = ["*", "#"] as const;

/** Characters that open a list item; a second one after the first makes a sub-item. */
export const LIST_MARKER_CHARS = "*#:;";

export const REDIRECT_RE = /^\s*#redirect\b/i;
/** Opening run, text, closing run; the runs may differ in length. */
export const HEADING_RE = /^(={1,6})(.+?)(={1,6})$/;

/**
 * Attribution keywords, tried in order against the stripped sub-item text.
 * The first group needs a colon after the keyword; the second a space.
 */
export const ATTRIBUTION_PATTERNS: RegExp[] = [
  /^(?:source|from|in)\s*:\s*/i,
  /^(?:as quoted in|quoted in|cited in|reported in)\s+/i,
];

export const NON_CONTENT_LINK_PREFIXES = ["file", "image", "category"];
