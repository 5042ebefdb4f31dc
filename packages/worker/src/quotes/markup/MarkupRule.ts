export type MarkupRuleName =
  | "htmlComment"
  | "htmlEntity"
  | "wikiLink"
  | "externalLink"
  | "emphasis"
  | "template"
  | "htmlTag"
  | "whitespace"
  | "enclosingQuotes";

/** One independent text rewrite; rules are composed in a fixed order by `stripMarkup`. */
export interface MarkupRule {
  name: MarkupRuleName;
  apply(text: string): string;
}

export function replaceUntilStable(text: string, re: RegExp, replacer: (match: string, ...groups: string[]) => string): string {
  let current = text;
  for (;;) {
    const next = current.replace(re, replacer);
    if (next === current) return current;
    current = next;
  }
}
