import { collapseWhitespace } from "@quotegraph/core";
import { MarkupRule } from "../MarkupRule";

export class WhitespaceRule implements MarkupRule {
  name = "whitespace" as const;

  apply(text: string): string {
    return collapseWhitespace(text);
  }
}

/** `"Quote."` → `Quote.` when the marks wrap the whole text and nothing inside is double-quoted. */
export class EnclosingQuotesRule implements MarkupRule {
  name = "enclosingQuotes" as const;

  apply(text: string): string {
    const match = text.match(/^["“„]([^"“”„]*)["”“]$/);
    return match ? match[1].trim() : text;
  }
}
