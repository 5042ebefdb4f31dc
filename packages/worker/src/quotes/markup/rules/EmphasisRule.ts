import { MarkupRule } from "../MarkupRule";

/** Bold (`'''`), italic (`''`) and bold-italic (`'''''`) delimiters; single apostrophes are text. */
export class EmphasisRule implements MarkupRule {
  name = "emphasis" as const;

  apply(text: string): string {
    return text.replace(/'{2,}/g, "");
  }
}
