import { MarkupRule } from "./MarkupRule";
import { EmphasisRule } from "./rules/EmphasisRule";
import { HtmlCommentRule, HtmlEntityRule, HtmlTagRule } from "./rules/htmlRules";
import { ExternalLinkRule, WikiLinkRule } from "./rules/linkRules";
import { TemplateRule } from "./rules/TemplateRule";
import { EnclosingQuotesRule, WhitespaceRule } from "./rules/textRules";

export const DEFAULT_RULES: readonly MarkupRule[] = [
  new HtmlCommentRule(),
  new HtmlEntityRule(),
  new WikiLinkRule(),
  new ExternalLinkRule(),
  new EmphasisRule(),
  new TemplateRule(),
  new HtmlTagRule(),
  new WhitespaceRule(),
  new EnclosingQuotesRule(),
];

export function applyRules(text: string, rules: readonly MarkupRule[]): string {
  return rules.reduce((acc, rule) => rule.apply(acc), text);
}

/**
 * Runs the rule list until the text stops changing, so markup uncovered by a
 * later rule (a link inside a tag, an entity spelling out `''`) is stripped too.
 * No rule lengthens its input, so this terminates.
 */
export function stripMarkup(text: string, rules: readonly MarkupRule[] = DEFAULT_RULES): string {
  let current = text;
  for (;;) {
    const next = applyRules(current, rules);
    if (next === current) return current;
    current = next;
  }
}
