import { MarkupRule, replaceUntilStable } from "../MarkupRule";

export class TemplateRule implements MarkupRule {
  name = "template" as const;

  apply(text: string): string {
    return replaceUntilStable(text, /\{\{[^{}]*\}\}/g, () => "");
  }
}
