import { MarkupRule, replaceUntilStable } from "../MarkupRule";

const ENTITIES: Record<string, string> = {
  quot: '"',
  amp: "&",
  lt: "<",
  gt: ">",
  apos: "'",
  nbsp: " ",
};

export class HtmlCommentRule implements MarkupRule {
  name = "htmlComment" as const;

  apply(text: string): string {
    // an unterminated comment hides the rest of the line
    return text.replace(/<!--[\s\S]*?(?:-->|$)/g, "");
  }
}

export class HtmlEntityRule implements MarkupRule {
  name = "htmlEntity" as const;

  apply(text: string): string {
    return replaceUntilStable(text, /&(quot|amp|lt|gt|apos|nbsp);/g, (_m, entity) => ENTITIES[entity] ?? "");
  }
}

export class HtmlTagRule implements MarkupRule {
  name = "htmlTag" as const;

  apply(text: string): string {
    // innermost first: removing `<b>` from `<<b>b>` exposes another tag
    return replaceUntilStable(text, /<\/?[a-zA-Z][^<>]*>/g, () => "");
  }
}
