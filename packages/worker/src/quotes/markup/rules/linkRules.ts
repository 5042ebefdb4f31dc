import { NON_CONTENT_LINK_PREFIXES } from "../../constants";
import { MarkupRule, replaceUntilStable } from "../MarkupRule";

function isNonContentTarget(target: string): boolean {
  const trimmed = target.trim();
  if (trimmed.startsWith(":")) return false;
  const colon = trimmed.indexOf(":");
  if (colon === -1) return false;
  return NON_CONTENT_LINK_PREFIXES.includes(trimmed.slice(0, colon).trim().toLowerCase());
}

export class WikiLinkRule implements MarkupRule {
  name = "wikiLink" as const;

  apply(text: string): string {
    // innermost first, so captions that contain links resolve before their parent
    return replaceUntilStable(text, /\[\[([^[\]|]*)(?:\|([^[\]]*))?\]\]/g, (_m, target: string, label?: string) => {
      if (isNonContentTarget(target)) return "";
      if (label !== undefined && label.trim()) return label;
      return target.replace(/^:/, "");
    });
  }
}

export class ExternalLinkRule implements MarkupRule {
  name = "externalLink" as const;

  apply(text: string): string {
    return text.replace(/\[(?:https?:|ftp:)?\/\/[^\s\]]+(?:\s+([^\]]*))?\]/g, (_m, label?: string) => (label ?? "").trim());
  }
}
