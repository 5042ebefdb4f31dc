import { ATTRIBUTION_PATTERNS } from "./constants";
import { isBoundary, parseListItem } from "./listItems";
import { stripMarkup } from "./markup/stripMarkup";
import { ExtractedTriple } from "./types/ExtractedTriple";
import { QuoteCandidate } from "./types/QuoteCandidate";
import { Segment } from "./types/Segment";
import { SourceResolution } from "./types/SourceResolution";

const LEADING_DASH_RE = /^[-–—~]\s*/;

/**
 * Source title carried by an attribution sub-item, or null when the line is not
 * one: it must sit exactly one list level below `quoteMarker` and, once markup
 * is stripped, start with an attribution keyword followed by a non-empty title.
 */
export function parseAttribution(line: string, quoteMarker: string): string | null {
  const item = parseListItem(line);
  if (!item || item.markers.length !== 2 || item.markers[0] !== quoteMarker) return null;

  const text = stripMarkup(item.content.trim().replace(LEADING_DASH_RE, "")).replace(LEADING_DASH_RE, "");
  for (const pattern of ATTRIBUTION_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const source = text.slice(match[0].length).replace(LEADING_DASH_RE, "").trim();
    return source || null;
  }
  return null;
}

/**
 * Looks below the quote line for its attribution, up to the next top-level
 * list item or heading. The first attribution line wins; any further ones are
 * counted in `alternatives`.
 */
export function resolveSource(segment: Segment, candidate: QuoteCandidate): SourceResolution {
  const quoteMarker = candidate.rawLine[0];
  let found: { source: string; lineIndex: number } | null = null;
  let alternatives = 0;

  for (let i = candidate.lineIndex + 1; i < segment.bodyLines.length; i++) {
    const line = segment.bodyLines[i];
    if (isBoundary(line)) break;
    const source = parseAttribution(line, quoteMarker);
    if (source === null) continue;
    if (found) alternatives++;
    else found = { source, lineIndex: i };
  }

  return found ? { kind: "found", ...found, alternatives } : { kind: "none" };
}

export function withSource(triple: ExtractedTriple, resolution: SourceResolution): ExtractedTriple {
  return resolution.kind === "found" ? { ...triple, source: resolution.source } : triple;
}
