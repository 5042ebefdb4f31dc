import { LIST_MARKER_CHARS, QUOTE_BULLETS } from "./constants";
import { parseHeading } from "./segmentPage";

export interface ListItem {
  /** The run of list markers at the start of the line, e.g. `*`, `**`, `*:`. */
  markers: string;
  content: string;
}

export function parseListItem(line: string): ListItem | null {
  let i = 0;
  while (i < line.length && LIST_MARKER_CHARS.includes(line[i])) i++;
  if (i === 0) return null;
  return { markers: line.slice(0, i), content: line.slice(i) };
}

export function isQuoteBullet(item: ListItem): boolean {
  return item.markers.length === 1 && (QUOTE_BULLETS as readonly string[]).includes(item.markers);
}

/** A line that ends the lookahead for a quote's attribution. */
export function isBoundary(line: string): boolean {
  if (parseHeading(line)) return true;
  const item = parseListItem(line);
  return item !== null && item.markers.length === 1;
}
