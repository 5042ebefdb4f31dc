import { HEADING_RE, QUOTE_CONSTANTS } from "./constants";
import { stripMarkup } from "./markup/stripMarkup";
import { Page } from "./types/Page";
import { Segment } from "./types/Segment";

export interface Heading {
  level: number;
  text: string;
}

/** Unbalanced `=` runs take the shorter run as the level; stray `=` are dropped from the text. */
export function parseHeading(line: string): Heading | null {
  const match = line.trim().match(HEADING_RE);
  if (!match) return null;
  return {
    level: Math.min(match[1].length, match[3].length),
    text: match[2].replace(/^[=\s]+|[=\s]+$/g, ""),
  };
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export interface SegmentOptions {
  authorHeadingLevel?: number;
  /** Called for an author heading that strips to nothing; its body is dropped with it. */
  onEmptyHeading?: (heading: Heading) => void;
}

/**
 * Splits a page into author segments. An author heading opens a segment; any
 * heading at the same or a shallower level closes it. Preamble lines and
 * lines after a closing shallower heading belong to no segment.
 */
export function* segmentPage(page: Page, opts: SegmentOptions = {}): Generator<Segment> {
  const authorLevel = opts.authorHeadingLevel ?? QUOTE_CONSTANTS.AUTHOR_HEADING_LEVEL;
  let current: { authorName: string; lines: string[] } | null = null;
  // true while inside an author section whose heading was empty
  let discarding = false;

  const finish = (): Segment | null => {
    if (!current) return null;
    const seg: Segment = {
      authorName: current.authorName,
      bodyLines: current.lines,
      bodyText: current.lines.join("\n"),
    };
    current = null;
    return seg;
  };

  for (const line of splitLines(page.rawText)) {
    const heading = parseHeading(line);
    if (heading && heading.level <= authorLevel) {
      const done = finish();
      if (done) yield done;
      discarding = false;
      if (heading.level !== authorLevel) continue;

      const authorName = stripMarkup(heading.text);
      if (!authorName) {
        discarding = true;
        opts.onEmptyHeading?.(heading);
        continue;
      }
      current = { authorName, lines: [] };
      continue;
    }
    if (discarding || !current) continue;
    current.lines.push(line);
  }

  const last = finish();
  if (last) yield last;
}
