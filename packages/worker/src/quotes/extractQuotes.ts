import { parseListItem, isQuoteBullet } from "./listItems";
import { stripMarkup } from "./markup/stripMarkup";
import { ExtractedTriple } from "./types/ExtractedTriple";
import { QuoteCandidate } from "./types/QuoteCandidate";
import { Segment } from "./types/Segment";

export interface ExtractedQuote {
  candidate: QuoteCandidate;
  triple: ExtractedTriple;
}

export interface ExtractOptions {
  onEmptyCandidate?: (candidate: QuoteCandidate) => void;
}

export function* findQuoteCandidates(segment: Segment): Generator<QuoteCandidate> {
  for (let lineIndex = 0; lineIndex < segment.bodyLines.length; lineIndex++) {
    const rawLine = segment.bodyLines[lineIndex];
    const item = parseListItem(rawLine);
    if (item && isQuoteBullet(item)) {
      yield { rawLine, lineIndex };
    }
  }
}

export function candidateText(candidate: QuoteCandidate): string {
  const item = parseListItem(candidate.rawLine);
  return stripMarkup(item ? item.content : candidate.rawLine);
}

/** Quote lines of a segment in source order, markup stripped; `source` is left for the resolver. */
export function* extractQuotes(segment: Segment, opts: ExtractOptions = {}): Generator<ExtractedQuote> {
  for (const candidate of findQuoteCandidates(segment)) {
    const quoteText = candidateText(candidate);
    if (!quoteText) {
      opts.onEmptyCandidate?.(candidate);
      continue;
    }
    yield { candidate, triple: { author: segment.authorName, quoteText } };
  }
}
