import type { Logger } from "@quotegraph/core";
import { QUOTE_CONSTANTS } from "./constants";
import { Deduplicator } from "./Deduplicator";
import { RecordEmitter } from "./emitter/RecordEmitter";
import { extractQuotes } from "./extractQuotes";
import { resolveSource, withSource } from "./resolveSource";
import { segmentPage } from "./segmentPage";
import { NormalizedTriple } from "./types/NormalizedTriple";
import { Page } from "./types/Page";
import { ReaderItem } from "./types/ReaderItem";

export interface ExtractionStats {
  pagesRead: number;
  pagesSkipped: number;
  malformedEntries: number;
  segments: number;
  emptySegments: number;
  candidates: number;
  emptyCandidates: number;
  ambiguousAttributions: number;
  duplicates: number;
  recordsEmitted: number;
  authors: number;
  sources: number;
}

export function createStats(): ExtractionStats {
  return {
    pagesRead: 0,
    pagesSkipped: 0,
    malformedEntries: 0,
    segments: 0,
    emptySegments: 0,
    candidates: 0,
    emptyCandidates: 0,
    ambiguousAttributions: 0,
    duplicates: 0,
    recordsEmitted: 0,
    authors: 0,
    sources: 0,
  };
}

/**
 * Segment → extract → resolve → deduplicate for one page. Yields only triples
 * not seen earlier in the run, in source order.
 */
export function* extractPage(
  page: Page,
  dedup: Deduplicator,
  stats: ExtractionStats,
  logger?: Logger,
): Generator<NormalizedTriple> {
  const segments = segmentPage(page, {
    onEmptyHeading: () => {
      stats.emptySegments++;
    },
  });
  for (const segment of segments) {
    stats.segments++;
    const quotes = extractQuotes(segment, {
      onEmptyCandidate: () => {
        stats.candidates++;
        stats.emptyCandidates++;
      },
    });
    for (const { candidate, triple } of quotes) {
      stats.candidates++;
      const resolution = resolveSource(segment, candidate);
      if (resolution.kind === "found" && resolution.alternatives > 0) {
        stats.ambiguousAttributions++;
        logger?.debug(
          { page: page.title, author: segment.authorName, chosen: resolution.source, ignored: resolution.alternatives },
          "Several attribution lines for one quote; keeping the first",
        );
      }
      const normalized = dedup.accept(withSource(triple, resolution));
      if (!normalized) {
        stats.duplicates++;
        continue;
      }
      yield normalized;
    }
  }
}

export interface RunExtractionOptions {
  pages: AsyncIterable<ReaderItem>;
  emitter: RecordEmitter;
  logger: Logger;
  /** Stop after this many content pages. */
  pageLimit?: number;
  progressEvery?: number;
  onRecord?: (triple: NormalizedTriple) => void;
}

/**
 * One sequential pass over the corpus. The emitter is always closed, so a
 * fatal read error still leaves every record emitted before it on disk.
 */
export async function runExtraction(opts: RunExtractionOptions): Promise<ExtractionStats> {
  const { pages, emitter, logger, pageLimit } = opts;
  const progressEvery = opts.progressEvery ?? QUOTE_CONSTANTS.PROGRESS_EVERY_PAGES;
  const stats = createStats();
  const dedup = new Deduplicator();
  const authors = new Set<string>();
  const sources = new Set<string>();

  try {
    for await (const item of pages) {
      if (item.kind === "skipped") {
        stats.pagesSkipped++;
        logger.trace({ title: item.title, reason: item.reason }, "Skipping entry");
        continue;
      }
      if (item.kind === "malformed") {
        stats.malformedEntries++;
        logger.warn({ err: item.error, details: item.error.details }, "Skipping malformed entry");
        continue;
      }

      stats.pagesRead++;
      let pageRecords = 0;
      for (const triple of extractPage(item.page, dedup, stats, logger)) {
        await emitter.emit(triple);
        opts.onRecord?.(triple);
        pageRecords++;
        authors.add(triple.authorName);
        if (triple.sourceTitle !== undefined) sources.add(triple.sourceTitle);
      }
      stats.recordsEmitted += pageRecords;

      if (pageRecords > 0) {
        logger.debug({ title: item.page.title, quotes: pageRecords }, "Extracted quotes from page");
      }
      if (stats.pagesRead % progressEvery === 0) {
        logger.info({ pages: stats.pagesRead, records: stats.recordsEmitted }, "Extraction progress");
      }
      if (pageLimit !== undefined && stats.pagesRead >= pageLimit) {
        logger.info({ pageLimit }, "Page limit reached; stopping");
        break;
      }
    }
  } finally {
    await emitter.close();
    stats.authors = authors.size;
    stats.sources = sources.size;
  }

  logger.info(stats, "Extraction finished");
  return stats;
}
