export { assertCorpusReadable, readPages, readPagesFromChunks } from "./quotes/readPages";
export type { ReadPagesOptions } from "./quotes/readPages";
export { segmentPage, parseHeading } from "./quotes/segmentPage";
export { extractQuotes, findQuoteCandidates } from "./quotes/extractQuotes";
export { resolveSource, parseAttribution } from "./quotes/resolveSource";
export { stripMarkup, DEFAULT_RULES } from "./quotes/markup/stripMarkup";
export type { MarkupRule, MarkupRuleName } from "./quotes/markup/MarkupRule";
export { Deduplicator, normalizeTriple } from "./quotes/Deduplicator";
export { RecordEmitter, toQuoteRecord } from "./quotes/emitter/RecordEmitter";
export { createFileSink, createMemorySink } from "./quotes/emitter/sinks";
export type { FileSinkOptions, RecordSink } from "./quotes/emitter/sinks";
export { parseQuoteRecords } from "./quotes/emitter/parseRecords";
export { runExtraction, extractPage } from "./quotes/runExtraction";
export type { ExtractionStats } from "./quotes/runExtraction";
export { getQuoteStore } from "./storage/sqlite/client";
export type { QuoteStore, SearchResult, StoreStats } from "./storage/sqlite/client";
export type { Page } from "./quotes/types/Page";
export type { Segment } from "./quotes/types/Segment";
export type { ExtractedTriple } from "./quotes/types/ExtractedTriple";
export type { NormalizedTriple } from "./quotes/types/NormalizedTriple";
export type { ReaderItem } from "./quotes/types/ReaderItem";
