import Database from "better-sqlite3";
import { QuoteRecord } from "@quotegraph/core";

export interface SearchResult {
  quoteText: string;
  authorName: string;
  sourceTitle: string | null;
  relevanceScore?: number;
}

export interface StoreStats {
  authors: number;
  quotes: number;
  sources: number;
  attributedTo: number;
  appearsIn: number;
}

export interface LoadResult {
  batches: number;
  records: number;
  quotesInserted: number;
}

export interface QuoteStore {
  db: Database.Database;
  loadRecords: (records: QuoteRecord[], batchSize: number, onBatch?: (batch: number, total: number) => void) => LoadResult;
  autocomplete: (term: string, limit?: number) => SearchResult[];
  searchByAuthor: (authorName: string, limit?: number) => SearchResult[];
  searchBySource: (sourceTitle: string, limit?: number) => SearchResult[];
  getStats: () => StoreStats;
  clear: () => void;
  close: () => void;
}
