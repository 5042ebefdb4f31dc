import Database from "better-sqlite3";
import fs from "fs/promises";
import path from "path";
import { MEMORY_DB_PATH } from "./constants";
import { ensureSchema } from "./schema";
import {
  makeAutocomplete,
  makeClear,
  makeGetStats,
  makeLoadRecords,
  makeSearchByAuthor,
  makeSearchBySource,
} from "./queries";
import { QuoteStore } from "./types";

export async function getQuoteStore(dbPath: string): Promise<QuoteStore> {
  if (dbPath !== MEMORY_DB_PATH) {
    await fs.mkdir(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  ensureSchema(db);

  const clear = makeClear(db);

  return {
    db,
    loadRecords: makeLoadRecords(db),
    autocomplete: makeAutocomplete(db),
    searchByAuthor: makeSearchByAuthor(db),
    searchBySource: makeSearchBySource(db),
    getStats: makeGetStats(db),
    clear: () => clear(),
    close: () => db.close(),
  };
}

export type { QuoteStore, SearchResult, StoreStats, LoadResult } from "./types";
