import Database from "better-sqlite3";
import { createNodeId, normalizeKey, QuoteRecord } from "@quotegraph/core";
import { DEFAULT_SEARCH_LIMIT } from "./constants";
import { LoadResult, SearchResult, StoreStats } from "./types";

interface ResultRow {
  quoteText: string;
  authorName: string;
  sourceTitle: string | null;
}

interface RankedRow extends ResultRow {
  score: number;
}

const RESULT_JOINS = `
  JOIN attributed_to attr ON attr.quote_id = q.id
  JOIN authors a ON a.id = attr.author_id
  LEFT JOIN appears_in ai ON ai.quote_id = q.id
  LEFT JOIN sources s ON s.id = ai.source_id
`;

/**
 * FTS5 query for prefix autocomplete: every word is quoted (so user input
 * cannot inject FTS syntax) and the last one matches as a prefix.
 */
export const buildMatchQuery = (term: string): string | null => {
  const words = term.toLowerCase().match(/[\p{L}\p{N}]+/gu);
  if (!words || words.length === 0) return null;
  return words.map((w, idx) => (idx === words.length - 1 ? `"${w}"*` : `"${w}"`)).join(" ");
};

export const makeLoadRecords = (db: Database.Database) => {
  const insertAuthor = db.prepare(`INSERT OR IGNORE INTO authors (id, key, name) VALUES (@id, @key, @name);`);
  const insertSource = db.prepare(`INSERT OR IGNORE INTO sources (id, key, title) VALUES (@id, @key, @title);`);
  const insertQuote = db.prepare(`INSERT OR IGNORE INTO quotes (id, text) VALUES (@id, @text);`);
  const insertFts = db.prepare(`INSERT INTO quotes_fts (quote_id, text) VALUES (@quoteId, @text);`);
  const insertAttributedTo = db.prepare(
    `INSERT OR IGNORE INTO attributed_to (author_id, quote_id) VALUES (@authorId, @quoteId);`,
  );
  const insertAppearsIn = db.prepare(`INSERT OR IGNORE INTO appears_in (quote_id, source_id) VALUES (@quoteId, @sourceId);`);

  const upsertBatch = db.transaction((rows: QuoteRecord[]): number => {
    let inserted = 0;
    for (const r of rows) {
      const authorKey = normalizeKey(r.author);
      const quoteKey = normalizeKey(r.quote);
      const sourceKey = r.source === null ? null : normalizeKey(r.source);

      const authorId = createNodeId("Author", [authorKey]);
      const quoteId = createNodeId("Quote", [authorKey, quoteKey, sourceKey]);
      insertAuthor.run({ id: authorId, key: authorKey, name: r.author });
      if (insertQuote.run({ id: quoteId, text: r.quote }).changes > 0) {
        insertFts.run({ quoteId, text: r.quote });
        inserted++;
      }
      insertAttributedTo.run({ authorId, quoteId });

      if (r.source !== null && sourceKey !== null) {
        const sourceId = createNodeId("Source", [sourceKey]);
        insertSource.run({ id: sourceId, key: sourceKey, title: r.source });
        insertAppearsIn.run({ quoteId, sourceId });
      }
    }
    return inserted;
  });

  return (records: QuoteRecord[], batchSize: number, onBatch?: (batch: number, total: number) => void): LoadResult => {
    const size = Math.max(1, Math.floor(batchSize));
    const total = Math.ceil(records.length / size);
    let quotesInserted = 0;
    for (let i = 0; i < records.length; i += size) {
      quotesInserted += upsertBatch(records.slice(i, i + size));
      onBatch?.(i / size + 1, total);
    }
    return { batches: total, records: records.length, quotesInserted };
  };
};

export const makeAutocomplete = (db: Database.Database) => {
  const stmt = db.prepare<{ match: string; limit: number }, RankedRow>(`
      WITH hits AS (
        SELECT quote_id, bm25(quotes_fts) AS score
        FROM quotes_fts
        WHERE quotes_fts MATCH @match
        ORDER BY score
        LIMIT @limit
      )
      SELECT q.text AS quoteText, a.name AS authorName, s.title AS sourceTitle, hits.score AS score
      FROM hits
      JOIN quotes q ON q.id = hits.quote_id
      ${RESULT_JOINS}
      ORDER BY hits.score, q.text
      LIMIT @limit;
    `);
  return (term: string, limit = DEFAULT_SEARCH_LIMIT): SearchResult[] => {
    const match = buildMatchQuery(term);
    if (!match) return [];
    return stmt.all({ match, limit }).map((r) => ({
      quoteText: r.quoteText,
      authorName: r.authorName,
      sourceTitle: r.sourceTitle,
      // bm25 is lower-is-better; flip it so larger means more relevant
      relevanceScore: -r.score,
    }));
  };
};

export const makeSearchByAuthor = (db: Database.Database) => {
  const stmt = db.prepare<{ term: string; limit: number }, ResultRow>(`
      SELECT q.text AS quoteText, a.name AS authorName, s.title AS sourceTitle
      FROM quotes q
      ${RESULT_JOINS}
      WHERE instr(lower(a.name), lower(@term)) > 0
      ORDER BY a.name, q.text
      LIMIT @limit;
    `);
  return (authorName: string, limit = DEFAULT_SEARCH_LIMIT): SearchResult[] => {
    const term = authorName.trim();
    if (!term) return [];
    return stmt.all({ term, limit });
  };
};

export const makeSearchBySource = (db: Database.Database) => {
  const stmt = db.prepare<{ term: string; limit: number }, ResultRow>(`
      SELECT q.text AS quoteText, a.name AS authorName, s.title AS sourceTitle
      FROM quotes q
      ${RESULT_JOINS}
      WHERE s.title IS NOT NULL AND instr(lower(s.title), lower(@term)) > 0
      ORDER BY s.title, a.name, q.text
      LIMIT @limit;
    `);
  return (sourceTitle: string, limit = DEFAULT_SEARCH_LIMIT): SearchResult[] => {
    const term = sourceTitle.trim();
    if (!term) return [];
    return stmt.all({ term, limit });
  };
};

export const makeGetStats = (db: Database.Database) => {
  const count = (table: string) => {
    const row = db.prepare<[], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM ${table};`).get();
    return Number(row?.cnt ?? 0);
  };
  return (): StoreStats => ({
    authors: count("authors"),
    quotes: count("quotes"),
    sources: count("sources"),
    attributedTo: count("attributed_to"),
    appearsIn: count("appears_in"),
  });
};

export const makeClear = (db: Database.Database) =>
  db.transaction(() => {
    for (const table of ["attributed_to", "appears_in", "quotes_fts", "quotes", "authors", "sources"]) {
      db.exec(`DELETE FROM ${table};`);
    }
  });
