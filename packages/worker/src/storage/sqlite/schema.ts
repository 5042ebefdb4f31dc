import Database from "better-sqlite3";

/**
 * Property-graph layout: three node tables, two relationship tables and a
 * full-text index over quote text.
 */
export function ensureSchema(db: Database.Database) {
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS authors (
      id TEXT PRIMARY KEY,
      key TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS sources (
      id TEXT PRIMARY KEY,
      key TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS quotes (
      id TEXT PRIMARY KEY,
      text TEXT NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS attributed_to (
      author_id TEXT NOT NULL REFERENCES authors(id) ON DELETE CASCADE,
      quote_id TEXT NOT NULL REFERENCES quotes(id) ON DELETE CASCADE,
      PRIMARY KEY (author_id, quote_id)
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS appears_in (
      quote_id TEXT NOT NULL REFERENCES quotes(id) ON DELETE CASCADE,
      source_id TEXT NOT NULL REFERENCES sources(id) ON DELETE CASCADE,
      PRIMARY KEY (quote_id, source_id)
    );
  `);

  db.exec(`
    CREATE VIRTUAL TABLE IF NOT EXISTS quotes_fts USING fts5(
      quote_id UNINDEXED,
      text
    );
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_attributed_to_quote ON attributed_to(quote_id);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_appears_in_source ON appears_in(source_id);`);
}
