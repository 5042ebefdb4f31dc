import { createLogger, getConfig } from "@quotegraph/core";
import minimist from "minimist";
import { getQuoteStore, SearchResult } from "../../storage/sqlite/client";
import { resolveSqlitePath } from "../../storage/sqlite/constants";
import { intArg, stringArg } from "../utils/args";
import { normalizeSearchTerm } from "../utils/searchTerm";

type SearchField = "quote" | "author" | "source";

export function renderSearchResults(results: SearchResult[], term: string): string {
  if (!results.length) return `No quotes found for '${term}'`;
  const lines = [`=== SEARCH RESULTS FOR '${term}' ===`, `Found ${results.length} quotes:`, ""];
  results.forEach((r, i) => {
    lines.push(`${i + 1}. "${r.quoteText}"`);
    lines.push(`   - ${r.authorName}${r.sourceTitle ? ` (from ${r.sourceTitle})` : ""}`);
    if (r.relevanceScore !== undefined) {
      lines.push(`   - Relevance: ${r.relevanceScore.toFixed(3)}`);
    }
    lines.push("");
  });
  return lines.join("\n").trimEnd();
}

export async function searchCommand() {
  const argv = minimist(process.argv.slice(2), { boolean: ["json"] });
  const config = getConfig();
  const logger = createLogger(config);

  const positional = argv._.slice(1).map(String).join(" ");
  const query = normalizeSearchTerm(stringArg(argv, "q", "query") || positional);
  const by = stringArg(argv, "by") || "quote";
  const limit = intArg(argv, "limit", "k") ?? config.search.limit;

  if (!query) {
    console.error("Usage: search --q <term> [--by quote|author|source] [--limit 5] [--json]");
    process.exit(1);
  }
  if (by !== "quote" && by !== "author" && by !== "source") {
    console.error(`--by must be one of quote, author, source (got "${by}")`);
    process.exit(1);
  }
  const field: SearchField = by;

  const store = await getQuoteStore(resolveSqlitePath(config.store.sqlitePath));
  try {
    const results =
      field === "author"
        ? store.searchByAuthor(query, limit)
        : field === "source"
          ? store.searchBySource(query, limit)
          : store.autocomplete(query, limit);
    logger.info({ query, by: field, found: results.length }, "Search finished");
    console.log(argv.json ? JSON.stringify(results, null, 2) : renderSearchResults(results, query));
  } finally {
    store.close();
  }
}
