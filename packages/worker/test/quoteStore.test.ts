import assert from "assert";
import { test } from "node:test";
import { QuoteRecord } from "@quotegraph/core";
import { getQuoteStore } from "../src/storage/sqlite/client";
import { MEMORY_DB_PATH } from "../src/storage/sqlite/constants";
import { buildMatchQuery } from "../src/storage/sqlite/queries";

const records: QuoteRecord[] = [
  { author: "Mark Twain", quote: "The secret of getting ahead is getting started.", source: null },
  { author: "Mark Twain", quote: "Plans are drafts that met the morning.", source: "Sample Essays" },
  { author: "Oscar Wilde", quote: "Be yourself; everyone else is already taken.", source: "Sample Essays" },
  { author: "Oscar Wilde", quote: "Secrets are better kept.", source: null },
];

async function loadedStore() {
  const store = await getQuoteStore(MEMORY_DB_PATH);
  store.loadRecords(records, 2);
  return store;
}

test("buildMatchQuery quotes words and marks the last as a prefix", () => {
  assert.strictEqual(buildMatchQuery("Getting Sta"), '"getting" "sta"*');
  assert.strictEqual(buildMatchQuery('"); DROP'), '"drop"*');
  assert.strictEqual(buildMatchQuery("  ...  "), null);
});

test("loading builds the graph in batches", async () => {
  const store = await getQuoteStore(MEMORY_DB_PATH);
  const batches: number[] = [];
  const result = store.loadRecords(records, 2, (batch) => batches.push(batch));

  assert.deepStrictEqual(result, { batches: 2, records: 4, quotesInserted: 4 });
  assert.deepStrictEqual(batches, [1, 2]);
  assert.deepStrictEqual(store.getStats(), { authors: 2, quotes: 4, sources: 1, attributedTo: 4, appearsIn: 2 });
  store.close();
});

test("reloading the same records adds nothing", async () => {
  const store = await loadedStore();
  const again = store.loadRecords(
    [...records, { author: "mark twain", quote: "the secret of getting ahead is getting started", source: null }],
    10,
  );
  assert.strictEqual(again.quotesInserted, 0);
  assert.deepStrictEqual(store.getStats(), { authors: 2, quotes: 4, sources: 1, attributedTo: 4, appearsIn: 2 });
  store.close();
});

test("autocomplete matches word prefixes", async () => {
  const store = await loadedStore();

  const secret = store.autocomplete("secre");
  assert.deepStrictEqual(secret.map((r) => r.quoteText).sort(), [
    "Secrets are better kept.",
    "The secret of getting ahead is getting started.",
  ]);
  assert.strictEqual(store.autocomplete("secre", 1).length, 1);

  const [hit, ...rest] = store.autocomplete("getting sta");
  assert.strictEqual(rest.length, 0);
  assert.strictEqual(hit.authorName, "Mark Twain");
  assert.strictEqual(hit.sourceTitle, null);
  assert.strictEqual(typeof hit.relevanceScore, "number");

  assert.deepStrictEqual(store.autocomplete("   "), []);
  assert.deepStrictEqual(store.autocomplete('"); DROP'), []);
  store.close();
});

test("search by author and by source match substrings case-insensitively", async () => {
  const store = await loadedStore();

  assert.deepStrictEqual(store.searchByAuthor("wilde"), [
    { quoteText: "Be yourself; everyone else is already taken.", authorName: "Oscar Wilde", sourceTitle: "Sample Essays" },
    { quoteText: "Secrets are better kept.", authorName: "Oscar Wilde", sourceTitle: null },
  ]);
  assert.deepStrictEqual(
    store.searchBySource("ESSAYS").map((r) => r.authorName),
    ["Mark Twain", "Oscar Wilde"],
  );
  assert.deepStrictEqual(store.searchByAuthor("  "), []);
  assert.strictEqual(store.searchBySource("essays", 1).length, 1);
  store.close();
});

test("clear empties the store", async () => {
  const store = await loadedStore();
  store.clear();
  assert.deepStrictEqual(store.getStats(), { authors: 0, quotes: 0, sources: 0, attributedTo: 0, appearsIn: 0 });
  assert.deepStrictEqual(store.autocomplete("secre"), []);
  store.close();
});
