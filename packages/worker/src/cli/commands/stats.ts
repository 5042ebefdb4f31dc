import { getConfig } from "@quotegraph/core";
import { getQuoteStore, StoreStats } from "../../storage/sqlite/client";
import { resolveSqlitePath } from "../../storage/sqlite/constants";

export function printStoreStats(stats: StoreStats, heading = "STORE STATISTICS") {
  console.log(`\n=== ${heading} ===`);
  console.log(`Authors: ${stats.authors}`);
  console.log(`Quotes: ${stats.quotes}`);
  console.log(`Sources: ${stats.sources}`);
  console.log(`Attribution relationships: ${stats.attributedTo}`);
  console.log(`Source relationships: ${stats.appearsIn}`);
}

export async function statsCommand() {
  const config = getConfig();
  const store = await getQuoteStore(resolveSqlitePath(config.store.sqlitePath));
  try {
    printStoreStats(store.getStats());
  } finally {
    store.close();
  }
}
