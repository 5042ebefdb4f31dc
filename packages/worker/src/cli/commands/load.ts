import { createLogger, getConfig } from "@quotegraph/core";
import fs from "fs/promises";
import minimist from "minimist";
import { detectRecordFormat, parseQuoteRecords } from "../../quotes/emitter/parseRecords";
import { getQuoteStore } from "../../storage/sqlite/client";
import { resolveSqlitePath } from "../../storage/sqlite/constants";
import { formatArg, intArg, stringArg } from "../utils/args";
import { printStoreStats } from "./stats";

export async function loadCommand() {
  const argv = minimist(process.argv.slice(2), { boolean: ["clear"] });
  const config = getConfig();
  const logger = createLogger(config);

  const input = stringArg(argv, "input", "i") || config.output.quotesFile;
  const format = formatArg(argv, detectRecordFormat(input, config.output.format));
  const batchSize = intArg(argv, "batch-size") ?? config.store.batchSize;

  const raw = await fs.readFile(input, "utf8");
  const records = parseQuoteRecords(raw, format);
  if (!records.length) {
    logger.error({ input }, "No quotes loaded. Run the extract command first.");
    process.exit(1);
  }
  logger.info({ input, records: records.length, batchSize }, "Loaded quote records");

  const store = await getQuoteStore(resolveSqlitePath(config.store.sqlitePath));
  try {
    if (argv.clear) {
      store.clear();
      logger.info("Store cleared");
    }
    const result = store.loadRecords(records, batchSize, (batch, total) => {
      logger.info({ batch, total }, "Processed batch");
    });
    logger.info(result, "Store population completed");
    printStoreStats(store.getStats(), "STORE POPULATION SUMMARY");
  } finally {
    store.close();
  }
}
