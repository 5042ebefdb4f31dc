import { createLogger, getConfig, Logger, QuoteRecord, RecordFormat } from "@quotegraph/core";
import minimist from "minimist";
import { toQuoteRecord, RecordEmitter } from "../../quotes/emitter/RecordEmitter";
import { detectRecordFormat } from "../../quotes/emitter/parseRecords";
import { createFileSink } from "../../quotes/emitter/sinks";
import { assertCorpusReadable, readPages } from "../../quotes/readPages";
import { ExtractionStats, runExtraction } from "../../quotes/runExtraction";
import { formatArg, intArg, stringArg } from "../utils/args";

const SAMPLE_SIZE = 3;

export interface ExtractToFileOptions {
  input: string;
  output: string;
  format: RecordFormat;
  pageLimit?: number;
  logger: Logger;
}

/**
 * Runs the pipeline from an export file into a record file. The corpus is
 * checked before the output is opened, so a bad input path leaves any
 * previous output untouched.
 */
export async function extractToFile(opts: ExtractToFileOptions): Promise<{ stats: ExtractionStats; samples: QuoteRecord[] }> {
  await assertCorpusReadable(opts.input);

  const samples: QuoteRecord[] = [];
  const emitter = new RecordEmitter(await createFileSink(opts.output), opts.format);
  const stats = await runExtraction({
    pages: readPages(opts.input),
    emitter,
    logger: opts.logger,
    pageLimit: opts.pageLimit,
    onRecord: (triple) => {
      if (samples.length < SAMPLE_SIZE) samples.push(toQuoteRecord(triple));
    },
  });
  return { stats, samples };
}

export async function extractCommand() {
  const argv = minimist(process.argv.slice(2));
  const config = getConfig();
  const logger = createLogger(config);

  const input = stringArg(argv, "input", "i") || config.corpus.xmlPath;
  const output = stringArg(argv, "output", "o") || config.output.quotesFile;
  const format = formatArg(argv, detectRecordFormat(output, config.output.format));
  const pageLimit = intArg(argv, "limit") ?? config.corpus.pageLimit;

  logger.info({ input, output, format, pageLimit }, "Extracting quotes...");
  const { stats, samples } = await extractToFile({ input, output, format, pageLimit, logger });

  if (stats.recordsEmitted === 0) {
    console.log("No quotes were extracted. Check the export file and its heading/list conventions.");
    return;
  }

  console.log("\n=== EXTRACTION SUMMARY ===");
  console.log(`Pages processed: ${stats.pagesRead} (skipped ${stats.pagesSkipped}, malformed ${stats.malformedEntries})`);
  console.log(`Total quotes extracted: ${stats.recordsEmitted}`);
  console.log(`Duplicates dropped: ${stats.duplicates}`);
  console.log(`Unique authors: ${stats.authors}`);
  console.log(`Unique sources: ${stats.sources}`);
  console.log(`Output saved to: ${output}`);

  console.log("\n=== SAMPLE QUOTES ===");
  samples.forEach((r, i) => {
    console.log(`${i + 1}. "${r.quote}" - ${r.author}${r.source ? ` (from ${r.source})` : ""}`);
  });
}
