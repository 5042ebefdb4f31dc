import assert from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { test } from "node:test";
import { CorpusUnavailableError, createSilentLogger, normalizeKey } from "@quotegraph/core";
import { extractToFile } from "../src/cli/commands/extract";
import { RecordEmitter } from "../src/quotes/emitter/RecordEmitter";
import { parseQuoteRecords } from "../src/quotes/emitter/parseRecords";
import { createMemorySink } from "../src/quotes/emitter/sinks";
import { readPagesFromChunks } from "../src/quotes/readPages";
import { runExtraction } from "../src/quotes/runExtraction";
import { ReaderItem } from "../src/quotes/types/ReaderItem";
import { exportXml, pageXml } from "./helpers/fixtures";

const corpus = exportXml(
  pageXml(
    "Sayings",
    [
      "Preamble text",
      "== Mark Twain ==",
      '* "The secret of getting ahead is getting started."',
      "* The secret of getting ahead is getting started.",
      "** ''Source: Pudd'nhead Wilson''",
      "* [[Wisdom|wise]] words",
      "* {{citation needed}}",
      "== Oscar Wilde ==",
      "* Be yourself; everyone else is already taken.",
      "** Source: A",
      "** From: B",
    ].join("\n"),
  ),
  pageXml("Sayings again", '== Mark Twain ==\n* "The secret of getting ahead is getting started."'),
  pageXml("Talk:Sayings", "* chatter", "1"),
);

const expectedLines = [
  '{"author":"Mark Twain","quote":"The secret of getting ahead is getting started.","source":null}',
  '{"author":"Mark Twain","quote":"The secret of getting ahead is getting started.","source":"Pudd\'nhead Wilson"}',
  '{"author":"Mark Twain","quote":"wise words","source":null}',
  '{"author":"Oscar Wilde","quote":"Be yourself; everyone else is already taken.","source":"A"}',
];

async function extract(xml: string, pageLimit?: number) {
  const sink = createMemorySink();
  const stats = await runExtraction({
    pages: readPagesFromChunks([xml]),
    emitter: new RecordEmitter(sink),
    logger: createSilentLogger(),
    pageLimit,
  });
  return { stats, text: sink.text(), sink };
}

test("extracts deduplicated records in corpus order", async () => {
  const { text, sink } = await extract(corpus);
  assert.strictEqual(text, expectedLines.join("\n") + "\n");
  assert.strictEqual(sink.closed, true);
});

test("counts every kind of outcome", async () => {
  const { stats } = await extract(corpus);
  assert.deepStrictEqual(stats, {
    pagesRead: 2,
    pagesSkipped: 1,
    malformedEntries: 0,
    segments: 3,
    emptySegments: 0,
    candidates: 6,
    emptyCandidates: 1,
    ambiguousAttributions: 1,
    duplicates: 1,
    recordsEmitted: 4,
    authors: 2,
    sources: 2,
  });
});

test("output is identical across runs", async () => {
  const first = await extract(corpus);
  const second = await extract(corpus);
  assert.strictEqual(first.text, second.text);
});

test("records are non-empty and unique by normalized key", async () => {
  const records = parseQuoteRecords((await extract(corpus)).text, "jsonl");
  const keys = new Set<string>();
  for (const r of records) {
    assert.ok(r.author.trim() && r.quote.trim());
    const key = JSON.stringify([normalizeKey(r.author), normalizeKey(r.quote), r.source === null ? null : normalizeKey(r.source)]);
    assert.ok(!keys.has(key), `duplicate ${key}`);
    keys.add(key);
  }
  assert.strictEqual(keys.size, 4);
});

test("pageLimit stops after that many content pages", async () => {
  const { stats, text } = await extract(corpus, 1);
  assert.strictEqual(stats.pagesRead, 1);
  assert.strictEqual(stats.recordsEmitted, 4);
  assert.strictEqual(text, expectedLines.join("\n") + "\n");
});

test("malformed entries are counted and skipped", async () => {
  const xml = exportXml(pageXml("Broken", "bad &bogus; entity"), pageXml("Fine", "== A ==\n* ok"));
  const { stats, text } = await extract(xml);
  assert.strictEqual(stats.malformedEntries, 1);
  assert.strictEqual(text, '{"author":"A","quote":"ok","source":null}\n');
});

test("a fatal read error keeps the records emitted before it", async () => {
  async function* failing(): AsyncGenerator<ReaderItem> {
    yield { kind: "page", page: { title: "T", rawText: "== A ==\n* Kept quote" } };
    throw new CorpusUnavailableError("disk gone");
  }
  const sink = createMemorySink();
  await assert.rejects(
    () => runExtraction({ pages: failing(), emitter: new RecordEmitter(sink, "json"), logger: createSilentLogger() }),
    CorpusUnavailableError,
  );
  assert.strictEqual(sink.closed, true);
  assert.deepStrictEqual(JSON.parse(sink.text()), [{ author: "A", quote: "Kept quote", source: null }]);
});

test("a page left open counts as one malformed entry", async () => {
  const xml = exportXml(
    "<page><title>Open</title><ns>0</ns><revision><text>== A ==\n* lost</text></revision>",
    pageXml("Next", "== B ==\n* b"),
  );
  const { stats, text } = await extract(xml);
  assert.strictEqual(stats.malformedEntries, 1);
  assert.strictEqual(text, '{"author":"B","quote":"b","source":null}\n');
});

test("extractToFile writes the records of a corpus file", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quotegraph-"));
  const input = path.join(dir, "corpus.xml");
  const output = path.join(dir, "out.jsonl");
  fs.writeFileSync(input, corpus);

  const { stats, samples } = await extractToFile({ input, output, format: "jsonl", logger: createSilentLogger() });
  assert.strictEqual(stats.recordsEmitted, 4);
  assert.deepStrictEqual(samples[2], { author: "Mark Twain", quote: "wise words", source: null });
  assert.strictEqual(fs.readFileSync(output, "utf8"), expectedLines.join("\n") + "\n");
  fs.rmSync(dir, { recursive: true, force: true });
});

test("a missing corpus leaves the previous output untouched", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quotegraph-"));
  const output = path.join(dir, "out.json");
  const previous = '[\n  {\n    "author": "A",\n    "quote": "Q",\n    "source": null\n  }\n]\n';
  fs.writeFileSync(output, previous);

  await assert.rejects(
    () => extractToFile({ input: path.join(dir, "missing.xml"), output, format: "json", logger: createSilentLogger() }),
    CorpusUnavailableError,
  );
  assert.strictEqual(fs.readFileSync(output, "utf8"), previous);
  fs.rmSync(dir, { recursive: true, force: true });
});
