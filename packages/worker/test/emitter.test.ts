import assert from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { test } from "node:test";
import { RecordFormatError } from "@quotegraph/core";
import { Deduplicator } from "../src/quotes/Deduplicator";
import { RecordEmitter } from "../src/quotes/emitter/RecordEmitter";
import { detectRecordFormat, parseQuoteRecords } from "../src/quotes/emitter/parseRecords";
import { createFileSink, createMemorySink } from "../src/quotes/emitter/sinks";
import { NormalizedTriple } from "../src/quotes/types/NormalizedTriple";

function triples(): NormalizedTriple[] {
  const dedup = new Deduplicator();
  const out: NormalizedTriple[] = [];
  for (const t of [
    { author: "Mark Twain", quoteText: "Q1" },
    { author: "A", quoteText: "Q2", source: "S" },
  ]) {
    const n = dedup.accept(t);
    if (n) out.push(n);
  }
  return out;
}

test("jsonl writes one object per line with a null source", async () => {
  const sink = createMemorySink();
  const emitter = new RecordEmitter(sink);
  for (const t of triples()) await emitter.emit(t);
  await emitter.close();

  assert.strictEqual(
    sink.text(),
    '{"author":"Mark Twain","quote":"Q1","source":null}\n{"author":"A","quote":"Q2","source":"S"}\n',
  );
  assert.strictEqual(emitter.emitted, 2);
  assert.strictEqual(sink.closed, true);
});

test("json writes a single indented array", async () => {
  const sink = createMemorySink();
  const emitter = new RecordEmitter(sink, "json");
  await emitter.emit(triples()[0]);
  await emitter.close();

  assert.strictEqual(
    sink.text(),
    '[\n  {\n    "author": "Mark Twain",\n    "quote": "Q1",\n    "source": null\n  }\n]\n',
  );
});

test("json with no records is an empty array", async () => {
  const sink = createMemorySink();
  const emitter = new RecordEmitter(sink, "json");
  await emitter.close();
  await emitter.close();
  assert.strictEqual(sink.text(), "[]\n");
});

test("emit after close is rejected", async () => {
  const emitter = new RecordEmitter(createMemorySink());
  await emitter.close();
  await assert.rejects(() => emitter.emit(triples()[0]), /closed/);
});

test("emitted output parses back into the same records", async () => {
  for (const format of ["jsonl", "json"] as const) {
    const sink = createMemorySink();
    const emitter = new RecordEmitter(sink, format);
    for (const t of triples()) await emitter.emit(t);
    await emitter.close();
    assert.deepStrictEqual(parseQuoteRecords(sink.text(), format), [
      { author: "Mark Twain", quote: "Q1", source: null },
      { author: "A", quote: "Q2", source: "S" },
    ]);
  }
});

test("parseQuoteRecords rejects invalid records", () => {
  assert.throws(
    () => parseQuoteRecords('{"author":"A","quote":"  ","source":null}\n', "jsonl"),
    (err: unknown) => err instanceof RecordFormatError && err.message.startsWith("Invalid quote record at line 1"),
  );
  assert.throws(() => parseQuoteRecords("not json\n", "jsonl"), /Invalid JSON at line 1/);
  assert.throws(() => parseQuoteRecords('{"author":"A"}', "json"), /Expected a JSON array/);
});

test("detectRecordFormat goes by extension", () => {
  assert.strictEqual(detectRecordFormat("out.ndjson", "json"), "jsonl");
  assert.strictEqual(detectRecordFormat("out.JSON", "jsonl"), "json");
  assert.strictEqual(detectRecordFormat("out.txt", "json"), "json");
});

test("file sink creates the directory and writes the records", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quotegraph-"));
  const file = path.join(dir, "nested", "quotes.jsonl");
  const emitter = new RecordEmitter(await createFileSink(file));
  await emitter.emit(triples()[1]);
  await emitter.close();

  assert.strictEqual(fs.readFileSync(file, "utf8"), '{"author":"A","quote":"Q2","source":"S"}\n');
  fs.rmSync(dir, { recursive: true, force: true });
});

test("file sink waits for the stream to drain between writes", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quotegraph-"));
  const file = path.join(dir, "many.jsonl");
  const sink = await createFileSink(file, { highWaterMark: 64 });
  const emitter = new RecordEmitter(sink);
  const dedup = new Deduplicator();
  for (let i = 0; i < 500; i++) {
    const triple = dedup.accept({ author: "A", quoteText: `Quote number ${i}` });
    if (triple) await emitter.emit(triple);
  }
  await emitter.close();

  const lines = fs.readFileSync(file, "utf8").split("\n");
  assert.strictEqual(lines.length, 501);
  assert.strictEqual(lines[499], '{"author":"A","quote":"Quote number 499","source":null}');
  assert.strictEqual(lines[500], "");
  fs.rmSync(dir, { recursive: true, force: true });
});
