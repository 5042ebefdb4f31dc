import { QuoteRecord, RecordFormat } from "@quotegraph/core";
import { NormalizedTriple } from "../types/NormalizedTriple";
import { RecordSink } from "./sinks";

export function toQuoteRecord(triple: NormalizedTriple): QuoteRecord {
  return {
    author: triple.authorName,
    quote: triple.quoteText,
    source: triple.sourceTitle ?? null,
  };
}

export function serializeRecord(record: QuoteRecord, format: RecordFormat): string {
  // explicit key order keeps output byte-stable
  const ordered: QuoteRecord = { author: record.author, quote: record.quote, source: record.source };
  return format === "jsonl" ? JSON.stringify(ordered) : JSON.stringify(ordered, null, 2).replace(/^/gm, "  ");
}

/**
 * Writes records to a sink as they arrive. `json` output is a single array;
 * `close()` writes its closing bracket, so a run that fails midway still
 * leaves a parseable file holding everything emitted so far.
 */
export class RecordEmitter {
  private count = 0;
  private closed = false;

  constructor(
    private readonly sink: RecordSink,
    private readonly format: RecordFormat = "jsonl",
  ) {}

  get emitted(): number {
    return this.count;
  }

  async emit(triple: NormalizedTriple): Promise<void> {
    if (this.closed) throw new Error("RecordEmitter is closed");
    const body = serializeRecord(toQuoteRecord(triple), this.format);
    if (this.format === "jsonl") {
      await this.sink.write(`${body}\n`);
    } else {
      await this.sink.write(`${this.count === 0 ? "[\n" : ",\n"}${body}`);
    }
    this.count++;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.format === "json") {
      await this.sink.write(this.count === 0 ? "[]\n" : "\n]\n");
    }
    await this.sink.close();
  }
}
