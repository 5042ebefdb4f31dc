import { QuoteRecord, QuoteRecordSchema, RecordFormat, RecordFormatError } from "@quotegraph/core";

function validate(value: unknown, position: string): QuoteRecord {
  const parsed = QuoteRecordSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join("; ");
    throw new RecordFormatError(`Invalid quote record at ${position}: ${issues}`, parsed.error.errors);
  }
  return parsed.data;
}

function parseJson(text: string, position: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new RecordFormatError(`Invalid JSON at ${position}`, error);
  }
}

export function parseQuoteRecords(text: string, format: RecordFormat): QuoteRecord[] {
  if (format === "json") {
    const parsed = parseJson(text, "document");
    if (!Array.isArray(parsed)) {
      throw new RecordFormatError("Expected a JSON array of quote records");
    }
    return parsed.map((value, idx) => validate(value, `index ${idx}`));
  }

  const records: QuoteRecord[] = [];
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    records.push(validate(parseJson(line, `line ${i + 1}`), `line ${i + 1}`));
  }
  return records;
}

export function detectRecordFormat(filePath: string, fallback: RecordFormat): RecordFormat {
  if (/\.jsonl$|\.ndjson$/i.test(filePath)) return "jsonl";
  if (/\.json$/i.test(filePath)) return "json";
  return fallback;
}
