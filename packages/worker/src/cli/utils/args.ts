import minimist from "minimist";
import { RecordFormat } from "@quotegraph/core";

export function stringArg(argv: minimist.ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    const value: unknown = argv[name];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number") return String(value);
  }
  return undefined;
}

export function intArg(argv: minimist.ParsedArgs, ...names: string[]): number | undefined {
  const raw = stringArg(argv, ...names);
  if (raw === undefined) return undefined;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`--${names[0]} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function formatArg(argv: minimist.ParsedArgs, fallback: RecordFormat): RecordFormat {
  const raw = stringArg(argv, "format");
  if (raw === undefined) return fallback;
  if (raw === "json" || raw === "jsonl") return raw;
  throw new Error(`--format must be "json" or "jsonl", got "${raw}"`);
}
