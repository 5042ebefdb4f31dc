import { normalizeKey } from "@quotegraph/core";
import { ExtractedTriple } from "./types/ExtractedTriple";
import { NormalizedTriple } from "./types/NormalizedTriple";

export function normalizeTriple(triple: ExtractedTriple): NormalizedTriple {
  const normalized: NormalizedTriple = {
    authorKey: normalizeKey(triple.author),
    quoteKey: normalizeKey(triple.quoteText),
    authorName: triple.author,
    quoteText: triple.quoteText,
  };
  if (triple.source !== undefined) {
    normalized.sourceKey = normalizeKey(triple.source);
    normalized.sourceTitle = triple.source;
  }
  return normalized;
}

export function dedupKey(triple: Pick<NormalizedTriple, "authorKey" | "quoteKey" | "sourceKey">): string {
  return JSON.stringify([triple.authorKey, triple.quoteKey, triple.sourceKey ?? null]);
}

/**
 * Run-scoped set of seen key triples. Construct one per extraction run; the
 * first occurrence of a key triple is kept with its display text.
 */
export class Deduplicator {
  private readonly seen = new Set<string>();

  accept(triple: ExtractedTriple): NormalizedTriple | null {
    const normalized = normalizeTriple(triple);
    const key = dedupKey(normalized);
    if (this.seen.has(key)) return null;
    this.seen.add(key);
    return normalized;
  }

  get size(): number {
    return this.seen.size;
  }
}
