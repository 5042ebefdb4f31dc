import { z } from "zod";

/**
 * One line of the intermediate record stream. Field names are fixed:
 * `author`, `quote`, `source`; an absent source is written as `null`.
 */
export interface QuoteRecord {
  author: string;
  quote: string;
  source: string | null;
}

export const QuoteRecordSchema = z.object({
  author: z.string().trim().min(1, "author must not be empty"),
  quote: z.string().trim().min(1, "quote must not be empty"),
  source: z.string().nullable(),
});

export type NodeLabel = "Author" | "Quote" | "Source";
