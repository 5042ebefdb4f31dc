export interface QuoteCandidate {
  rawLine: string;
  /** Position of the line within its segment's `bodyLines`. */
  lineIndex: number;
}
