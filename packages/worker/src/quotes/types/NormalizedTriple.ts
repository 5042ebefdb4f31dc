export interface NormalizedTriple {
  authorKey: string;
  quoteKey: string;
  sourceKey?: string;
  authorName: string;
  quoteText: string;
  sourceTitle?: string;
}
