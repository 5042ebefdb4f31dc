export interface ExtractedTriple {
  author: string;
  quoteText: string;
  source?: string;
}
