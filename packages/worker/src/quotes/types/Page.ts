export interface Page {
  title: string;
  rawText: string;
}
