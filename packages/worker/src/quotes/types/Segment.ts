export interface Segment {
  authorName: string;
  bodyText: string;
  bodyLines: string[];
}
