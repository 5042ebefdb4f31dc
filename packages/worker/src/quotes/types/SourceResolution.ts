export type SourceResolution =
  | { kind: "found"; source: string; lineIndex: number; alternatives: number }
  | { kind: "none" };
