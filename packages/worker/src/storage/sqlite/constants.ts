import path from "path";

export const MEMORY_DB_PATH = ":memory:";
export const DEFAULT_SEARCH_LIMIT = 10;

export function resolveSqlitePath(configured: string): string {
  if (configured === MEMORY_DB_PATH) return configured;
  return path.resolve(process.cwd(), configured);
}
