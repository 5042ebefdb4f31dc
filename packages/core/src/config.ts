import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

// Load .env from monorepo root regardless of cwd
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ConfigSchema = z.object({
  corpus: z.object({
    xmlPath: z.string().min(1, "XML_FILE must not be empty").default("enwikiquote-pages-articles.xml"),
    pageLimit: z.coerce.number().int().min(1).optional(), // unset means the whole corpus
  }),
  output: z.object({
    quotesFile: z.string().min(1, "QUOTES_FILE must not be empty").default("extracted_quotes.jsonl"),
    format: z.enum(["jsonl", "json"]).default("jsonl"),
  }),
  store: z.object({
    sqlitePath: z.string().min(1).default(".local/quotes.sqlite"),
    batchSize: z.coerce.number().int().min(1).default(1000),
  }),
  search: z.object({
    limit: z.coerce.number().int().min(1).default(5),
  }),
  log: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RecordFormat = Config["output"]["format"];

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    corpus: {
      xmlPath: env.XML_FILE || undefined,
      pageLimit: env.PAGE_LIMIT || undefined,
    },
    output: {
      quotesFile: env.QUOTES_FILE || undefined,
      format: env.QUOTES_FORMAT || undefined,
    },
    store: {
      sqlitePath: env.SQLITE_PATH || undefined,
      batchSize: env.BATCH_SIZE || undefined,
    },
    search: {
      limit: env.SEARCH_LIMIT || undefined,
    },
    log: {
      level: env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : undefined,
    },
  };

  try {
    return ConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
      throw new Error(`Configuration error:\n${messages}\n\nPlease check your .env file.`);
    }
    throw error;
  }
}

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = loadConfig();
  return cachedConfig;
}
