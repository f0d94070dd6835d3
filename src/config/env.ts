import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  APP_VERSION: z.string().default("1.0.0"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: positiveInt(20_000),
  LLM_MAX_CONCURRENCY: positiveInt(4),
  SQL_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  FACT_TABLE_NAME: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/i, "must be a plain SQL identifier")
    .default("monsters"),
  FACT_TABLE_MAX_ROWS: positiveInt(50),
  QUERY_TIMEOUT_MS: positiveInt(10_000),
  DATABASE_URL: optionalString,
  PGHOST: optionalString,
  PGPORT: z.coerce.number().int().positive().optional(),
  PGUSER: optionalString,
  PGPASSWORD: optionalString,
  PGDATABASE: optionalString,
  PGSSLMODE: optionalString,
  CORPUS_PATH: z.string().default("data/corpus.json"),
  CORPUS_URL: z.string().url().optional(),
  RETRIEVAL_TOP_K: positiveInt(4)
});

export interface DatabaseSettings {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  ssl: boolean;
}

export interface AppConfig {
  port: number;
  version: string;
  llm: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxConcurrency: number;
  };
  factTable: {
    tableName: string;
    maxRows: number;
    queryTimeoutMs: number;
    maxRetries: number;
    database: DatabaseSettings;
  };
  corpus: {
    path: string;
    url?: string;
    topK: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const values = parsed.data;
  const config: AppConfig = {
    port: values.PORT,
    version: values.APP_VERSION,
    llm: {
      apiKey: values.OPENAI_API_KEY,
      model: values.OPENAI_MODEL,
      timeoutMs: values.LLM_TIMEOUT_MS,
      maxConcurrency: values.LLM_MAX_CONCURRENCY
    },
    factTable: {
      tableName: values.FACT_TABLE_NAME,
      maxRows: values.FACT_TABLE_MAX_ROWS,
      queryTimeoutMs: values.QUERY_TIMEOUT_MS,
      maxRetries: values.SQL_MAX_RETRIES,
      database: {
        connectionString: values.DATABASE_URL,
        host: values.PGHOST,
        port: values.PGPORT,
        user: values.PGUSER,
        password: values.PGPASSWORD,
        database: values.PGDATABASE,
        ssl: values.PGSSLMODE === "require"
      }
    },
    corpus: {
      path: values.CORPUS_PATH,
      url: values.CORPUS_URL,
      topK: values.RETRIEVAL_TOP_K
    }
  };

  return Object.freeze(config);
}
