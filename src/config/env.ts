import { z } from "zod";
import { ConfigError } from "../domain/errors.js";
import { LogLevelName } from "../infra/logging/logger.js";

const booleanFlag = z.enum(["true", "false"]);

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  DB_SCHEMA: z.string().min(1).default("public"),
  INCLUDE_TABLES: z.string().optional(),
  IGNORE_TABLES: z.string().optional(),
  SAMPLE_ROWS_IN_TABLE_INFO: z.coerce.number().int().min(0).default(3),
  SCHEMA_CHUNK_SIZE: z.coerce.number().int().positive().default(800),
  SCHEMA_CHUNK_OVERLAP: z.coerce.number().int().min(0).default(0),
  ENABLE_PGVECTOR: booleanFlag.optional(),
  VECTOR_DATABASE_URL: z.string().optional(),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  PERSIST_INDEX: booleanFlag.optional(),
  INDEX_PATH: z.string().default(".data/schema-index.json"),
  MAX_INDEX_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai"]).optional(),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"])),
  LOG_COLORS: booleanFlag.optional(),
  LOG_TIMESTAMPS: booleanFlag.default("true"),
});

export interface AppConfig {
  databaseUrl: string | null;
  dbSchema: string;
  includeTables: string[];
  ignoreTables: string[];
  sampleRowsInTableInfo: number;
  chunkSize: number;
  chunkOverlap: number;
  enablePgvector: boolean;
  vectorDatabaseUrl: string | null;
  vectorDimension: number;
  persistIndex: boolean;
  indexPath: string;
  maxIndexBytes: number;
  openaiApiKey: string | null;
  embeddingModel: string;
  embeddingProvider: "none" | "openai";
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: LogLevelName;
  /** Unset means "color when stderr is a TTY". */
  logColors: boolean | undefined;
  logTimestamps: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`, result.error);
  }

  const parsed = result.data;
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";
  if (enablePgvector && !parsed.VECTOR_DATABASE_URL) {
    throw new ConfigError("ENABLE_PGVECTOR=true requires VECTOR_DATABASE_URL.");
  }
  if (parsed.SCHEMA_CHUNK_OVERLAP >= parsed.SCHEMA_CHUNK_SIZE) {
    throw new ConfigError("SCHEMA_CHUNK_OVERLAP must be smaller than SCHEMA_CHUNK_SIZE.");
  }

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (parsed.OPENAI_API_KEY ? "openai" : "none");

  return {
    databaseUrl: parsed.DATABASE_URL ?? null,
    dbSchema: parsed.DB_SCHEMA,
    includeTables: parseList(parsed.INCLUDE_TABLES),
    ignoreTables: parseList(parsed.IGNORE_TABLES),
    sampleRowsInTableInfo: parsed.SAMPLE_ROWS_IN_TABLE_INFO,
    chunkSize: parsed.SCHEMA_CHUNK_SIZE,
    chunkOverlap: parsed.SCHEMA_CHUNK_OVERLAP,
    enablePgvector,
    vectorDatabaseUrl: parsed.VECTOR_DATABASE_URL ?? null,
    vectorDimension: parsed.VECTOR_DIMENSION,
    persistIndex: parsed.PERSIST_INDEX === "true",
    indexPath: parsed.INDEX_PATH,
    maxIndexBytes: parsed.MAX_INDEX_BYTES,
    openaiApiKey: parsed.OPENAI_API_KEY || null,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    embeddingProvider,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
    logColors: parsed.LOG_COLORS === undefined ? undefined : parsed.LOG_COLORS === "true",
    logTimestamps: parsed.LOG_TIMESTAMPS === "true",
  };
}

export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.databaseUrl) {
    throw new ConfigError("DATABASE_URL is required to introspect the schema source.");
  }
  return config.databaseUrl;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
