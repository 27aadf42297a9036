import { z, type ZodError } from "zod";
import { ConfigurationError } from "@ingestkit/errors";
import type {
  IndexBuildJobConfig,
  IndexParams,
  IngestionJobConfig,
  RuntimeConfig,
  StatusConfig,
  VectorDbConfig,
} from "@ingestkit/types";
import { DEFAULT_EMBEDDING_MODELS, resolveEmbeddingDimensions } from "./embedding-models.js";

type Env = Record<string, string | undefined>;

/** Blank variables count as unset, the way the job orchestrator renders empty values. */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val !== undefined && val.trim().length > 0 ? val.trim() : undefined));

function intWithDefault(defaultValue: number) {
  return optionalString
    .transform((val) => (val === undefined ? defaultValue : Number(val)))
    .pipe(z.number().int());
}

const optionalInt = optionalString
  .transform((val) => (val === undefined ? undefined : Number(val)))
  .pipe(z.number().int().positive().optional());

function enumWithDefault<U extends string, T extends Readonly<[U, ...U[]]>>(
  values: T,
  defaultValue: T[number],
) {
  return optionalString
    .transform((val) => (val === undefined ? defaultValue : val.toLowerCase()))
    .pipe(z.enum(values));
}

/**
 * Variables shared by both jobs.
 */
export const runtimeEnvSchema = z.object({
  NODE_ENV: enumWithDefault(["development", "test", "production"], "production"),
  LOG_LEVEL: enumWithDefault(["trace", "debug", "info", "warn", "error", "fatal"], "info"),
});

export const statusEnvSchema = z.object({
  STATUS_FILE_PATH: optionalString.transform((val) => val ?? "/tmp/job-status.json"),
  STATUS_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
});

export const vectorDbEnvSchema = z.object({
  VECTOR_DB_TYPE: enumWithDefault(["qdrant", "memory"], "qdrant"),
  VECTOR_DB_ENDPOINT: optionalString,
  QDRANT_URL: optionalString,
  QDRANT_API_KEY: optionalString,
  VECTOR_DB_COLLECTION: optionalString,
});

/**
 * Ingestion job variables. Identity fields (document set, source, collection)
 * stay optional here; {@link validateIngestionConfig} rejects them when empty so
 * the job itself can report the failure.
 */
export const ingestionEnvSchema = runtimeEnvSchema
  .merge(statusEnvSchema)
  .merge(vectorDbEnvSchema)
  .extend({
    DOCUMENT_SET_NAME: optionalString,
    SOURCE_URI: optionalString,
    SOURCE_TYPE: optionalString,
    SOURCE_FORMAT: enumWithDefault(["auto", "text", "markdown", "html"], "auto"),
    CHUNK_SIZE: intWithDefault(512),
    CHUNK_OVERLAP: intWithDefault(100),
    BATCH_SIZE: intWithDefault(16),

    EMBEDDING_PROVIDER: enumWithDefault(["openai", "cohere", "http"], "openai"),
    EMBEDDING_MODEL: optionalString,
    EMBEDDING_DIMENSIONS: optionalInt,
    EMBEDDING_ENDPOINT: optionalString.pipe(z.string().url().optional()),
    OPENAI_API_KEY: optionalString,
    OPENAI_API_BASE: optionalString.pipe(z.string().url().optional()),
    COHERE_API_KEY: optionalString,
    JOB_MAX_RETRIES: intWithDefault(3),
    JOB_RETRY_BACKOFF_MS: intWithDefault(30_000),
  });

export const indexBuildEnvSchema = runtimeEnvSchema
  .merge(statusEnvSchema)
  .merge(vectorDbEnvSchema)
  .extend({
    INDEX_JOB_NAME: optionalString,
    DOCUMENT_SET_NAME: optionalString,
    TARGET_ALIAS: optionalString,
    INDEX_TYPE: optionalString.transform((val) => val ?? "HNSW"),
    INDEX_POLL_INTERVAL_MS: intWithDefault(5_000),
    INDEX_MAX_WAIT_MS: intWithDefault(300_000),
  });

export function zodIssuesToFields(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "_";
    fields[key] ??= issue.message;
  }
  return fields;
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, env: Env, label: string): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const fields = zodIssuesToFields(result.error);
    const summary = Object.entries(fields)
      .map(([key, message]) => `${key}: ${message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${label} environment: ${summary}`, fields);
  }
  return result.data;
}

export function parseRuntimeEnv(env: Env = process.env): RuntimeConfig {
  const parsed = parseOrThrow(runtimeEnvSchema, env, "runtime");
  return { nodeEnv: parsed.NODE_ENV, logLevel: parsed.LOG_LEVEL };
}

export function parseStatusEnv(env: Env = process.env): StatusConfig {
  const parsed = parseOrThrow(statusEnvSchema, env, "status");
  return { filePath: parsed.STATUS_FILE_PATH, webhookUrl: parsed.STATUS_WEBHOOK_URL };
}

function toVectorDbConfig(parsed: z.output<typeof vectorDbEnvSchema>): VectorDbConfig {
  return {
    type: parsed.VECTOR_DB_TYPE,
    endpoint: parsed.VECTOR_DB_ENDPOINT ?? parsed.QDRANT_URL ?? "http://localhost:6333",
    apiKey: parsed.QDRANT_API_KEY,
    collection: parsed.VECTOR_DB_COLLECTION ?? "",
  };
}

/**
 * Collect `INDEX_PARAM_<NAME>` variables as `{ name: value }`, with integer
 * values converted to numbers.
 */
export function loadIndexParams(env: Env = process.env): IndexParams {
  const params: IndexParams = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith("INDEX_PARAM_") || value === undefined || value.trim() === "") continue;
    const name = key.slice("INDEX_PARAM_".length).toLowerCase();
    const trimmed = value.trim();
    params[name] = /^-?\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
  }
  return params;
}

/**
 * Build the ingestion job configuration from the environment.
 * `documentSetId` (the job argument) wins over DOCUMENT_SET_NAME.
 *
 * Throws a {@link ConfigurationError} only for malformed values.
 */
export function loadIngestionConfig(
  env: Env = process.env,
  documentSetId?: string,
): IngestionJobConfig {
  const parsed = parseOrThrow(ingestionEnvSchema, env, "ingestion");
  const provider = parsed.EMBEDDING_PROVIDER;
  const model = parsed.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODELS[provider];

  return {
    documentSetId: documentSetId?.trim() || parsed.DOCUMENT_SET_NAME || "",
    sourceUri: parsed.SOURCE_URI ?? "",
    sourceType: parsed.SOURCE_TYPE,
    sourceFormat: parsed.SOURCE_FORMAT,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    batchSize: parsed.BATCH_SIZE,
    vectorDb: toVectorDbConfig(parsed),
    embedding: {
      provider,
      model,
      dimensions: resolveEmbeddingDimensions(model, parsed.EMBEDDING_DIMENSIONS),
      endpoint: parsed.EMBEDDING_ENDPOINT,
      openaiApiKey: parsed.OPENAI_API_KEY ?? "",
      openaiApiBase: parsed.OPENAI_API_BASE,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      maxRetries: parsed.JOB_MAX_RETRIES,
      retryBackoffMs: parsed.JOB_RETRY_BACKOFF_MS,
    },
    status: { filePath: parsed.STATUS_FILE_PATH, webhookUrl: parsed.STATUS_WEBHOOK_URL },
  };
}

/**
 * Build the index-build job configuration from the environment.
 * `indexId` (the job argument) wins over INDEX_JOB_NAME.
 */
export function loadIndexBuildConfig(
  env: Env = process.env,
  indexId?: string,
): IndexBuildJobConfig {
  const parsed = parseOrThrow(indexBuildEnvSchema, env, "index build");

  return {
    indexId: indexId?.trim() || parsed.INDEX_JOB_NAME || "",
    documentSetId: parsed.DOCUMENT_SET_NAME ?? "",
    vectorDb: toVectorDbConfig(parsed),
    targetAlias: parsed.TARGET_ALIAS ?? "",
    indexType: parsed.INDEX_TYPE,
    indexParams: loadIndexParams(env),
    pollIntervalMs: parsed.INDEX_POLL_INTERVAL_MS,
    maxWaitMs: parsed.INDEX_MAX_WAIT_MS,
    status: { filePath: parsed.STATUS_FILE_PATH, webhookUrl: parsed.STATUS_WEBHOOK_URL },
  };
}
