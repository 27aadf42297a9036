import { z } from "zod";
import { ConfigurationError } from "@ingestkit/errors";
import type { IndexBuildJobConfig, IngestionJobConfig } from "@ingestkit/types";
import { zodIssuesToFields } from "./env.js";

const required = (label: string) => z.string().trim().min(1, `${label} is required`);

const ingestionRulesSchema = z
  .object({
    documentSetId: required("document set name"),
    sourceUri: required("source URI"),
    chunkSize: z.number().int().positive("chunk size must be positive"),
    chunkOverlap: z.number().int().nonnegative("chunk overlap must not be negative"),
    batchSize: z.number().int().positive("batch size must be positive"),
    vectorDb: z.object({ collection: required("collection") }),
    embedding: z.object({
      dimensions: z.number().int().positive("embedding dimensions must be positive"),
      maxRetries: z.number().int().nonnegative("max retries must not be negative"),
      retryBackoffMs: z.number().int().nonnegative("retry backoff must not be negative"),
    }),
  })
  .refine((cfg) => cfg.chunkOverlap < cfg.chunkSize, {
    message: "chunk overlap must be smaller than chunk size",
    path: ["chunkOverlap"],
  });

const indexBuildRulesSchema = z.object({
  indexId: required("index name"),
  vectorDb: z.object({ collection: required("collection") }),
  pollIntervalMs: z.number().int().positive("poll interval must be positive"),
  maxWaitMs: z.number().int().nonnegative("max wait must not be negative"),
});

function check(schema: z.ZodTypeAny, config: unknown, label: string): void {
  const result = schema.safeParse(config);
  if (result.success) return;

  const fields = zodIssuesToFields(result.error);
  const summary = Object.values(fields).join("; ");
  throw new ConfigurationError(`Invalid ${label} configuration: ${summary}`, fields);
}

export function validateIngestionConfig(config: IngestionJobConfig): void {
  check(ingestionRulesSchema, config, "ingestion");
}

export function validateIndexBuildConfig(config: IndexBuildJobConfig): void {
  check(indexBuildRulesSchema, config, "index build");
}
