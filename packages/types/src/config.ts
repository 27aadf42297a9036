import type { DocumentFormat } from "./document.js";
import type { IndexParams } from "./pipeline.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type VectorStoreType = "qdrant" | "memory";

export type EmbeddingProviderType = "openai" | "cohere" | "http";

export interface VectorDbConfig {
  type: VectorStoreType;
  endpoint: string;
  apiKey?: string;
  collection: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  model?: string;
  dimensions: number;
  endpoint?: string;
  openaiApiKey: string;
  openaiApiBase?: string;
  cohereApiKey: string;
  maxRetries: number;
  retryBackoffMs: number;
}

export interface StatusConfig {
  filePath: string;
  webhookUrl?: string;
}

export interface RuntimeConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: LogLevel;
}

export interface IngestionJobConfig {
  documentSetId: string;
  sourceUri: string;
  /** Overrides the scheme taken from sourceUri. */
  sourceType?: string;
  sourceFormat: DocumentFormat | "auto";
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
  vectorDb: VectorDbConfig;
  embedding: EmbeddingConfig;
  status: StatusConfig;
}

export interface IndexBuildJobConfig {
  indexId: string;
  documentSetId: string;
  vectorDb: VectorDbConfig;
  targetAlias: string;
  indexType: string;
  indexParams: IndexParams;
  pollIntervalMs: number;
  maxWaitMs: number;
  status: StatusConfig;
}
