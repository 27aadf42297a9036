import type { EmbeddingProviderType } from "@ingestkit/types";

export const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderType, string> = {
  openai: "text-embedding-3-small",
  cohere: "embed-v4.0",
  http: "bge-m3",
};

/** Output dimension of the models we know; anything else needs EMBEDDING_DIMENSIONS. */
export const EMBEDDING_DIMENSIONS: Readonly<Record<string, number>> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
  "embed-v4.0": 1024,
  "embed-english-v3.0": 1024,
  "embed-multilingual-v3.0": 1024,
  "bge-m3": 1024,
  "bge-large-en": 1024,
  "bge-base-en": 768,
  "bge-small-en": 384,
};

export function resolveEmbeddingDimensions(model: string, explicit?: number): number {
  return explicit ?? EMBEDDING_DIMENSIONS[model] ?? 1536;
}
