import type { DocumentMetadata } from "./document.js";

export interface PointPayload {
  text: string;
  metadata: DocumentMetadata;
  doc_id: string;
  chunk_index: number;
  [key: string]: unknown;
}

export interface Point {
  id: string;
  vector: number[];
  payload: PointPayload;
}

/** "green" means optimization has settled; anything else is still in progress. */
export type CollectionStatus = "green" | "yellow" | "grey" | "red" | (string & {});

export interface CollectionInfo {
  name: string;
  vectorCount: number;
  status: CollectionStatus;
  dimension: number | null;
}

export interface AliasDescription {
  aliasName: string;
  collectionName: string;
}

export type IndexParams = Record<string, number | string>;

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}
