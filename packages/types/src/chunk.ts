import type { DocumentFormat, DocumentMetadata } from "./document.js";

export interface Chunk {
  id: string;
  docId: string;
  chunkIndex: number;
  totalChunks: number;
  text: string;
  metadata: DocumentMetadata;
}

/** A chunk with its vector; the vector length is the index dimension. */
export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}

export interface ChunkingOptions {
  /** Maximum chunk length in characters. */
  chunkSize: number;
  /** Characters carried over from the end of one chunk into the next. */
  overlap: number;
  /** Paragraph boundary tried before any hard split. Default: "\n\n" */
  separator?: string;
}

export interface ProcessDocumentsOptions extends ChunkingOptions {
  /** "auto" picks a format per document from its metadata. Default: "auto" */
  format?: DocumentFormat | "auto";
}
