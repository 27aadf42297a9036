import type { Logger } from "@ingestkit/logger";
import type { Chunk, Document, ProcessDocumentsOptions } from "@ingestkit/types";
import { chunkText } from "./chunk-text.js";
import { detectFormat, normalizeText } from "./normalize.js";

export function chunkId(docId: string, chunkIndex: number): string {
  return `${docId}_chunk_${chunkIndex}`;
}

/**
 * Normalize and chunk every document, in input order. Documents left empty
 * by normalization produce no chunks.
 */
export function processDocuments(
  documents: readonly Document[],
  options: ProcessDocumentsOptions,
  logger?: Logger,
): Chunk[] {
  const requestedFormat = options.format ?? "auto";
  const chunks: Chunk[] = [];

  for (const doc of documents) {
    const format = requestedFormat === "auto" ? detectFormat(doc.metadata) : requestedFormat;
    const text = normalizeText(doc.text, format);

    if (text.length === 0) {
      logger?.warn({ docId: doc.id, format }, "Document has no text content after processing");
      continue;
    }

    const pieces = chunkText(text, options);
    pieces.forEach((piece, chunkIndex) => {
      chunks.push({
        id: chunkId(doc.id, chunkIndex),
        docId: doc.id,
        chunkIndex,
        totalChunks: pieces.length,
        text: piece,
        metadata: {
          ...doc.metadata,
          chunk_index: chunkIndex,
          total_chunks: pieces.length,
        },
      });
    });
  }

  logger?.info(
    { documents: documents.length, chunks: chunks.length },
    "Processed documents into chunks",
  );
  return chunks;
}
