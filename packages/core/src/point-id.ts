import { v5 as uuidv5 } from "uuid";
import type { EmbeddedChunk, Point } from "@ingestkit/types";

/**
 * Deterministic point id: re-ingesting the same chunk overwrites the
 * existing point instead of adding a duplicate.
 */
export function pointId(docId: string, chunkId: string): string {
  return uuidv5(`${docId}:${chunkId}`, uuidv5.DNS);
}

export function toPoint({ chunk, vector }: EmbeddedChunk): Point {
  return {
    id: pointId(chunk.docId, chunk.id),
    vector,
    payload: {
      text: chunk.text,
      metadata: chunk.metadata,
      doc_id: chunk.docId,
      chunk_index: chunk.chunkIndex,
    },
  };
}

export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}
