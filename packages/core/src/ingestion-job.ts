import { processDocuments } from "@ingestkit/chunker";
import { validateIngestionConfig } from "@ingestkit/config";
import type { EmbeddingClient } from "@ingestkit/embeddings";
import { DimensionMismatchError, errorMessage, SourceNotFoundError } from "@ingestkit/errors";
import { createSilentLogger, redactUri, type Logger } from "@ingestkit/logger";
import type { SourceRegistry } from "@ingestkit/sources";
import type { EmbeddedChunk, IngestionJobConfig, IngestionJobResult } from "@ingestkit/types";
import type { IIndexStore } from "@ingestkit/vector-store";
import { toBatches, toPoint } from "./point-id.js";
import type { StatusReporter } from "./status-reporter.js";

export interface IngestionDependencies {
  sources: SourceRegistry;
  embeddingClient: Pick<EmbeddingClient, "dimensions" | "embed">;
  indexStore: IIndexStore;
  reporter: StatusReporter;
  logger?: Logger;
  /** Checked between batches; the embedding client watches its own signal during backoff. */
  signal?: AbortSignal;
}

/**
 * Ingestion job: Fetch -> Normalize/Chunk -> Embed -> Upsert
 *
 * Batches are committed one at a time, so a failure leaves earlier batches in
 * the collection. Point ids are deterministic and a rerun overwrites them.
 */
export async function runIngestion(
  documentSetId: string,
  config: IngestionJobConfig,
  deps: IngestionDependencies,
): Promise<IngestionJobResult> {
  const name = documentSetId || config.documentSetId;
  const logger = deps.logger ?? createSilentLogger();
  const { reporter } = deps;
  const fail = async (err: unknown): Promise<never> => {
    logger.error({ err }, "Ingestion job failed");
    await reporter.reportEmbeddingProgress(name, "Failed", `Error: ${errorMessage(err)}`);
    throw err;
  };

  await reporter.reportEmbeddingProgress(name, "Pending", "Validating configuration");
  try {
    validateIngestionConfig({ ...config, documentSetId: name });
  } catch (err) {
    return fail(err);
  }

  try {
    const source = redactUri(config.sourceUri);
    logger.info({ source, collection: config.vectorDb.collection }, "Starting ingestion job");

    // Phase 1: Fetch
    await reporter.reportEmbeddingProgress(name, "Running", `Fetching documents from ${source}`);
    const documents = await deps.sources.fetchDocuments(config.sourceUri, config.sourceType);

    // Phase 2: Normalize and chunk
    const chunks = processDocuments(
      documents,
      { chunkSize: config.chunkSize, overlap: config.chunkOverlap, format: config.sourceFormat },
      logger,
    );
    if (chunks.length === 0) {
      const count = String(documents.length);
      throw new SourceNotFoundError(`No text content in ${count} documents from ${source}`);
    }
    const total = chunks.length;

    await deps.indexStore.ensureCollection(deps.embeddingClient.dimensions);
    await reporter.reportEmbeddingProgress(
      name,
      "Running",
      `Embedding ${String(total)} chunks from ${String(documents.length)} documents`,
      total,
      0,
    );

    // Phase 3: Embed and upsert, one batch at a time
    const batches = toBatches(chunks, config.batchSize);
    let processed = 0;
    for (const batch of batches) {
      deps.signal?.throwIfAborted();

      const vectors = await deps.embeddingClient.embed(batch.map((chunk) => chunk.text));
      const embedded: EmbeddedChunk[] = batch.map((chunk, i) => {
        const vector = vectors[i];
        if (!vector) {
          throw new DimensionMismatchError(batch.length, vectors.length, "embedding count");
        }
        return { chunk, vector };
      });

      await deps.indexStore.upsert(embedded.map(toPoint));
      processed += batch.length;
      logger.debug({ processed, total }, "Upserted batch");
      await reporter.reportEmbeddingProgress(
        name,
        "Running",
        `Processed ${String(processed)}/${String(total)} chunks`,
        total,
        processed,
      );
    }

    const summary =
      `Indexed ${String(total)} chunks from ${String(documents.length)} documents ` +
      `into ${config.vectorDb.collection}`;
    await reporter.reportEmbeddingProgress(name, "Succeeded", summary, total, processed);
    logger.info({ total, batches: batches.length }, "Ingestion job completed");

    return {
      documentSetId: name,
      collection: config.vectorDb.collection,
      documentCount: documents.length,
      totalChunks: total,
      processedChunks: processed,
      batchCount: batches.length,
    };
  } catch (err) {
    return fail(err);
  }
}
