import { loadIngestionConfig } from "@ingestkit/config";
import { runIngestion, StatusReporter } from "@ingestkit/core";
import { createEmbeddingProvider, EmbeddingClient } from "@ingestkit/embeddings";
import { errorMessage } from "@ingestkit/errors";
import { createChildLogger } from "@ingestkit/logger";
import { createDefaultSourceRegistry } from "@ingestkit/sources";
import type { IngestionJobConfig } from "@ingestkit/types";
import { createIndexStore } from "@ingestkit/vector-store";
import { failureReporter, type ProcessorOptions } from "./options.js";

/**
 * Ingest processor.
 *
 * Workflow:
 * 1. Load the job configuration from the environment
 * 2. Wire the source registry, embedding client and index store
 * 3. Run the ingestion job (fetch -> chunk -> embed -> upsert)
 *
 * Resolves with the process exit code. Failures are reported by the job
 * itself, or here when the configuration does not load.
 */
export async function processIngest(
  documentSetId: string,
  options: ProcessorOptions,
): Promise<number> {
  const env = options.env ?? process.env;
  const logger = createChildLogger(options.logger, { job: "ingest", documentSetId });

  let config: IngestionJobConfig;
  try {
    config = loadIngestionConfig(env, documentSetId);
  } catch (err) {
    logger.error({ err }, "Could not load ingestion configuration");
    await failureReporter(env, logger, options.fetch).reportEmbeddingProgress(
      documentSetId,
      "Failed",
      `Error: ${errorMessage(err)}`,
    );
    return 1;
  }

  logger.info(
    {
      provider: config.embedding.provider,
      model: config.embedding.model,
      vectorDb: config.vectorDb.type,
      collection: config.vectorDb.collection,
    },
    "Configuration loaded",
  );

  const provider = options.embeddingProvider ?? createEmbeddingProvider(config.embedding);
  const embeddingClient = new EmbeddingClient({
    provider,
    dimensions: config.embedding.dimensions,
    maxRetries: config.embedding.maxRetries,
    retryBackoffMs: config.embedding.retryBackoffMs,
    signal: options.signal,
    logger,
  });

  try {
    const result = await runIngestion(documentSetId, config, {
      sources: options.sources ?? createDefaultSourceRegistry({ logger, fetch: options.fetch }),
      embeddingClient,
      indexStore: createIndexStore(config.vectorDb, {
        logger,
        memoryBackend: options.memoryBackend,
      }),
      reporter: StatusReporter.fromConfig(config.status, { logger, fetch: options.fetch }),
      logger,
      signal: options.signal,
    });
    logger.info({ result }, "Ingestion finished");
    return 0;
  } catch (err) {
    // Already logged and reported as Failed by the job
    const code = err instanceof Error ? err.name : typeof err;
    logger.debug({ code }, "Ingestion exited with failure");
    return 1;
  }
}
