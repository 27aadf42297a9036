import { setTimeout as sleepFor } from "node:timers/promises";
import { validateIndexBuildConfig } from "@ingestkit/config";
import { AliasNotFoundError, CollectionNotFoundError, errorMessage } from "@ingestkit/errors";
import { createSilentLogger, type Logger } from "@ingestkit/logger";
import type { CollectionInfo, IndexBuildJobConfig, IndexBuildJobResult } from "@ingestkit/types";
import type { IIndexStore } from "@ingestkit/vector-store";
import type { StatusReporter } from "./status-reporter.js";

export interface IndexBuildDependencies {
  indexStore: IIndexStore;
  reporter: StatusReporter;
  logger?: Logger;
  /** Aborting cancels a pending readiness poll and fails the job. */
  signal?: AbortSignal;
  /** Replaces the timer-based sleep (tests). */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

interface ReadinessOptions {
  pollIntervalMs: number;
  maxWaitMs: number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * Poll until the collection reports "green". The first read happens before
 * any sleep. A failed read counts as not ready. Resolves with the last info
 * read and whether it was ready; a timeout is not an error.
 */
export async function waitForReady(
  store: IIndexStore,
  options: ReadinessOptions,
): Promise<{ ready: boolean; info: CollectionInfo | null }> {
  let waited = 0;
  let last: CollectionInfo | null = null;

  for (;;) {
    try {
      last = await store.getCollectionInfo();
    } catch (err) {
      options.logger.warn({ err: errorMessage(err) }, "Could not read collection status");
    }

    if (last?.status === "green") {
      options.logger.info("Index is ready");
      return { ready: true, info: last };
    }
    if (waited >= options.maxWaitMs) {
      options.logger.warn(
        { waitedMs: waited },
        "Timeout waiting for index to be ready, continuing anyway",
      );
      return { ready: false, info: last };
    }

    options.logger.info({ status: last?.status ?? "unknown" }, "Index not ready, waiting");
    await options.sleep(options.pollIntervalMs, options.signal);
    waited += options.pollIntervalMs;
  }
}

/**
 * Index-build job: verify the collection, tune its index, wait for
 * optimization to settle, then point the serving alias at it.
 */
export async function runIndexBuild(
  indexId: string,
  config: IndexBuildJobConfig,
  deps: IndexBuildDependencies,
): Promise<IndexBuildJobResult> {
  const name = indexId || config.indexId;
  const logger = deps.logger ?? createSilentLogger();
  const { reporter, indexStore } = deps;
  const collection = config.vectorDb.collection;

  try {
    validateIndexBuildConfig({ ...config, indexId: name });
    logger.info(
      { collection, targetAlias: config.targetAlias, indexType: config.indexType },
      "Starting index build job",
    );
    await reporter.reportIndexProgress(name, "Building", "Starting index build");

    const info = await indexStore.getCollectionInfo();
    if (!info) {
      throw new CollectionNotFoundError(collection);
    }

    let total = info.vectorCount;
    logger.info({ vectors: total }, "Collection found");
    await reporter.reportIndexProgress(
      name,
      "Building",
      `Found ${String(total)} vectors, optimizing index`,
      total,
      0,
    );

    try {
      await indexStore.updateIndexParams(config.indexParams);
      logger.info({ params: config.indexParams }, "Updated index parameters");
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, "Could not update index parameters");
    }

    const readiness = await waitForReady(indexStore, {
      pollIntervalMs: config.pollIntervalMs,
      maxWaitMs: config.maxWaitMs,
      sleep: deps.sleep ?? defaultSleep,
      signal: deps.signal,
      logger,
    });
    total = readiness.info?.vectorCount ?? total;

    await reporter.reportIndexProgress(
      name,
      "Optimizing",
      "Index built, performing alias swap",
      total,
      total,
    );

    let aliasSwapped = false;
    if (config.targetAlias) {
      try {
        await indexStore.switchAlias(config.targetAlias, collection);
      } catch (err) {
        if (!(err instanceof AliasNotFoundError)) throw err;
        logger.info({ alias: config.targetAlias }, "Alias missing, creating it");
        await indexStore.createAlias(config.targetAlias, collection);
      }
      aliasSwapped = true;
      logger.info({ alias: config.targetAlias, collection }, "Alias now points at collection");
    }

    await reporter.reportIndexProgress(
      name,
      "Succeeded",
      `Index built successfully with ${String(total)} vectors`,
      total,
      total,
      aliasSwapped,
    );

    return {
      indexId: name,
      collection,
      totalVectors: total,
      ready: readiness.ready,
      alias: config.targetAlias || null,
      aliasSwapped,
    };
  } catch (err) {
    logger.error({ err }, "Index build job failed");
    await reporter.reportIndexProgress(name, "Failed", `Error: ${errorMessage(err)}`);
    throw err;
  }
}
