import { loadIndexBuildConfig } from "@ingestkit/config";
import { runIndexBuild, StatusReporter } from "@ingestkit/core";
import { errorMessage } from "@ingestkit/errors";
import { createChildLogger } from "@ingestkit/logger";
import type { IndexBuildJobConfig } from "@ingestkit/types";
import { createIndexStore } from "@ingestkit/vector-store";
import { failureReporter, type ProcessorOptions } from "./options.js";

/**
 * Index-build processor: tune and settle the collection built by an
 * ingestion run, then cut the serving alias over to it.
 */
export async function processIndexBuild(
  indexId: string,
  options: ProcessorOptions,
): Promise<number> {
  const env = options.env ?? process.env;
  const logger = createChildLogger(options.logger, { job: "index", indexId });

  let config: IndexBuildJobConfig;
  try {
    config = loadIndexBuildConfig(env, indexId);
  } catch (err) {
    logger.error({ err }, "Could not load index build configuration");
    await failureReporter(env, logger, options.fetch).reportIndexProgress(
      indexId,
      "Failed",
      `Error: ${errorMessage(err)}`,
    );
    return 1;
  }

  try {
    const result = await runIndexBuild(indexId, config, {
      indexStore: createIndexStore(config.vectorDb, {
        logger,
        memoryBackend: options.memoryBackend,
      }),
      reporter: StatusReporter.fromConfig(config.status, { logger, fetch: options.fetch }),
      logger,
      signal: options.signal,
    });
    logger.info({ result }, "Index build finished");
    return 0;
  } catch (err) {
    // Already logged and reported as Failed by the job
    const code = err instanceof Error ? err.name : typeof err;
    logger.debug({ code }, "Index build exited with failure");
    return 1;
  }
}
