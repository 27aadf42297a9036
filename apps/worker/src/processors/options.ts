import { parseStatusEnv } from "@ingestkit/config";
import { StatusReporter } from "@ingestkit/core";
import type { IEmbeddingProvider } from "@ingestkit/embeddings";
import { errorMessage } from "@ingestkit/errors";
import type { Logger } from "@ingestkit/logger";
import type { SourceRegistry } from "@ingestkit/sources";
import type { MemoryIndexBackend } from "@ingestkit/vector-store";

export type Env = Record<string, string | undefined>;

/** What a processor needs beyond the environment; everything but `logger` is optional. */
export interface ProcessorOptions {
  logger: Logger;
  env?: Env;
  signal?: AbortSignal;
  fetch?: typeof fetch;
  sources?: SourceRegistry;
  embeddingProvider?: IEmbeddingProvider;
  memoryBackend?: MemoryIndexBackend;
}

/**
 * Reporter for a job whose configuration would not load. Falls back to
 * log-only when the status variables are the broken ones.
 */
export function failureReporter(env: Env, logger: Logger, fetchFn?: typeof fetch): StatusReporter {
  try {
    return StatusReporter.fromConfig(parseStatusEnv(env), { logger, fetch: fetchFn });
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "Status settings invalid, reporting to the log only");
    return new StatusReporter({ logger });
  }
}
