import type { Logger } from "@ingestkit/logger";
import type { VectorDbConfig } from "@ingestkit/types";
import type { IIndexStore } from "./index-store.interface.js";
import { MemoryIndexStore, type MemoryIndexBackend } from "./memory-adapter.js";
import { QdrantIndexStore } from "./qdrant-adapter.js";

export interface IndexStoreFactoryOptions {
  logger?: Logger;
  /** Backend for `memory` stores. Default: the process-wide shared backend */
  memoryBackend?: MemoryIndexBackend;
}

export function createIndexStore(
  config: VectorDbConfig,
  options: IndexStoreFactoryOptions = {},
): IIndexStore {
  switch (config.type) {
    case "qdrant":
      return new QdrantIndexStore({
        url: config.endpoint,
        apiKey: config.apiKey,
        collection: config.collection,
        logger: options.logger,
      });
    case "memory":
      return new MemoryIndexStore(config.collection, options.memoryBackend);
  }
}
