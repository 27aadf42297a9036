import { QdrantClient } from "@qdrant/js-client-rest";
import {
  AliasNotFoundError,
  DimensionMismatchError,
  IndexStoreError,
  UpsertFailedError,
  errorMessage,
  withRetry,
} from "@ingestkit/errors";
import { createSilentLogger, type Logger } from "@ingestkit/logger";
import type { AliasDescription, CollectionInfo, IndexParams, Point } from "@ingestkit/types";
import type { IIndexStore } from "./index-store.interface.js";
import { toHnswTuning } from "./index-params.js";

export interface QdrantIndexStoreOptions {
  url: string;
  apiKey?: string;
  collection: string;
  logger?: Logger;
  /** Base delay for re-trying alias creation after a non-atomic switch. Default: 500 */
  aliasRetryDelayMs?: number;
  client?: QdrantClient;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

function vectorSize(vectors: unknown): number | null {
  if (typeof vectors === "object" && vectors !== null && "size" in vectors) {
    return typeof vectors.size === "number" ? vectors.size : null;
  }
  return null;
}

export class QdrantIndexStore implements IIndexStore {
  readonly collection: string;
  private readonly client: QdrantClient;
  private readonly logger: Logger;
  private readonly aliasRetryDelayMs: number;

  constructor(options: QdrantIndexStoreOptions) {
    this.collection = options.collection;
    this.client =
      options.client ??
      new QdrantClient({
        url: options.url,
        apiKey: options.apiKey,
        timeout: 60_000,
        checkCompatibility: false,
      });
    this.logger = options.logger ?? createSilentLogger();
    this.aliasRetryDelayMs = options.aliasRetryDelayMs ?? 500;
  }

  private wrap(action: string, error: unknown): IndexStoreError {
    return new IndexStoreError(`Qdrant ${action} failed: ${errorMessage(error)}`, {
      statusCode: statusOf(error),
      cause: error,
    });
  }

  async ensureCollection(dimension: number): Promise<void> {
    const existing = await this.getCollectionInfo();

    if (existing) {
      if (existing.dimension !== null && existing.dimension !== dimension) {
        const what = `collection ${this.collection}`;
        throw new DimensionMismatchError(existing.dimension, dimension, what);
      }
      this.logger.info({ collection: this.collection }, "Collection already exists");
      return;
    }

    this.logger.info({ collection: this.collection, dimension }, "Creating collection");
    try {
      await this.client.createCollection(this.collection, {
        vectors: { size: dimension, distance: "Cosine" },
        optimizers_config: { indexing_threshold: 20_000 },
        hnsw_config: { m: 16, ef_construct: 100 },
      });
    } catch (error: unknown) {
      // Another writer may have created it between our check and the create
      if (statusOf(error) === 409) return;
      throw this.wrap("create collection", error);
    }
  }

  async upsert(points: Point[]): Promise<void> {
    if (points.length === 0) return;

    try {
      const result = await this.client.upsert(this.collection, {
        wait: true,
        points: points.map((p) => ({ id: p.id, vector: p.vector, payload: p.payload })),
      });
      if (result.status !== "completed") {
        throw new Error(`operation ${String(result.operation_id)} ended as ${result.status}`);
      }
    } catch (error: unknown) {
      throw new UpsertFailedError(this.collection, points.length, { cause: error });
    }
    this.logger.debug({ collection: this.collection, count: points.length }, "Upserted points");
  }

  async getCollectionInfo(): Promise<CollectionInfo | null> {
    try {
      const info = await this.client.getCollection(this.collection);
      return {
        name: this.collection,
        vectorCount: info.points_count ?? 0,
        status: info.status,
        dimension: vectorSize(info.config.params.vectors),
      };
    } catch (error: unknown) {
      if (statusOf(error) === 404) return null;
      throw this.wrap("get collection", error);
    }
  }

  async updateIndexParams(params: IndexParams): Promise<void> {
    const tuning = toHnswTuning(params);
    try {
      await this.client.updateCollection(this.collection, {
        hnsw_config: { m: tuning.m, ef_construct: tuning.efConstruct },
        optimizers_config: { indexing_threshold: tuning.indexingThreshold },
      });
    } catch (error: unknown) {
      throw this.wrap("update collection", error);
    }
    this.logger.info({ collection: this.collection, ...tuning }, "Updated HNSW configuration");
  }

  async createAlias(alias: string, collection: string = this.collection): Promise<void> {
    try {
      await this.client.updateCollectionAliases({
        actions: [{ create_alias: { collection_name: collection, alias_name: alias } }],
      });
    } catch (error: unknown) {
      throw this.wrap(`create alias ${alias}`, error);
    }
    this.logger.info({ alias, collection }, "Created alias");
  }

  private async deleteAlias(alias: string): Promise<void> {
    try {
      await this.client.updateCollectionAliases({
        actions: [{ delete_alias: { alias_name: alias } }],
      });
    } catch (error: unknown) {
      if (statusOf(error) === 404) throw new AliasNotFoundError(alias, { cause: error });
      throw this.wrap(`delete alias ${alias}`, error);
    }
  }

  /**
   * One request that drops and re-creates the alias, so readers never see it
   * missing. When that request is rejected (typically because the alias does
   * not exist yet) fall back to separate steps; in that path the alias is
   * briefly absent between the delete and the create.
   */
  async switchAlias(alias: string, collection: string): Promise<void> {
    try {
      await this.client.updateCollectionAliases({
        actions: [
          { delete_alias: { alias_name: alias } },
          { create_alias: { collection_name: collection, alias_name: alias } },
        ],
      });
      this.logger.info({ alias, collection }, "Switched alias");
      return;
    } catch (error: unknown) {
      this.logger.warn(
        { alias, collection, err: error },
        "Atomic alias switch rejected, falling back",
      );
    }

    const aliases = await this.listAliases();
    if (!aliases.some((a) => a.aliasName === alias)) {
      await this.createAlias(alias, collection);
      return;
    }

    await this.deleteAlias(alias);
    await withRetry(() => this.createAlias(alias, collection), {
      maxRetries: 3,
      baseDelayMs: this.aliasRetryDelayMs,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn(
          { alias, attempt, delayMs, err: error },
          "Re-creating alias failed, retrying",
        );
      },
    });
    this.logger.info({ alias, collection }, "Switched alias in two steps");
  }

  async listAliases(): Promise<AliasDescription[]> {
    try {
      const response = await this.client.getAliases();
      return response.aliases.map((a) => ({
        aliasName: a.alias_name,
        collectionName: a.collection_name,
      }));
    } catch (error: unknown) {
      throw this.wrap("list aliases", error);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
