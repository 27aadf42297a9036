import type { AliasDescription, CollectionInfo, IndexParams, Point } from "@ingestkit/types";

/**
 * A vector index bound to one collection. Alias operations act on the
 * backend as a whole.
 */
export interface IIndexStore {
  readonly collection: string;

  /** Create the collection if absent. Never resets existing data. */
  ensureCollection(dimension: number): Promise<void>;
  /** Insert or overwrite points by id; resolves once the write is durable. */
  upsert(points: Point[]): Promise<void>;
  /** `null` when the collection does not exist. */
  getCollectionInfo(): Promise<CollectionInfo | null>;
  updateIndexParams(params: IndexParams): Promise<void>;
  createAlias(alias: string, collection?: string): Promise<void>;
  /** Point `alias` at `collection`, whether or not it exists yet. */
  switchAlias(alias: string, collection: string): Promise<void>;
  listAliases(): Promise<AliasDescription[]>;
  healthCheck(): Promise<boolean>;
}
