import {
  CollectionNotFoundError,
  DimensionMismatchError,
  UpsertFailedError,
} from "@ingestkit/errors";
import type {
  AliasDescription,
  CollectionInfo,
  CollectionStatus,
  IndexParams,
  Point,
} from "@ingestkit/types";
import type { IIndexStore } from "./index-store.interface.js";

interface MemoryCollection {
  dimension: number;
  points: Map<string, Point>;
  status: CollectionStatus;
  indexParams: IndexParams;
  /** Status reads left before a pending optimization settles. */
  pendingPolls: number;
}

export interface MemoryIndexBackendOptions {
  /** Reads of a tuned collection that report "yellow" before it turns "green". Default: 0 */
  optimizationPolls?: number;
}

/**
 * Process-local stand-in for a vector database. Stores created over the same
 * backend see each other's collections and aliases.
 */
export class MemoryIndexBackend {
  readonly collections = new Map<string, MemoryCollection>();
  readonly aliases = new Map<string, string>();
  private readonly optimizationPolls: number;

  constructor(options: MemoryIndexBackendOptions = {}) {
    this.optimizationPolls = options.optimizationPolls ?? 0;
  }

  createCollection(name: string, dimension: number): MemoryCollection {
    const created: MemoryCollection = {
      dimension,
      points: new Map(),
      status: "green",
      indexParams: {},
      pendingPolls: 0,
    };
    this.collections.set(name, created);
    return created;
  }

  startOptimization(name: string, params: IndexParams): void {
    const collection = this.requireCollection(name);
    collection.indexParams = { ...collection.indexParams, ...params };
    collection.pendingPolls = this.optimizationPolls;
    collection.status = this.optimizationPolls > 0 ? "yellow" : "green";
  }

  readStatus(name: string): CollectionStatus {
    const collection = this.requireCollection(name);
    if (collection.pendingPolls > 0) {
      collection.pendingPolls -= 1;
      if (collection.pendingPolls === 0) collection.status = "green";
      return "yellow";
    }
    return collection.status;
  }

  requireCollection(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) throw new CollectionNotFoundError(name);
    return collection;
  }

  reset(): void {
    this.collections.clear();
    this.aliases.clear();
  }
}

/** Shared by every memory store that is not given its own backend. */
export const defaultMemoryBackend = new MemoryIndexBackend();

export class MemoryIndexStore implements IIndexStore {
  readonly collection: string;
  readonly backend: MemoryIndexBackend;

  constructor(collection: string, backend: MemoryIndexBackend = defaultMemoryBackend) {
    this.collection = collection;
    this.backend = backend;
  }

  async ensureCollection(dimension: number): Promise<void> {
    const existing = this.backend.collections.get(this.collection);
    if (!existing) {
      this.backend.createCollection(this.collection, dimension);
      return;
    }
    if (existing.dimension !== dimension) {
      const what = `collection ${this.collection}`;
      throw new DimensionMismatchError(existing.dimension, dimension, what);
    }
  }

  async upsert(points: Point[]): Promise<void> {
    const target = this.backend.collections.get(this.collection);
    if (!target) {
      throw new UpsertFailedError(this.collection, points.length, {
        cause: new CollectionNotFoundError(this.collection),
      });
    }

    // All-or-nothing, like a single backend request
    const bad = points.find((p) => p.vector.length !== target.dimension);
    if (bad) {
      throw new UpsertFailedError(this.collection, points.length, {
        cause: new DimensionMismatchError(target.dimension, bad.vector.length, `point ${bad.id}`),
      });
    }

    for (const point of points) {
      target.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async getCollectionInfo(): Promise<CollectionInfo | null> {
    const target = this.backend.collections.get(this.collection);
    if (!target) return null;

    return {
      name: this.collection,
      vectorCount: target.points.size,
      status: this.backend.readStatus(this.collection),
      dimension: target.dimension,
    };
  }

  async updateIndexParams(params: IndexParams): Promise<void> {
    this.backend.startOptimization(this.collection, params);
  }

  async createAlias(alias: string, collection: string = this.collection): Promise<void> {
    this.backend.requireCollection(collection);
    this.backend.aliases.set(alias, collection);
  }

  async switchAlias(alias: string, collection: string): Promise<void> {
    this.backend.requireCollection(collection);
    this.backend.aliases.set(alias, collection);
  }

  async listAliases(): Promise<AliasDescription[]> {
    return [...this.backend.aliases.entries()]
      .map(([aliasName, collectionName]) => ({ aliasName, collectionName }))
      .sort((a, b) => a.aliasName.localeCompare(b.aliasName));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
