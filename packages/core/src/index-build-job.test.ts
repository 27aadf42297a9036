import { describe, it, expect, beforeEach } from "vitest";
import {
  AliasNotFoundError,
  CollectionNotFoundError,
  ConfigurationError,
  IndexStoreError,
} from "@ingestkit/errors";
import type { CollectionInfo, IndexBuildJobConfig, JobStatus, Point } from "@ingestkit/types";
import { MemoryIndexBackend, MemoryIndexStore } from "@ingestkit/vector-store";
import { runIndexBuild } from "./index-build-job.js";
import { StatusReporter, type IStatusSink } from "./status-reporter.js";

class RecordingSink implements IStatusSink {
  readonly name = "recording";
  readonly records: JobStatus[] = [];

  async write(status: JobStatus): Promise<void> {
    this.records.push(status);
  }
}

class NoTuningStore extends MemoryIndexStore {
  override async updateIndexParams(): Promise<void> {
    throw new Error("tuning not supported");
  }
}

class FlakyStatusStore extends MemoryIndexStore {
  reads = 0;

  override async getCollectionInfo(): Promise<CollectionInfo | null> {
    this.reads += 1;
    if (this.reads === 2) throw new Error("status endpoint timed out");
    return super.getCollectionInfo();
  }
}

class AliasFailureStore extends MemoryIndexStore {
  constructor(
    collection: string,
    backend: MemoryIndexBackend,
    private readonly failure: Error,
  ) {
    super(collection, backend);
  }

  override async switchAlias(): Promise<void> {
    throw this.failure;
  }
}

function point(id: string): Point {
  return {
    id,
    vector: [0.1, 0.2, 0.3, 0.4],
    payload: { text: id, metadata: {}, doc_id: id, chunk_index: 0 },
  };
}

function makeConfig(overrides: Partial<IndexBuildJobConfig> = {}): IndexBuildJobConfig {
  return {
    indexId: "handbook-index",
    documentSetId: "handbook",
    vectorDb: { type: "memory", endpoint: "", collection: "handbook_v2" },
    targetAlias: "handbook",
    indexType: "HNSW",
    indexParams: { m: 16, ef_construct: 200 },
    pollIntervalMs: 100,
    maxWaitMs: 1000,
    status: { filePath: "/tmp/ingestkit-test-status.json" },
    ...overrides,
  };
}

describe("runIndexBuild", () => {
  let sink: RecordingSink;
  let reporter: StatusReporter;
  let sleeps: number[];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  const run = (indexStore: MemoryIndexStore, config = makeConfig()) =>
    runIndexBuild("handbook-index", config, { indexStore, reporter, sleep });

  async function seeded(
    backend: MemoryIndexBackend,
    store: MemoryIndexStore = new MemoryIndexStore("handbook_v2", backend),
  ) {
    await store.ensureCollection(4);
    await store.upsert([point("a"), point("b"), point("c")]);
    return store;
  }

  beforeEach(() => {
    sink = new RecordingSink();
    reporter = new StatusReporter({ sinks: [sink] });
    sleeps = [];
  });

  it("tunes, waits for green and swaps the alias", async () => {
    const backend = new MemoryIndexBackend({ optimizationPolls: 2 });
    const store = await seeded(backend);

    const result = await run(store);

    expect(result).toEqual({
      indexId: "handbook-index",
      collection: "handbook_v2",
      totalVectors: 3,
      ready: true,
      alias: "handbook",
      aliasSwapped: true,
    });
    expect(sleeps).toEqual([100, 100]);
    expect(backend.collections.get("handbook_v2")?.indexParams).toEqual({
      m: 16,
      ef_construct: 200,
    });
    expect(await store.listAliases()).toEqual([
      { aliasName: "handbook", collectionName: "handbook_v2" },
    ]);
    expect(sink.records.map((r) => [r.phase, r.message, r.aliasSwapped])).toEqual([
      ["Building", "Starting index build", false],
      ["Building", "Found 3 vectors, optimizing index", false],
      ["Optimizing", "Index built, performing alias swap", false],
      ["Succeeded", "Index built successfully with 3 vectors", true],
    ]);
    expect(sink.records.at(-1)?.progress).toEqual({ total: 3, processed: 3, percentage: 100 });
  });

  it("moves an alias off the previous collection", async () => {
    const backend = new MemoryIndexBackend();
    backend.createCollection("handbook_v1", 4);
    backend.aliases.set("handbook", "handbook_v1");
    const store = await seeded(backend);

    await run(store);

    expect(backend.aliases.get("handbook")).toBe("handbook_v2");
    expect(backend.collections.has("handbook_v1")).toBe(true);
  });

  it("fails without alias changes when the collection is missing", async () => {
    const backend = new MemoryIndexBackend();
    backend.createCollection("handbook_v1", 4);
    backend.aliases.set("handbook", "handbook_v1");
    const store = new MemoryIndexStore("handbook_v2", backend);

    await expect(run(store)).rejects.toBeInstanceOf(CollectionNotFoundError);

    expect(sink.records.map((r) => r.phase)).toEqual(["Building", "Failed"]);
    expect(sink.records.at(-1)).toMatchObject({
      message: "Error: Collection handbook_v2 not found",
      aliasSwapped: false,
      progress: { total: 0, processed: 0, percentage: 0 },
    });
    expect(backend.aliases.get("handbook")).toBe("handbook_v1");
  });

  it("fails invalid configuration before reading the store", async () => {
    const store = new FlakyStatusStore("handbook_v2", new MemoryIndexBackend());

    const config = makeConfig({ vectorDb: { type: "memory", endpoint: "", collection: "" } });

    await expect(run(store, config)).rejects.toBeInstanceOf(ConfigurationError);

    expect(store.reads).toBe(0);
    expect(sink.records.map((r) => [r.phase, r.message])).toEqual([
      ["Failed", "Error: Invalid index build configuration: collection is required"],
    ]);
  });

  it("continues after the readiness timeout", async () => {
    const backend = new MemoryIndexBackend({ optimizationPolls: 10 });
    const store = await seeded(backend);

    const result = await run(store, makeConfig({ maxWaitMs: 250 }));

    expect(sleeps).toEqual([100, 100, 100]);
    expect(result.ready).toBe(false);
    expect(result.aliasSwapped).toBe(true);
    expect(sink.records.at(-1)?.phase).toBe("Succeeded");
  });

  it("treats a failed parameter update as non-fatal", async () => {
    const backend = new MemoryIndexBackend({ optimizationPolls: 3 });
    const store = await seeded(backend, new NoTuningStore("handbook_v2", backend));

    const result = await run(store);

    expect(result.ready).toBe(true);
    expect(sleeps).toEqual([]);
    expect(backend.collections.get("handbook_v2")?.indexParams).toEqual({});
  });

  it("counts a failed status read as not ready", async () => {
    const backend = new MemoryIndexBackend();
    const store = new FlakyStatusStore("handbook_v2", backend);
    await seeded(backend, store);

    const result = await run(store);

    expect(store.reads).toBe(3);
    expect(sleeps).toEqual([100]);
    expect(result.ready).toBe(true);
  });

  it("creates the alias when switching reports it missing", async () => {
    const backend = new MemoryIndexBackend();
    const store = await seeded(
      backend,
      new AliasFailureStore("handbook_v2", backend, new AliasNotFoundError("handbook")),
    );

    const result = await run(store);

    expect(result.aliasSwapped).toBe(true);
    expect(backend.aliases.get("handbook")).toBe("handbook_v2");
  });

  it("fails on any other alias error", async () => {
    const backend = new MemoryIndexBackend();
    const store = await seeded(
      backend,
      new AliasFailureStore(
        "handbook_v2",
        backend,
        new IndexStoreError("alias update rejected", { statusCode: 500 }),
      ),
    );

    await expect(run(store)).rejects.toThrow("alias update rejected");

    expect(sink.records.map((r) => r.phase)).toEqual([
      "Building",
      "Building",
      "Optimizing",
      "Failed",
    ]);
    expect(backend.aliases.size).toBe(0);
  });

  it("leaves aliases alone without a target alias", async () => {
    const backend = new MemoryIndexBackend();
    const store = await seeded(backend);

    const result = await run(store, makeConfig({ targetAlias: "" }));

    expect(result).toMatchObject({ alias: null, aliasSwapped: false, totalVectors: 3 });
    expect(backend.aliases.size).toBe(0);
  });

  it("fails when aborted while waiting for readiness", async () => {
    const backend = new MemoryIndexBackend({ optimizationPolls: 5 });
    const store = await seeded(backend);
    const controller = new AbortController();

    await expect(
      runIndexBuild("handbook-index", makeConfig(), {
        indexStore: store,
        reporter,
        signal: controller.signal,
        sleep: async (_ms, signal) => {
          controller.abort();
          signal?.throwIfAborted();
        },
      }),
    ).rejects.toMatchObject({ name: "AbortError" });

    expect(sink.records.at(-1)?.phase).toBe("Failed");
    expect(backend.aliases.size).toBe(0);
  });
});
