import { describe, it, expect, vi } from "vitest";
import { createIndexStore } from "./factory.js";
import { MemoryIndexBackend, MemoryIndexStore } from "./memory-adapter.js";
import { QdrantIndexStore } from "./qdrant-adapter.js";

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: class {},
}));

describe("createIndexStore", () => {
  it("binds the store to the configured collection", () => {
    const qdrant = createIndexStore({
      type: "qdrant",
      endpoint: "http://localhost:6333",
      collection: "docs-v1",
    });
    expect(qdrant).toBeInstanceOf(QdrantIndexStore);
    expect(qdrant.collection).toBe("docs-v1");

    const backend = new MemoryIndexBackend();
    const memory = createIndexStore(
      { type: "memory", endpoint: "http://localhost:6333", collection: "docs-v2" },
      { memoryBackend: backend },
    );
    expect(memory).toBeInstanceOf(MemoryIndexStore);
    expect(memory.collection).toBe("docs-v2");
  });
});
