export type { IIndexStore } from "./index-store.interface.js";
export { QdrantIndexStore } from "./qdrant-adapter.js";
export type { QdrantIndexStoreOptions } from "./qdrant-adapter.js";
export { MemoryIndexBackend, MemoryIndexStore, defaultMemoryBackend } from "./memory-adapter.js";
export type { MemoryIndexBackendOptions } from "./memory-adapter.js";
export { toHnswTuning } from "./index-params.js";
export type { HnswTuning } from "./index-params.js";
export { createIndexStore } from "./factory.js";
export type { IndexStoreFactoryOptions } from "./factory.js";
