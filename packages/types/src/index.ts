export type {
  Document,
  DocumentFormat,
  DocumentMetadata,
  MetadataValue,
  SupportedExtension,
} from "./document.js";
export { SUPPORTED_EXTENSIONS } from "./document.js";

export type { Chunk, ChunkingOptions, EmbeddedChunk, ProcessDocumentsOptions } from "./chunk.js";

export type {
  AliasDescription,
  CollectionInfo,
  CollectionStatus,
  EmbeddingResult,
  IndexParams,
  Point,
  PointPayload,
} from "./pipeline.js";

export type {
  IndexBuildJobResult,
  IngestionJobResult,
  JobKind,
  JobPhase,
  JobProgress,
  JobStatus,
} from "./job.js";

export type {
  EmbeddingConfig,
  EmbeddingProviderType,
  IndexBuildJobConfig,
  IngestionJobConfig,
  LogLevel,
  RuntimeConfig,
  StatusConfig,
  VectorDbConfig,
  VectorStoreType,
} from "./config.js";
