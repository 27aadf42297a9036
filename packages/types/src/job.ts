export type JobKind = "EmbeddingJob" | "IndexJob";

export type JobPhase = "Pending" | "Running" | "Building" | "Optimizing" | "Succeeded" | "Failed";

export interface JobProgress {
  total: number;
  processed: number;
  /** Whole percent, 0-100. */
  percentage: number;
}

export interface JobStatus {
  kind: JobKind;
  name: string;
  phase: JobPhase;
  message: string;
  progress: JobProgress;
  /** Only set on IndexJob records. */
  aliasSwapped?: boolean;
  timestamp: string;
}

export interface IngestionJobResult {
  documentSetId: string;
  collection: string;
  documentCount: number;
  totalChunks: number;
  processedChunks: number;
  batchCount: number;
}

export interface IndexBuildJobResult {
  indexId: string;
  collection: string;
  totalVectors: number;
  ready: boolean;
  alias: string | null;
  aliasSwapped: boolean;
}
