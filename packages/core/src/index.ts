export { runIngestion } from "./ingestion-job.js";
export type { IngestionDependencies } from "./ingestion-job.js";

export { runIndexBuild, waitForReady } from "./index-build-job.js";
export type { IndexBuildDependencies } from "./index-build-job.js";

export {
  FileStatusSink,
  percentage,
  StatusReporter,
  WebhookStatusSink,
} from "./status-reporter.js";
export type { IStatusSink, StatusReporterOptions } from "./status-reporter.js";

export { pointId, toBatches, toPoint } from "./point-id.js";
