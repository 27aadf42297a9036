export {
  indexBuildEnvSchema,
  ingestionEnvSchema,
  loadIndexBuildConfig,
  loadIndexParams,
  loadIngestionConfig,
  parseRuntimeEnv,
  parseStatusEnv,
  runtimeEnvSchema,
  statusEnvSchema,
  vectorDbEnvSchema,
  zodIssuesToFields,
} from "./env.js";
export { validateIndexBuildConfig, validateIngestionConfig } from "./validate.js";
export {
  DEFAULT_EMBEDDING_MODELS,
  EMBEDDING_DIMENSIONS,
  resolveEmbeddingDimensions,
} from "./embedding-models.js";
