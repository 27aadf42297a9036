export type { ISourceFetcher } from "./source.interface.js";
export { FilesystemSource, resolveLocalPath } from "./filesystem-source.js";
export type { FilesystemSourceOptions } from "./filesystem-source.js";
export {
  ObjectStorageSource,
  S3ObjectStorage,
  parseObjectStorageUri,
} from "./object-storage-source.js";
export type {
  ObjectStorage,
  ObjectStorageSourceOptions,
  StoredObject,
} from "./object-storage-source.js";
export { HttpSource, documentIdFromUrl, toRequest } from "./http-source.js";
export type { FetchFn, HttpSourceOptions } from "./http-source.js";
export { GitSource, SimpleGitCloner, toCloneUrl } from "./git-source.js";
export type { GitCloner, GitSourceOptions } from "./git-source.js";
export { DEFAULT_FIXTURE_SET, FixtureSource } from "./fixture-source.js";
export { SourceRegistry, createDefaultSourceRegistry } from "./registry.js";
export type { DefaultSourceOptions, SourceFactory } from "./registry.js";
export { extensionOf, isSupportedFile, schemeOf, stripScheme } from "./uri.js";
