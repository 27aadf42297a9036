import { SourceNotFoundError, UnsupportedSourceKindError } from "@ingestkit/errors";
import { createSilentLogger, redactUri, type Logger } from "@ingestkit/logger";
import type { Document } from "@ingestkit/types";
import { FilesystemSource } from "./filesystem-source.js";
import { FixtureSource } from "./fixture-source.js";
import { GitSource, type GitCloner } from "./git-source.js";
import { HttpSource, type FetchFn } from "./http-source.js";
import { ObjectStorageSource, type ObjectStorage } from "./object-storage-source.js";
import type { ISourceFetcher } from "./source.interface.js";
import { schemeOf } from "./uri.js";

export type SourceFactory = () => ISourceFetcher;

/**
 * Maps URI schemes to fetchers. Fetchers are built on demand, so a job only
 * pays for the client it actually uses.
 */
export class SourceRegistry {
  private readonly factories = new Map<string, SourceFactory>();

  register(scheme: string, factory: SourceFactory): this {
    this.factories.set(scheme.toLowerCase(), factory);
    return this;
  }

  supportedSchemes(): string[] {
    return [...this.factories.keys()].sort();
  }

  /** `sourceType`, when given, wins over the URI's own scheme. */
  resolve(uri: string, sourceType?: string): ISourceFetcher {
    const scheme = (sourceType?.trim() || schemeOf(uri)).toLowerCase();
    const factory = this.factories.get(scheme);
    if (!factory) {
      throw new UnsupportedSourceKindError(scheme, this.supportedSchemes());
    }
    return factory();
  }

  async fetchDocuments(uri: string, sourceType?: string): Promise<Document[]> {
    const documents = await this.resolve(uri, sourceType).fetch(uri);
    if (documents.length === 0) {
      throw new SourceNotFoundError(`No documents found at ${redactUri(uri)}`);
    }
    return documents;
  }
}

export interface DefaultSourceOptions {
  logger?: Logger;
  objectStorage?: ObjectStorage;
  gitCloner?: GitCloner;
  fetch?: FetchFn;
  fixtures?: Record<string, readonly Document[]>;
}

export function createDefaultSourceRegistry(options: DefaultSourceOptions = {}): SourceRegistry {
  const logger = options.logger ?? createSilentLogger();
  const filesystem: SourceFactory = () => new FilesystemSource({ logger });
  const http: SourceFactory = () => new HttpSource({ fetch: options.fetch, logger });
  const git: SourceFactory = () => new GitSource({ cloner: options.gitCloner, logger });
  const fixture: SourceFactory = () => new FixtureSource(options.fixtures);

  return new SourceRegistry()
    .register("file", filesystem)
    .register("pvc", filesystem)
    .register("local", filesystem)
    .register("s3", () => new ObjectStorageSource({ storage: options.objectStorage, logger }))
    .register("http", http)
    .register("https", http)
    .register("git", git)
    .register("git+https", git)
    .register("git+ssh", git)
    .register("fixture", fixture)
    .register("mock", fixture);
}
