import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { simpleGit } from "simple-git";
import { SourceUnreachableError, errorMessage } from "@ingestkit/errors";
import { createSilentLogger, redactUri, type Logger } from "@ingestkit/logger";
import type { Document } from "@ingestkit/types";
import { FilesystemSource } from "./filesystem-source.js";
import type { ISourceFetcher } from "./source.interface.js";

export interface GitCloner {
  clone(repository: string, directory: string): Promise<void>;
}

/** Shallow clone through the local git binary. */
export class SimpleGitCloner implements GitCloner {
  async clone(repository: string, directory: string): Promise<void> {
    await simpleGit().clone(repository, directory, ["--depth", "1"]);
  }
}

/** `git+https://host/repo` clones `https://host/repo`; plain `git://` is passed through. */
export function toCloneUrl(uri: string): string {
  return uri.trim().replace(/^git\+(?=[a-z][a-z0-9+.-]*:\/\/)/i, "");
}

export interface GitSourceOptions {
  cloner?: GitCloner;
  logger?: Logger;
}

export class GitSource implements ISourceFetcher {
  readonly kind = "git";
  private readonly cloner: GitCloner;
  private readonly logger: Logger;

  constructor(options: GitSourceOptions = {}) {
    this.cloner = options.cloner ?? new SimpleGitCloner();
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetch(uri: string): Promise<Document[]> {
    const repository = toCloneUrl(uri);
    const safeRepository = redactUri(repository);
    const workDir = await mkdtemp(join(tmpdir(), "ingestkit-git-"));

    try {
      this.logger.info({ repository: safeRepository }, "Cloning git repository");
      try {
        await this.cloner.clone(repository, workDir);
      } catch (error: unknown) {
        // git echoes the remote URL, credentials included, so the raw error is not kept as cause
        const reason = redactUri(errorMessage(error));
        throw new SourceUnreachableError(`Clone of ${safeRepository} failed: ${reason}`);
      }

      const documents = await new FilesystemSource({ logger: this.logger }).fetch(workDir);
      return documents.map((doc) => ({
        ...doc,
        metadata: { ...doc.metadata, git_repo: safeRepository },
      }));
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
