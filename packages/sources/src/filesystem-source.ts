import { readdir, readFile, stat } from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import { basename, join, relative, sep } from "node:path";
import { fileURLToPath } from "node:url";
import { SourceNotFoundError, SourceUnreachableError, errorMessage } from "@ingestkit/errors";
import { createSilentLogger, type Logger } from "@ingestkit/logger";
import type { Document } from "@ingestkit/types";
import type { ISourceFetcher } from "./source.interface.js";
import { extensionOf, isSupportedFile, schemeOf, stripScheme } from "./uri.js";

const SKIPPED_DIRECTORIES = new Set([".git"]);

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Map a filesystem-style URI to a local path.
 * `pvc://<claim>/<path>` is mounted at `/<path>`.
 */
export function resolveLocalPath(uri: string): string {
  switch (schemeOf(uri)) {
    case "file":
      return uri.trim().toLowerCase().startsWith("file://")
        ? fileURLToPath(uri.trim())
        : uri.trim();
    case "pvc":
      return "/" + stripScheme(uri).split("/").slice(1).join("/");
    default: {
      const rest = stripScheme(uri);
      return rest.startsWith("/") ? rest : "/" + rest;
    }
  }
}

async function statRoot(root: string): Promise<Stats> {
  try {
    return await stat(root);
  } catch (error: unknown) {
    if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
      throw new SourceNotFoundError(`Path not found: ${root}`, { cause: error });
    }
    const message = `Cannot access ${root}: ${errorMessage(error)}`;
    throw new SourceUnreachableError(message, { cause: error });
  }
}

export type DirectoryReader = (dir: string) => Promise<Dirent[]>;

async function readDirectoryEntries(dir: string): Promise<Dirent[]> {
  return readdir(dir, { withFileTypes: true });
}

export interface FilesystemSourceOptions {
  logger?: Logger;
  /** Replaces `readdir` (tests). */
  readDirectory?: DirectoryReader;
}

/**
 * Reads supported files from a mounted volume or local directory. Document
 * ids are paths relative to the scan root, so they stay stable across runs.
 */
export class FilesystemSource implements ISourceFetcher {
  readonly kind = "filesystem";
  private readonly logger: Logger;
  private readonly readDirectory: DirectoryReader;

  constructor(options: FilesystemSourceOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.readDirectory = options.readDirectory ?? readDirectoryEntries;
  }

  async fetch(uri: string): Promise<Document[]> {
    const root = resolveLocalPath(uri);
    this.logger.info({ path: root }, "Fetching documents from local path");

    const rootStats = await statRoot(root);
    const documents: Document[] = [];

    if (rootStats.isFile()) {
      if (!isSupportedFile(root)) {
        this.logger.warn({ path: root }, "Skipping file with unsupported extension");
        return documents;
      }
      const doc = await this.readDocument(root, basename(root));
      if (doc) documents.push(doc);
      return documents;
    }

    let entries: Dirent[];
    try {
      entries = await this.readDirectory(root);
    } catch (error: unknown) {
      const message = `Cannot list ${root}: ${errorMessage(error)}`;
      throw new SourceUnreachableError(message, { cause: error });
    }
    const files = await this.collectFiles(root, entries);

    const ordered = files
      .map((file) => ({ file, id: relative(root, file).split(sep).join("/") }))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    for (const { file, id } of ordered) {
      const doc = await this.readDocument(file, id);
      if (doc) documents.push(doc);
    }

    this.logger.info({ path: root, count: documents.length }, "Loaded documents from local path");
    return documents;
  }

  /** Supported files under `dir`; an unreadable subdirectory is logged and skipped. */
  private async collectFiles(dir: string, entries: Dirent[]): Promise<string[]> {
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
        let children: Dirent[];
        try {
          children = await this.readDirectory(fullPath);
        } catch (error: unknown) {
          const err = errorMessage(error);
          this.logger.warn({ path: fullPath, err }, "Skipping unreadable directory");
          continue;
        }
        files.push(...(await this.collectFiles(fullPath, children)));
      } else if (entry.isFile() && isSupportedFile(entry.name)) {
        files.push(fullPath);
      }
    }

    return files;
  }

  private async readDocument(path: string, id: string): Promise<Document | null> {
    try {
      const [text, fileStats] = await Promise.all([readFile(path, "utf-8"), stat(path)]);
      return {
        id,
        text,
        metadata: {
          source: path,
          filename: basename(path),
          extension: extensionOf(path),
          size: fileStats.size,
        },
      };
    } catch (error: unknown) {
      this.logger.warn({ path, err: error }, "Failed to read file");
      return null;
    }
  }
}
