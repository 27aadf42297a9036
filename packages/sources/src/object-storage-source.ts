import { GetObjectCommand, paginateListObjectsV2, S3Client } from "@aws-sdk/client-s3";
import { ConfigurationError, SourceUnreachableError, errorMessage } from "@ingestkit/errors";
import { createSilentLogger, type Logger } from "@ingestkit/logger";
import type { Document } from "@ingestkit/types";
import type { ISourceFetcher } from "./source.interface.js";
import { extensionOf, isSupportedFile, stripScheme } from "./uri.js";

export interface StoredObject {
  key: string;
  size: number;
  lastModified?: Date;
}

/** The slice of an object store the ingestion source needs. */
export interface ObjectStorage {
  listObjects(bucket: string, prefix: string): Promise<StoredObject[]>;
  readObject(bucket: string, key: string): Promise<string>;
}

/**
 * S3 (or S3-compatible, via S3_ENDPOINT_URL) storage. Credentials and region
 * come from the AWS SDK default provider chain.
 */
export class S3ObjectStorage implements ObjectStorage {
  private readonly client: S3Client;

  constructor(client?: S3Client) {
    const endpoint = process.env["S3_ENDPOINT_URL"];
    this.client =
      client ??
      new S3Client({
        region: process.env["AWS_REGION"] ?? "us-east-1",
        ...(endpoint ? { endpoint, forcePathStyle: true } : {}),
      });
  }

  async listObjects(bucket: string, prefix: string): Promise<StoredObject[]> {
    const objects: StoredObject[] = [];
    const pages = paginateListObjectsV2(
      { client: this.client },
      { Bucket: bucket, Prefix: prefix },
    );

    for await (const page of pages) {
      for (const item of page.Contents ?? []) {
        if (item.Key === undefined) continue;
        objects.push({ key: item.Key, size: item.Size ?? 0, lastModified: item.LastModified });
      }
    }

    return objects;
  }

  async readObject(bucket: string, key: string): Promise<string> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`Object s3://${bucket}/${key} has no body`);
    }
    return response.Body.transformToString("utf-8");
  }
}

export function parseObjectStorageUri(uri: string): { bucket: string; prefix: string } {
  const rest = stripScheme(uri);
  const slash = rest.indexOf("/");
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const prefix = slash === -1 ? "" : rest.slice(slash + 1);

  if (bucket.length === 0) {
    throw new ConfigurationError(`Invalid S3 URI: ${uri}`, { sourceUri: "bucket is required" });
  }
  return { bucket, prefix };
}

export interface ObjectStorageSourceOptions {
  storage?: ObjectStorage;
  logger?: Logger;
}

export class ObjectStorageSource implements ISourceFetcher {
  readonly kind = "object-storage";
  private readonly storage: ObjectStorage;
  private readonly logger: Logger;

  constructor(options: ObjectStorageSourceOptions = {}) {
    this.storage = options.storage ?? new S3ObjectStorage();
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetch(uri: string): Promise<Document[]> {
    const { bucket, prefix } = parseObjectStorageUri(uri);
    this.logger.info({ bucket, prefix }, "Fetching documents from object storage");

    let objects: StoredObject[];
    try {
      objects = await this.storage.listObjects(bucket, prefix);
    } catch (error: unknown) {
      const message = `Cannot list s3://${bucket}/${prefix}: ${errorMessage(error)}`;
      throw new SourceUnreachableError(message, { cause: error });
    }

    const documents: Document[] = [];
    const supported = objects
      .filter((obj) => isSupportedFile(obj.key))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

    for (const obj of supported) {
      try {
        const text = await this.storage.readObject(bucket, obj.key);
        documents.push({
          id: obj.key,
          text,
          metadata: {
            source: `s3://${bucket}/${obj.key}`,
            bucket,
            key: obj.key,
            size: obj.size,
            last_modified: obj.lastModified?.toISOString() ?? "",
            extension: extensionOf(obj.key),
          },
        });
      } catch (error: unknown) {
        this.logger.warn({ bucket, key: obj.key, err: error }, "Failed to fetch object");
      }
    }

    this.logger.info({ bucket, count: documents.length }, "Loaded documents from object storage");
    return documents;
  }
}
