import { SourceNotFoundError, SourceUnreachableError, errorMessage } from "@ingestkit/errors";
import { createSilentLogger, redactUri, type Logger } from "@ingestkit/logger";
import type { Document } from "@ingestkit/types";
import type { ISourceFetcher } from "./source.interface.js";
import { extensionOf } from "./uri.js";

export type FetchFn = typeof fetch;

export interface HttpSourceOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

export function documentIdFromUrl(uri: string): string {
  let path: string;
  try {
    path = new URL(uri).pathname;
  } catch {
    path = uri;
  }
  const last = path.split("/").at(-1) ?? "";
  if (last.length === 0) return "document";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

/**
 * Credentials embedded in the URL are moved into a Basic Authorization
 * header, since fetch refuses URLs that carry them.
 */
export function toRequest(uri: string): { url: string; headers: Record<string, string> } {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    return { url: uri, headers: {} };
  }
  if (parsed.username === "" && parsed.password === "") {
    return { url: uri, headers: {} };
  }

  const user = decodeURIComponent(parsed.username);
  const credentials = `${user}:${decodeURIComponent(parsed.password)}`;
  parsed.username = "";
  parsed.password = "";
  return {
    url: parsed.toString(),
    headers: { authorization: `Basic ${Buffer.from(credentials).toString("base64")}` },
  };
}

/** One GET, one document. */
export class HttpSource implements ISourceFetcher {
  readonly kind = "http";
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: HttpSourceOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetch(uri: string): Promise<Document[]> {
    const safeUri = redactUri(uri);
    this.logger.info({ uri: safeUri }, "Fetching document over HTTP");

    let response: Response;
    try {
      const { url, headers } = toRequest(uri);
      response = await this.fetchFn(url, { headers });
    } catch (error: unknown) {
      const reason = redactUri(errorMessage(error));
      throw new SourceUnreachableError(`GET ${safeUri} failed: ${reason}`, { cause: error });
    }

    if (response.status === 404) {
      throw new SourceNotFoundError(`GET ${safeUri} returned 404`);
    }
    if (!response.ok) {
      throw new SourceUnreachableError(`GET ${safeUri} returned ${response.status}`, {
        statusCode: response.status,
      });
    }

    const text = await response.text();
    const id = documentIdFromUrl(uri);

    return [
      {
        id,
        text,
        metadata: {
          source: safeUri,
          content_type: response.headers.get("content-type") ?? "",
          content_length: response.headers.get("content-length") ?? "",
          extension: extensionOf(id),
        },
      },
    ];
  }
}
