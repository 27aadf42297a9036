import {
  DimensionMismatchError,
  EmbeddingServiceError,
  errorMessage,
  retryWithBackoff,
  type RetryFailure,
  type RetryOptions,
} from "@ingestkit/errors";
import { createSilentLogger, type Logger } from "@ingestkit/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbeddingClientOptions {
  provider: IEmbeddingProvider;
  /** Expected vector length. Default: the provider's dimensions */
  dimensions?: number;
  /** Default: 3 */
  maxRetries?: number;
  /** Delay before the first retry; doubles per attempt. Default: 30000 */
  retryBackoffMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  signal?: AbortSignal;
  /** Replaces the timer-based sleep (tests). */
  sleep?: RetryOptions["sleep"];
  logger?: Logger;
}

/** Newlines become spaces; surrounding whitespace goes. */
export function prepareText(text: string): string {
  return text.replace(/\r?\n/g, " ").trim();
}

function toServiceError(failure: RetryFailure): EmbeddingServiceError {
  const what =
    failure.reason === "aborted"
      ? "Embedding aborted"
      : failure.reason === "exhausted"
        ? `Embedding failed after ${String(failure.attempts)} attempts`
        : "Embedding failed";

  const message = `${what}: ${errorMessage(failure.lastError)}`;
  return new EmbeddingServiceError(message, failure.attempts, {
    cause: failure.lastError,
    details: { kind: failure.kind, reason: failure.reason },
  });
}

/**
 * Length-preserving embedding front end: retries the provider with
 * exponential backoff, answers empty texts with zero vectors, and checks
 * every vector against the index dimension.
 */
export class EmbeddingClient {
  private readonly provider: IEmbeddingProvider;
  private readonly options: EmbeddingClientOptions;
  private readonly logger: Logger;
  readonly dimensions: number;

  constructor(options: EmbeddingClientOptions) {
    this.provider = options.provider;
    this.options = options;
    this.dimensions = options.dimensions ?? options.provider.dimensions;
    this.logger = options.logger ?? createSilentLogger();
  }

  get providerName(): string {
    return this.provider.name;
  }

  get model(): string {
    return this.provider.model;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const prepared = texts.map(prepareText);
    const sendIndexes: number[] = [];
    const toSend: string[] = [];

    prepared.forEach((text, i) => {
      if (text.length > 0) {
        sendIndexes.push(i);
        toSend.push(text);
      }
    });

    if (toSend.length < prepared.length) {
      this.logger.debug({ empty: prepared.length - toSend.length }, "Empty texts get zero vectors");
    }

    const vectors = toSend.length > 0 ? await this.embedWithRetry(toSend) : [];

    if (vectors.length !== toSend.length) {
      throw new DimensionMismatchError(toSend.length, vectors.length, "vector count");
    }
    for (const vector of vectors) {
      if (vector.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, vector.length, "embedding");
      }
    }

    const width = vectors[0]?.length ?? this.dimensions;
    const result = prepared.map(() => new Array<number>(width).fill(0));
    sendIndexes.forEach((target, i) => {
      const vector = vectors[i];
      if (vector) result[target] = vector;
    });
    return result;
  }

  private async embedWithRetry(texts: string[]): Promise<number[][]> {
    const maxRetries = this.options.maxRetries ?? 3;
    const outcome = await retryWithBackoff(() => this.provider.batchEmbed(texts), {
      maxRetries,
      baseDelayMs: this.options.retryBackoffMs ?? 30_000,
      maxDelayMs: this.options.maxDelayMs,
      jitter: this.options.jitter,
      signal: this.options.signal,
      sleep: this.options.sleep,
      onRetry: ({ attempt, delayMs, kind, error }) => {
        this.logger.warn(
          { provider: this.provider.name, attempt, maxRetries, delayMs, kind, err: error },
          "Embedding request failed, retrying",
        );
      },
    });

    if (!outcome.ok) {
      this.logger.error(
        {
          provider: this.provider.name,
          attempts: outcome.error.attempts,
          kind: outcome.error.kind,
          reason: outcome.error.reason,
        },
        "Embedding request gave up",
      );
      throw toServiceError(outcome.error);
    }

    return outcome.value.embeddings;
  }

  async healthCheck(): Promise<boolean> {
    return this.provider.healthCheck();
  }
}
