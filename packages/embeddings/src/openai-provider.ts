import OpenAI from "openai";
import { NotConfiguredError, fromHttpStatus } from "@ingestkit/errors";
import type { EmbeddingResult } from "@ingestkit/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;

export interface OpenAIProviderConfig {
  apiKey: string;
  /** OpenAI-compatible endpoint, e.g. a self-hosted gateway. */
  baseUrl?: string;
  model?: string;
  dimensions?: number;
  /** Injected in tests. */
  client?: OpenAI;
}

function mapOpenAIError(error: unknown): unknown {
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    const retryAfter = error.headers?.["retry-after"] ?? null;
    const message = `OpenAI embed failed: ${error.message}`;
    return fromHttpStatus("openai", error.status, message, retryAfter, error);
  }
  return error;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly baseUrl: string | undefined;
  private client: OpenAI | undefined;

  constructor(config: OpenAIProviderConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.client = config.client;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (this.apiKey.trim().length === 0) {
      throw new NotConfiguredError("OPENAI_API_KEY is not set");
    }
    // Retries are ours; the SDK's would multiply them.
    this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseUrl, maxRetries: 0 });
    return this.client;
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const client = this.getClient();

    const response = await client.embeddings
      .create({
        model: this.model,
        input: texts,
        ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimensions } : {}),
      })
      .catch((error: unknown) => {
        throw mapOpenAIError(error);
      });

    const embeddings = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);

    return {
      embeddings,
      model: response.model,
      tokensUsed: response.usage.total_tokens,
      dimensions: embeddings[0]?.length ?? this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.batchEmbed(["health check"]);
      return true;
    } catch {
      return false;
    }
  }
}
