import { z } from "zod";
import { InvalidRequestError, NotConfiguredError, fromHttpStatus } from "@ingestkit/errors";
import type { EmbeddingResult } from "@ingestkit/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "bge-m3";
const DEFAULT_DIMENSIONS = 1024;

export interface HttpProviderConfig {
  baseUrl?: string;
  model?: string;
  dimensions?: number;
  fetch?: typeof fetch;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().optional(),
});

/**
 * Self-hosted embedding server speaking `POST {baseUrl}/embed` with
 * `{ texts, dimensions }` and answering `{ embeddings, tokens_used }`.
 */
export class HttpEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "http";
  readonly model: string;
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpProviderConfig) {
    this.baseUrl = (config.baseUrl ?? "").replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.fetchFn = config.fetch ?? fetch;
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    if (this.baseUrl.length === 0) {
      throw new NotConfiguredError("EMBEDDING_ENDPOINT is not set");
    }

    const response = await this.fetchFn(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, dimensions: this.dimensions, model: this.model }),
    });

    if (!response.ok) {
      throw fromHttpStatus(
        this.name,
        response.status,
        `Embedding server returned ${String(response.status)} ${response.statusText}`.trim(),
        response.headers.get("retry-after"),
      );
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      const issue = parsed.error.issues[0]?.message ?? "invalid";
      throw new InvalidRequestError(`Malformed embedding response: ${issue}`);
    }

    return {
      embeddings: parsed.data.embeddings,
      model: this.model,
      tokensUsed: parsed.data.tokens_used ?? 0,
      dimensions: parsed.data.embeddings[0]?.length ?? this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    if (this.baseUrl.length === 0) return false;
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
