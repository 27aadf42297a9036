import { CohereClient, CohereError } from "cohere-ai";
import { NotConfiguredError, fromHttpStatus } from "@ingestkit/errors";
import type { EmbeddingResult } from "@ingestkit/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit
// embed-v4 and later return 1536 floats unless asked for 256, 512 or 1024.
const CONFIGURABLE_DIMENSION_MODEL = /^embed-v(?:[4-9]|\d{2,})/;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Injected in tests. */
  client?: CohereClient;
}

/**
 * Rethrow SDK failures as classified errors; anything without a status is left
 * for the retry classifier.
 */
function mapCohereError(error: unknown): unknown {
  if (error instanceof CohereError && error.statusCode !== undefined) {
    const message = `Cohere embed failed: ${error.message}`;
    return fromHttpStatus("cohere", error.statusCode, message, null, error);
  }
  return error;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private client: CohereClient | undefined;

  constructor(config: CohereProviderConfig) {
    this.apiKey = config.apiKey;
    this.client = config.client;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  private getClient(): CohereClient {
    if (this.client) return this.client;
    if (this.apiKey.trim().length === 0) {
      throw new NotConfiguredError("COHERE_API_KEY is not set");
    }
    this.client = new CohereClient({ token: this.apiKey });
    return this.client;
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const client = this.getClient();
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await client.v2
        .embed({
          texts: batch,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
          ...(CONFIGURABLE_DIMENSION_MODEL.test(this.model)
            ? { outputDimension: this.dimensions }
            : {}),
        })
        .catch((error: unknown) => {
          throw mapCohereError(error);
        });

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: allEmbeddings[0]?.length ?? this.dimensions,
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
