import type { EmbeddingConfig } from "@ingestkit/types";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { HttpEmbeddingProvider } from "./http-provider.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";

export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider({
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiApiBase,
        model: config.model,
        dimensions: config.dimensions,
      });
    case "cohere":
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.model,
        dimensions: config.dimensions,
      });
    case "http":
      return new HttpEmbeddingProvider({
        baseUrl: config.endpoint,
        model: config.model,
        dimensions: config.dimensions,
      });
  }
}
