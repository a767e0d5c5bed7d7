import type { EmbeddingProviderType } from "@profile-rag/types";
import { ConfigurationError } from "@profile-rag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { GeminiEmbeddingProvider } from "./gemini-provider.js";
import type { GeminiProviderConfig } from "./gemini-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import type { BgeM3ProviderConfig } from "./bge-m3-provider.js";

/** `EmbeddingSettings` from the parsed environment satisfies this shape. */
export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  gemini?: GeminiProviderConfig;
  cohere?: CohereProviderConfig;
  bgeM3?: BgeM3ProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "gemini":
      if (!config.gemini?.apiKey) {
        throw new ConfigurationError("Gemini config is required when provider is 'gemini'");
      }
      return new GeminiEmbeddingProvider(config.gemini);
    case "cohere":
      if (!config.cohere?.apiKey) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "bge-m3":
      if (!config.bgeM3?.baseUrl) {
        throw new ConfigurationError("BGE-M3 config is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider(config.bgeM3);
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
