import type { LlmProviderType, LlmSettings } from "@profile-rag/types";
import { ConfigurationError } from "@profile-rag/errors";
import type { ILlmProvider } from "./llm-provider.interface.js";
import { OpenAICompatibleLlmProvider, PRESET_BASE_URLS } from "./openai-compatible-provider.js";
import { GeminiLlmProvider } from "./gemini-provider.js";

export const DEFAULT_MODELS: Record<LlmProviderType, string> = {
  groq: "llama3-8b-8192",
  openai: "gpt-4o",
  gemini: "gemini-1.5-flash-latest",
  "lm-studio": "local-model",
};

export function createLlmProvider(config: LlmSettings): ILlmProvider {
  const model = config.model ?? DEFAULT_MODELS[config.provider];

  switch (config.provider) {
    case "groq":
    case "openai":
      if (!config.apiKey) {
        throw new ConfigurationError(`An API key is required when LLM provider is '${config.provider}'`);
      }
      return new OpenAICompatibleLlmProvider({
        name: config.provider,
        model,
        baseUrl: config.baseUrl ?? PRESET_BASE_URLS[config.provider],
        apiKey: config.apiKey,
      });
    case "lm-studio":
      return new OpenAICompatibleLlmProvider({
        name: config.provider,
        model,
        baseUrl: config.baseUrl ?? PRESET_BASE_URLS["lm-studio"],
        apiKey: config.apiKey,
      });
    case "gemini":
      if (!config.apiKey) {
        throw new ConfigurationError("GOOGLE_API_KEY is required when LLM provider is 'gemini'");
      }
      return new GeminiLlmProvider({ apiKey: config.apiKey, model });
    default:
      throw new ConfigurationError(`Unknown LLM provider: ${String(config.provider)}`);
  }
}
