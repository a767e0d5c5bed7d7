export type { GenerateOptions, ILlmProvider, LlmCompletion } from "./llm-provider.interface.js";
export { OpenAICompatibleLlmProvider, PRESET_BASE_URLS } from "./openai-compatible-provider.js";
export type { OpenAICompatibleConfig, OpenAICompatiblePreset } from "./openai-compatible-provider.js";
export { GeminiLlmProvider } from "./gemini-provider.js";
export type { GeminiLlmConfig } from "./gemini-provider.js";
export { createLlmProvider, DEFAULT_MODELS } from "./factory.js";
