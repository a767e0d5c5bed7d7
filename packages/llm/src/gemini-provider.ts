import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { z } from "zod";
import { ContractViolationError, ProviderError } from "@profile-rag/errors";
import type { GenerateOptions, ILlmProvider, LlmCompletion } from "./llm-provider.interface.js";

const MODELS_URL = "https://generativelanguage.googleapis.com/v1beta/models";

const modelsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        supportedGenerationMethods: z.array(z.string()).default([]),
      }),
    )
    .default([]),
});

export interface GeminiLlmConfig {
  apiKey: string;
  model: string;
}

export class GeminiLlmProvider implements ILlmProvider {
  readonly name = "gemini";
  readonly model: string;
  private apiKey: string;
  private client: GenerativeModel;

  constructor(config: GeminiLlmConfig) {
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.client = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({ model: config.model });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LlmCompletion> {
    let text: string;
    try {
      const result = await this.client.generateContent({
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: options.temperature,
          maxOutputTokens: options.maxTokens,
        },
      });
      text = result.response.text().trim();
    } catch (err) {
      throw ProviderError.wrap(err, this.name, "generation");
    }

    if (text.length === 0) {
      throw new ContractViolationError("gemini returned an empty completion", this.name);
    }
    return { text, model: this.model };
  }

  /** Models that support `generateContent`, without the `models/` prefix. */
  async listModels(): Promise<string[]> {
    let response: Response;
    try {
      response = await fetch(MODELS_URL, { headers: { "x-goog-api-key": this.apiKey } });
    } catch (err) {
      throw ProviderError.wrap(err, this.name, "model listing");
    }

    if (!response.ok) {
      throw new ProviderError(
        `gemini model listing failed: ${String(response.status)}`,
        this.name,
        { upstreamStatus: response.status },
      );
    }

    const parsed = modelsResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ContractViolationError("gemini returned a malformed model list", this.name);
    }

    return parsed.data.models
      .filter((m) => m.supportedGenerationMethods.includes("generateContent"))
      .map((m) => m.name.split("/").pop() ?? m.name)
      .sort();
  }
}
