import { z } from "zod";
import { ContractViolationError, ProviderError } from "@profile-rag/errors";
import type { GenerateOptions, ILlmProvider, LlmCompletion } from "./llm-provider.interface.js";

export type OpenAICompatiblePreset = "groq" | "openai" | "lm-studio";

/** Roots without the `/v1` suffix. */
export const PRESET_BASE_URLS: Record<OpenAICompatiblePreset, string> = {
  groq: "https://api.groq.com/openai",
  openai: "https://api.openai.com",
  "lm-studio": "http://localhost:1234",
};

export interface OpenAICompatibleConfig {
  name: string;
  model: string;
  baseUrl: string;
  /** Omitted for servers without auth (LM Studio). */
  apiKey?: string;
}

const modelsResponseSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

const chatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

/**
 * Chat completions over the OpenAI wire format. Groq, OpenAI and LM Studio all
 * speak it; they differ only in base URL and auth.
 */
export class OpenAICompatibleLlmProvider implements ILlmProvider {
  readonly name: string;
  readonly model: string;
  private baseUrl: string;
  private apiKey?: string;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name;
    this.model = config.model;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "").replace(/\/v1$/, "");
    this.apiKey = config.apiKey || undefined;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LlmCompletion> {
    const body = await this.request("POST", "/v1/chat/completions", {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    });

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ContractViolationError(
        `${this.name} returned a malformed chat completion: ${parsed.error.message}`,
        this.name,
      );
    }

    const text = parsed.data.choices[0]?.message.content?.trim() ?? "";
    if (text.length === 0) {
      throw new ContractViolationError(`${this.name} returned an empty completion`, this.name);
    }

    return { text, model: parsed.data.model ?? this.model };
  }

  async listModels(): Promise<string[]> {
    const body = await this.request("GET", "/v1/models");

    const parsed = modelsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ContractViolationError(`${this.name} returned a malformed model list`, this.name);
    }
    return parsed.data.data.map((m) => m.id).sort();
  }

  private async request(method: "GET" | "POST", path: string, payload?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (payload !== undefined) headers["Content-Type"] = "application/json";
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
    } catch (err) {
      throw ProviderError.wrap(err, this.name, `${method} ${path}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new ProviderError(
        `${this.name} ${method} ${path} failed: ${String(response.status)} ${detail.slice(0, 200)}`.trim(),
        this.name,
        { upstreamStatus: response.status },
      );
    }

    return response.json();
  }
}
