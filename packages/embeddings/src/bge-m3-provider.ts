import type { EmbeddingResult } from "@profile-rag/types";
import { ContractViolationError, ProviderError } from "@profile-rag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const BATCH_SIZE = 64;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  maxBatchSize?: number;
}

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly maxBatchSize: number;
  private baseUrl: string;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.maxBatchSize = config.maxBatchSize ?? BATCH_SIZE;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts }),
      });
    } catch (err) {
      throw ProviderError.wrap(err, this.name, "embedding");
    }

    if (!response.ok) {
      throw new ProviderError(
        `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
        this.name,
        { upstreamStatus: response.status },
      );
    }

    const data: unknown = await response.json();
    const parsed = parseResponse(data);
    if (!parsed) {
      throw new ContractViolationError("BGE-M3 response is missing the embeddings array", this.name);
    }

    return { embeddings: parsed.embeddings, model: "bge-m3", tokensUsed: parsed.tokensUsed };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}

function parseResponse(
  value: unknown,
): { embeddings: number[][]; tokensUsed: number } | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const embeddings: unknown = Reflect.get(value, "embeddings");
  const tokensUsed: unknown = Reflect.get(value, "tokens_used");
  if (!Array.isArray(embeddings)) return undefined;

  const vectors: number[][] = [];
  for (const vector of embeddings) {
    if (!Array.isArray(vector) || !vector.every((n): n is number => typeof n === "number")) {
      return undefined;
    }
    vectors.push(vector);
  }
  return { embeddings: vectors, tokensUsed: typeof tokensUsed === "number" ? tokensUsed : 0 };
}
