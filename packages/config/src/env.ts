import path from "node:path";
import { z } from "zod";
import { DISTANCE_METRICS } from "@profile-rag/types";
import type { AppConfig, LlmProviderType } from "@profile-rag/types";

export const DEFAULT_SYSTEM_PROMPT = `You are an assistant that answers questions about the professional career, projects and skills of the person described in the documents below.
Answer only from the provided context. If the context does not contain the answer, say that you do not know.

Context:
{context}

Question: {question}

Answer:`;

const booleanString = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const commaList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

/**
 * Environment variables consumed by ingestion runs, the query core and the worker.
 * Validates, transforms, and provides defaults so that the resulting object is a
 * strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Sources ----------
    DATA_DIR: z.string().min(1).default("/app/data"),
    SOURCE_DIRS: commaList
      .default("CV,projects,repos")
      .pipe(z.array(z.string()).min(1, "SOURCE_DIRS must name at least one directory")),

    // ---------- Collection & chunking ----------
    COLLECTION_NAME: z.string().min(1).default("personal_profile"),
    DISTANCE_METRIC: z.enum(DISTANCE_METRICS).default("cosine"),
    CHUNK_STRATEGY: z.enum(["window", "recursive"]).default("window"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
    STRICT_COLLECTION_DIMENSIONS: booleanString.default("false"),
    INGEST_MAX_RETRIES: z
      .string()
      .default("0")
      .transform(Number)
      .pipe(z.number().int().nonnegative().max(10)),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_HOST: z.string().default("localhost"),
    QDRANT_PORT: positiveInt("6333"),
    QDRANT_API_KEY: z.string().optional(),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["gemini", "cohere", "bge-m3"]).default("gemini"),
    EMBED_BATCH_SIZE: positiveInt("100"),
    GOOGLE_API_KEY: z.string().optional(),
    GEMINI_EMBED_MODEL: z.string().default("text-embedding-004"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),

    // ---------- LLM ----------
    LLM_PROVIDER: z.enum(["groq", "openai", "lm-studio", "gemini"]).default("groq"),
    LLM_MODEL: z.string().optional(),
    LLM_BASE_URL: z.string().url().optional(),
    LLM_API_KEY: z.string().optional(),
    GROQ_API_KEY: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    SYSTEM_PROMPT: z
      .string()
      .default(DEFAULT_SYSTEM_PROMPT)
      .refine((val) => val.includes("{context}") && val.includes("{question}"), {
        message: "SYSTEM_PROMPT must contain {context} and {question} placeholders",
      }),
    RETRIEVAL_TOP_K: positiveInt("5"),

    // ---------- Worker ----------
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }

    const missingCredential: Record<typeof env.EMBEDDING_PROVIDER, string | undefined> = {
      gemini: env.GOOGLE_API_KEY ? undefined : "GOOGLE_API_KEY",
      cohere: env.COHERE_API_KEY ? undefined : "COHERE_API_KEY",
      "bge-m3": env.BGE_M3_URL ? undefined : "BGE_M3_URL",
    };
    const missing = missingCredential[env.EMBEDDING_PROVIDER];
    if (missing) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [missing],
        message: `${missing} is required when EMBEDDING_PROVIDER is '${env.EMBEDDING_PROVIDER}'`,
      });
    }
  });

type ParsedEnv = z.infer<typeof envSchema>;

function resolveLlmApiKey(provider: LlmProviderType, env: ParsedEnv): string {
  if (env.LLM_API_KEY) return env.LLM_API_KEY;
  switch (provider) {
    case "groq":
      return env.GROQ_API_KEY ?? "";
    case "openai":
      return env.OPENAI_API_KEY ?? "";
    case "gemini":
      return env.GOOGLE_API_KEY ?? "";
    case "lm-studio":
      return "";
  }
}

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  // Blank assignments in .env files mean "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = envSchema.parse(present);

  const dataDir = path.resolve(parsed.DATA_DIR);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    ingestion: {
      dataDir,
      sourceDirs: parsed.SOURCE_DIRS.map((dir) => path.resolve(dataDir, dir)),
      collectionName: parsed.COLLECTION_NAME,
      distance: parsed.DISTANCE_METRIC,
      chunkStrategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      strictCollectionDimensions: parsed.STRICT_COLLECTION_DIMENSIONS,
      maxRetries: parsed.INGEST_MAX_RETRIES,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL ?? `http://${parsed.QDRANT_HOST}:${String(parsed.QDRANT_PORT)}`,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      batchSize: parsed.EMBED_BATCH_SIZE,
      gemini: { apiKey: parsed.GOOGLE_API_KEY ?? "", model: parsed.GEMINI_EMBED_MODEL },
      cohere: { apiKey: parsed.COHERE_API_KEY ?? "", model: parsed.COHERE_EMBED_MODEL },
      bgeM3: { baseUrl: parsed.BGE_M3_URL ?? "" },
    },

    llm: {
      provider: parsed.LLM_PROVIDER,
      model: parsed.LLM_MODEL,
      baseUrl: parsed.LLM_BASE_URL,
      apiKey: resolveLlmApiKey(parsed.LLM_PROVIDER, parsed),
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      systemPrompt: parsed.SYSTEM_PROMPT,
    },

    redis: {
      url: parsed.REDIS_URL,
    },
  };
}
