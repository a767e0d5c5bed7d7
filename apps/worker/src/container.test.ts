import path from "node:path";
import { describe, it, expect } from "vitest";
import { ConfigurationError, PipelineStageError, ProviderError } from "@profile-rag/errors";
import { createCapturingLogger } from "@profile-rag/logger/testing";
import {
  createContainer,
  ingestionInput,
  loadConfig,
  retryPolicy,
  serializeOutcome,
} from "./container.js";
import { FakeLlmProvider, testEnv } from "./testing.js";

const DATA_DIR = path.resolve("/srv/profile");

describe("loadConfig", () => {
  it("turns schema failures into a ConfigurationError", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow(
      "Invalid configuration: GOOGLE_API_KEY: GOOGLE_API_KEY is required when EMBEDDING_PROVIDER is 'gemini'",
    );
  });

  it("returns the parsed config", () => {
    const config = loadConfig(testEnv(DATA_DIR));
    expect(config.vectorStore.type).toBe("memory");
    expect(config.ingestion.sourceDirs).toEqual([path.join(DATA_DIR, "CV")]);
  });
});

describe("ingestionInput", () => {
  it("uses the configured directories and chunking", () => {
    const config = loadConfig(testEnv(DATA_DIR, { SOURCE_DIRS: "CV,projects" }));

    expect(ingestionInput(config)).toEqual({
      sourceDirs: [path.join(DATA_DIR, "CV"), path.join(DATA_DIR, "projects")],
      collectionName: "personal_profile",
      distance: "cosine",
      chunkStrategy: "window",
      chunking: { windowSize: 1000, overlap: 200 },
    });
  });

  it("resolves override directories against DATA_DIR", () => {
    const config = loadConfig(testEnv(DATA_DIR));
    const absolute = path.resolve("/elsewhere/notes");

    const input = ingestionInput(config, { sourceDirs: ["repos", absolute], collectionName: "scratch" });

    expect(input.sourceDirs).toEqual([path.join(DATA_DIR, "repos"), absolute]);
    expect(input.collectionName).toBe("scratch");
  });

  it("ignores an empty override list", () => {
    const config = loadConfig(testEnv(DATA_DIR));
    expect(ingestionInput(config, { sourceDirs: [] }).sourceDirs).toEqual([path.join(DATA_DIR, "CV")]);
  });
});

describe("retryPolicy", () => {
  it("is off by default", () => {
    expect(retryPolicy(loadConfig(testEnv(DATA_DIR)))).toBeUndefined();
  });

  it("follows INGEST_MAX_RETRIES", () => {
    const config = loadConfig(testEnv(DATA_DIR, { INGEST_MAX_RETRIES: "3" }));
    expect(retryPolicy(config)).toEqual({ maxRetries: 3 });
  });
});

describe("createContainer", () => {
  it("creates the LLM provider lazily", () => {
    const { logger } = createCapturingLogger();
    const llm = new FakeLlmProvider("ok");
    const container = createContainer(loadConfig(testEnv(DATA_DIR)), logger, { llm });

    expect(container.embeddingProvider.name).toBe("bge-m3");
    expect(container.llm()).toBe(llm);
  });
});

describe("serializeOutcome", () => {
  it("passes successful outcomes through", () => {
    expect(
      serializeOutcome({ status: "empty", reason: "no-documents", documentCount: 0, durationMs: 4 }),
    ).toEqual({ status: "empty", reason: "no-documents", documentCount: 0, durationMs: 4 });
  });

  it("replaces the error with its JSON form", () => {
    const error = new PipelineStageError("embedding", new ProviderError("quota exceeded", "gemini"));

    expect(serializeOutcome({ status: "failed", stage: "embedding", error, durationMs: 12 })).toEqual({
      status: "failed",
      stage: "embedding",
      durationMs: 12,
      error: {
        name: "PipelineStageError",
        code: "PIPELINE_STAGE_FAILED",
        message: "embedding stage failed: quota exceeded",
        statusCode: 500,
        details: { stage: "embedding", causeCode: "PROVIDER_ERROR" },
      },
    });
  });
});
