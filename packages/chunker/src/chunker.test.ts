import { describe, it, expect } from "vitest";
import type { ChunkingConfig, RawDocument } from "@profile-rag/types";
import { ValidationError } from "@profile-rag/errors";
import { WindowChunker } from "./window-chunker.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { chunkDocuments } from "./chunk-documents.js";
import { createChunker } from "./factory.js";

const config: ChunkingConfig = { windowSize: 1000, overlap: 200 };

function doc(text: string, source = "/data/CV/cv.txt"): RawDocument {
  return { text, originPath: source, metadata: { source, extension: ".txt", sourceDir: "/data/CV" } };
}

function hasLoneSurrogate(text: string): boolean {
  return /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(text);
}

describe("WindowChunker", () => {
  const chunker = new WindowChunker();

  it("has strategy 'window'", () => {
    expect(chunker.strategy).toBe("window");
  });

  it("slides by windowSize - overlap and keeps the short final window", () => {
    const text = "a".repeat(2500);
    const results = chunker.chunk(text, config);

    expect(results.map((r) => r.startChar)).toEqual([0, 800, 1600]);
    expect(results.map((r) => r.content.length)).toEqual([1000, 1000, 900]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(results[2]?.endChar).toBe(2500);
  });

  it("overlaps consecutive windows by exactly the overlap", () => {
    const text = Array.from({ length: 2600 }, (_, i) => String.fromCharCode(97 + (i % 26))).join("");
    const results = chunker.chunk(text, config);

    for (let i = 1; i < results.length; i++) {
      const prev = results[i - 1]?.content ?? "";
      const next = results[i]?.content ?? "";
      expect(next.slice(0, 200)).toBe(prev.slice(-200));
    }
  });

  it("yields a single window for text shorter than the window", () => {
    expect(chunker.chunk("hello", config)).toEqual([
      { content: "hello", index: 0, startChar: 0, endChar: 5 },
    ]);
  });

  it("stops once a window reaches the end exactly", () => {
    expect(chunker.chunk("b".repeat(1000), config)).toHaveLength(1);

    const results = chunker.chunk("b".repeat(1001), config);
    expect(results.map((r) => [r.startChar, r.endChar])).toEqual([
      [0, 1000],
      [800, 1001],
    ]);
  });

  it("handles empty content", () => {
    expect(chunker.chunk("", config)).toEqual([]);
  });

  it("moves an end boundary back rather than split an emoji", () => {
    const text = "a".repeat(999) + "😀" + "b".repeat(500);
    const results = chunker.chunk(text, config);

    expect(results.map((r) => [r.startChar, r.endChar])).toEqual([
      [0, 999],
      [800, 1501],
    ]);
    expect(results[0]?.content).toBe("a".repeat(999));
    expect(results[1]?.content.slice(199, 201)).toBe("😀");
    expect(results.some((r) => hasLoneSurrogate(r.content))).toBe(false);
  });

  it("starts the next window on the first half of a pair", () => {
    const text = "a".repeat(799) + "😀" + "b".repeat(900);
    const results = chunker.chunk(text, config);

    expect(results.map((r) => [r.startChar, r.endChar])).toEqual([
      [0, 1000],
      [799, 1701],
    ]);
    expect(results[1]?.content.startsWith("😀")).toBe(true);
  });

  it("keeps a pair whole in one-unit windows", () => {
    const results = chunker.chunk("x😀y", { windowSize: 1, overlap: 0 });

    expect(results.map((r) => r.content)).toEqual(["x", "😀", "y"]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
  });

  it("rejects overlap >= windowSize", () => {
    expect(() => chunker.chunk("text", { windowSize: 100, overlap: 100 })).toThrow(ValidationError);
  });

  it("rejects a non-positive window", () => {
    expect(() => chunker.chunk("text", { windowSize: 0, overlap: 0 })).toThrow(ValidationError);
  });

  it("reports the offending fields", () => {
    try {
      chunker.chunk("text", { windowSize: 10, overlap: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ fields: { overlap: "must be a non-negative integer" } });
    }
  });
});

describe("RecursiveChunker", () => {
  const chunker = new RecursiveChunker();

  it("has strategy 'recursive'", () => {
    expect(chunker.strategy).toBe("recursive");
  });

  it("keeps short text as one chunk", () => {
    const text = "First para.\n\nSecond para.";
    expect(chunker.chunk(text, { windowSize: 100, overlap: 10 })).toEqual([
      { content: text, index: 0, startChar: 0, endChar: text.length },
    ]);
  });

  it("merges words up to the window with trailing overlap", () => {
    const results = chunker.chunk("aaaa bbbb cccc dddd", { windowSize: 10, overlap: 5 });

    expect(results.map((r) => r.content)).toEqual(["aaaa bbbb", "bbbb cccc", "cccc dddd"]);
    expect(results.map((r) => r.startChar)).toEqual([0, 5, 10]);
  });

  it("falls back to character splits for unbroken text", () => {
    const results = chunker.chunk("abcdefghijkl", { windowSize: 5, overlap: 2 });

    expect(results.map((r) => r.content)).toEqual(["abcde", "defgh", "ghijk", "jkl"]);
  });

  it("never exceeds the window size", () => {
    const text = [
      "Summary line one.\nSummary line two is a little longer than the first.",
      "Experience: built ingestion pipelines, vector search and retrieval services.",
      "Skills: TypeScript Python SQL Kubernetes " + "x".repeat(120),
    ].join("\n\n");

    for (const result of chunker.chunk(text, { windowSize: 40, overlap: 10 })) {
      expect(result.content.length).toBeLessThanOrEqual(40);
      expect(result.content.trim()).toBe(result.content);
    }
  });

  it("handles empty content", () => {
    expect(chunker.chunk("", { windowSize: 10, overlap: 2 })).toEqual([]);
  });
});

describe("chunkDocuments", () => {
  it("returns [] for no documents", () => {
    expect(chunkDocuments([], new WindowChunker(), config)).toEqual([]);
  });

  it("copies parent metadata and numbers chunks per document", () => {
    const first = doc("x".repeat(1500));
    const second = doc("short", "/data/projects/readme.md");

    const chunks = chunkDocuments([first, second], new WindowChunker(), config);

    expect(chunks.map((c) => [c.metadata["source"], c.sequenceIndex, c.text.length])).toEqual([
      ["/data/CV/cv.txt", 0, 1000],
      ["/data/CV/cv.txt", 1, 700],
      ["/data/projects/readme.md", 0, 5],
    ]);
    expect(chunks[0]?.metadata).toBe(first.metadata);
  });

  it("drops whitespace-only windows without renumbering", () => {
    const chunks = chunkDocuments([doc("ab      cd")], new WindowChunker(), {
      windowSize: 4,
      overlap: 0,
    });

    expect(chunks.map((c) => [c.text, c.sequenceIndex])).toEqual([
      ["ab  ", 0],
      ["cd", 2],
    ]);
  });
});

describe("createChunker", () => {
  it("defaults to the window chunker", () => {
    expect(createChunker().strategy).toBe("window");
  });

  it("creates chunkers by strategy", () => {
    expect(createChunker("window")).toBeInstanceOf(WindowChunker);
    expect(createChunker("recursive")).toBeInstanceOf(RecursiveChunker);
  });
});
