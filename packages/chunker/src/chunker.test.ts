import { describe, it, expect } from "vitest";
import type { NormalizedDocument } from "@indexloom/types";
import { RecursiveChunker } from "./recursive-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";
import { createChunker } from "./factory.js";
import { computeChunkId } from "./chunk-id.js";
import { chunkDocument } from "./document-chunker.js";

const SAMPLE_TEXT = `This is the first paragraph of the document. It contains some important information about the topic at hand.

This is the second paragraph. It elaborates on the points made in the first paragraph with additional details and examples.

This is the third paragraph. It provides a conclusion and summarizes the key points discussed in the previous sections.`;

const UUID_SHAPE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("RecursiveChunker", () => {
  const chunker = new RecursiveChunker();

  it("has strategy 'recursive'", () => {
    expect(chunker.strategy).toBe("recursive");
  });

  it("returns a single span for short text", () => {
    const results = chunker.chunk("Hello world.", { maxTokensPerChunk: 50 });
    expect(results).toEqual([
      { content: "Hello world.", index: 0, tokenCount: 3, startChar: 0, endChar: 12 },
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(chunker.chunk("", { maxTokensPerChunk: 50 })).toEqual([]);
  });

  it("keeps every span within the token budget", () => {
    const results = chunker.chunk(SAMPLE_TEXT, { maxTokensPerChunk: 30 });
    expect(results.length).toBeGreaterThan(1);
    results.forEach((span, i) => {
      expect(span.index).toBe(i);
      expect(span.tokenCount).toBeLessThanOrEqual(30);
    });
  });

  it("reports offsets that point back into the source text", () => {
    const results = chunker.chunk(SAMPLE_TEXT, { maxTokensPerChunk: 30 });
    for (const span of results) {
      expect(SAMPLE_TEXT.slice(span.startChar, span.endChar)).toBe(span.content);
    }
  });

  it("is deterministic", () => {
    const a = chunker.chunk(SAMPLE_TEXT, { maxTokensPerChunk: 20 });
    const b = chunker.chunk(SAMPLE_TEXT, { maxTokensPerChunk: 20 });
    expect(a).toEqual(b);
  });

  it("splits on markdown headings and records the section title", () => {
    const text = "# Intro\nAlpha text.\n\n## Usage\nBeta text.";
    const results = chunker.chunk(text, { maxTokensPerChunk: 50 });

    expect(results).toHaveLength(2);
    expect(results[0]?.content).toBe("# Intro\nAlpha text.");
    expect(results[0]?.sectionTitle).toBe("Intro");
    expect(results[1]?.content).toBe("## Usage\nBeta text.");
    expect(results[1]?.sectionTitle).toBe("Usage");
    expect(results[1]?.startChar).toBe(21);
  });

  it("keeps a fenced code block together across blank lines", () => {
    const code = "```\nconst a = 1;\n\nconst b = 2;\n```";
    const text = `Intro paragraph here.\n\n${code}\n\nOutro.`;
    const results = chunker.chunk(text, { maxTokensPerChunk: 10 });

    expect(results.map((r) => r.content)).toEqual(["Intro paragraph here.", code, "Outro."]);
  });

  it("ignores heading-like lines inside a fenced block", () => {
    const text = "# Setup\nRun this:\n\n```\n# install deps\nnpm ci\n```";
    const results = chunker.chunk(text, { maxTokensPerChunk: 50 });

    expect(results).toHaveLength(1);
    expect(results[0]?.content).toBe(text);
    expect(results[0]?.sectionTitle).toBe("Setup");
  });

  it("falls back to hard cuts when no separator helps", () => {
    const results = chunker.chunk("x".repeat(100), { maxTokensPerChunk: 5 });
    expect(results).toHaveLength(5);
    results.forEach((span) => {
      expect(span.content).toHaveLength(20);
      expect(span.tokenCount).toBe(5);
    });
  });

  it("rejects a non-positive budget", () => {
    expect(() => chunker.chunk(SAMPLE_TEXT, { maxTokensPerChunk: 0 })).toThrow(RangeError);
  });
});

describe("FixedChunker", () => {
  const chunker = new FixedChunker();

  it("has strategy 'fixed'", () => {
    expect(chunker.strategy).toBe("fixed");
  });

  it("cuts fixed windows without overlap", () => {
    const results = chunker.chunk("abcdefghij", { maxTokensPerChunk: 1 });
    expect(results.map((r) => r.content)).toEqual(["abcd", "efgh", "ij"]);
    expect(results.map((r) => r.startChar)).toEqual([0, 4, 8]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
  });

  it("skips blank windows", () => {
    const results = chunker.chunk("abcd        efgh", { maxTokensPerChunk: 1 });
    expect(results.map((r) => r.content)).toEqual(["abcd", "efgh"]);
    expect(results[1]?.startChar).toBe(12);
  });
});

describe("createChunker", () => {
  it("creates recursive chunker", () => {
    expect(createChunker("recursive")).toBeInstanceOf(RecursiveChunker);
  });

  it("creates fixed chunker", () => {
    expect(createChunker("fixed")).toBeInstanceOf(FixedChunker);
  });
});

describe("computeChunkId", () => {
  const base = { userId: "user-1", sourceId: "doc-1", generation: "abc", sequenceIndex: 0 };

  it("is UUID-shaped and stable", () => {
    const id = computeChunkId(base);
    expect(id).toMatch(UUID_SHAPE);
    expect(computeChunkId({ ...base })).toBe(id);
  });

  it("changes with index, generation and owner", () => {
    const id = computeChunkId(base);
    expect(computeChunkId({ ...base, sequenceIndex: 1 })).not.toBe(id);
    expect(computeChunkId({ ...base, generation: "def" })).not.toBe(id);
    expect(computeChunkId({ ...base, userId: "user-2" })).not.toBe(id);
  });
});

describe("chunkDocument", () => {
  const doc: NormalizedDocument = {
    sourceId: "doc-1",
    userId: "user-1",
    text: "# Intro\nAlpha text.\n\n## Usage\nBeta text.",
    contentHash: "hash-1",
    version: "v1",
    mimeType: "text/markdown",
    title: "Guide",
    locator: "guide.md",
  };

  it("binds spans to the document and its generation", () => {
    const chunks = chunkDocument(doc, new RecursiveChunker(), { maxTokensPerChunk: 50 }, "local");

    expect(chunks).toHaveLength(2);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1]);
    expect(chunks[1]).toMatchObject({
      chunkId: computeChunkId({
        userId: "user-1",
        sourceId: "doc-1",
        generation: "hash-1",
        sequenceIndex: 1,
      }),
      sourceId: "doc-1",
      userId: "user-1",
      generation: "hash-1",
      text: "## Usage\nBeta text.",
      metadata: { sourceType: "local", title: "Guide", locator: "guide.md", sectionTitle: "Usage" },
    });
  });
});
