import { describe, expect, it } from "vitest";
import {
  buildGroundedPrompt,
  extractReferences,
  toContextPreviews,
  truncate,
} from "./context-builder.js";
import { retrieved } from "./test-utils.js";

describe("truncate", () => {
  it("leaves short text alone and marks cut text", () => {
    expect(truncate("abc", 3)).toBe("abc");
    expect(truncate("abcdef", 3)).toBe("abc...");
  });
});

describe("buildGroundedPrompt", () => {
  it("numbers each source and ends with the question", () => {
    const { systemPrompt, userPrompt } = buildGroundedPrompt("Flu", "What causes fever?", [
      retrieved("Influenza virus causes fever.", "flu.pdf", 0.9),
      retrieved("Rest helps recovery.", "care.md", 0.5, 1),
    ]);

    expect(systemPrompt).toContain("specialized in Flu");
    expect(systemPrompt).toContain("[Source N]");
    expect(userPrompt).toBe(
      "Context from Flu documents:\n\n" +
        "[Source 1: flu.pdf]\nInfluenza virus causes fever.\n\n---\n\n" +
        "[Source 2: care.md]\nRest helps recovery.\n\n---\n\n" +
        "Question: What causes fever?\n\n" +
        "Please provide a precise answer based ONLY on the context above. " +
        "Include [Source N] citations for every fact you state.",
    );
  });
});

describe("extractReferences", () => {
  const chunks = [
    retrieved("a".repeat(250), "one.pdf", 0.9),
    retrieved("short text", "two.pdf", 0.7, 1),
    retrieved("third", "three.pdf", 0.4, 2),
  ];

  it("returns cited sources in source order", () => {
    const refs = extractReferences("Rest [Source 2]. Fever [Source 1].", chunks, 200);

    expect(refs).toEqual([
      { sourceId: 1, filename: "one.pdf", excerpt: `${"a".repeat(200)}...`, relevanceScore: 0.9 },
      { sourceId: 2, filename: "two.pdf", excerpt: "short text", relevanceScore: 0.7 },
    ]);
  });

  it("ignores markers without a matching source and multi-digit lookalikes", () => {
    expect(extractReferences("See [Source 10] and [Source 4].", chunks, 200)).toEqual([]);
  });

  it("returns nothing when the answer cites nothing", () => {
    expect(extractReferences("No citations here.", chunks, 200)).toEqual([]);
  });
});

describe("toContextPreviews", () => {
  it("truncates each chunk and keeps its score and filename", () => {
    expect(toContextPreviews([retrieved("abcdef", "x.txt", 0.3)], 4)).toEqual([
      { text: "abcd...", score: 0.3, filename: "x.txt" },
    ]);
  });
});
