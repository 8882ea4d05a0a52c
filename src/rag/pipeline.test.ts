import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ParagraphChunker } from "./chunking/index.js";
import type { DocumentExtractor } from "./document-extractor.js";
import { RagService } from "./pipeline.js";
import type { QueryRefiner } from "./query-refiner.js";
import { NO_CONTEXT_ANSWER, RetrievalGenerator } from "./retriever.js";
import type { AnswerService } from "./retriever.js";
import { KeywordEmbedder, makeChunks } from "./test-utils.js";
import { VerificationLoop } from "./verification-loop.js";
import type { Verifier } from "./verification-loop.js";
import { SimilarityIndex } from "./vector-store.js";

const textExtractor: DocumentExtractor = {
  extract: async (bytes) => new TextDecoder().decode(bytes),
};

const citingAnswers: AnswerService = {
  generate: async () => "Fever is common [Source 1].",
};

const confidentVerifier: Verifier = {
  verify: async () => ({
    verified: true,
    confidence: 0.9,
    issues: [],
    suggestions: [],
    reasoning: "supported",
  }),
};

const echoRefiner: QueryRefiner = { refine: async (input) => input.originalQuery };

describe("RagService", () => {
  let dir: string;
  let index: SimilarityIndex;
  let service: RagService;

  function build(extractor: DocumentExtractor = textExtractor, answers: AnswerService = citingAnswers) {
    const generator = new RetrievalGenerator(index, answers);
    const loop = new VerificationLoop(generator, confidentVerifier, echoRefiner);
    return new RagService({
      index,
      chunker: new ParagraphChunker({ chunkSize: 50, chunkOverlap: 10 }),
      extractor,
      generator,
      loop,
      topK: 5,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rag-service-"));
    index = new SimilarityIndex(dir, new KeywordEmbedder());
    service = build();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("ingests a file and answers a verified query from it", async () => {
    const bytes = new TextEncoder().encode("Fever is common in flu.\n\nA rash appears rarely.");
    const ingested = await service.ingestFile("Flu", "notes.md", bytes);

    expect(ingested.ok).toBe(true);
    if (!ingested.ok) return;
    expect(ingested.value).toMatchObject({ filename: "notes.md", domain: "Flu", chunksAdded: 1 });
    expect(ingested.value.documentId).toMatch(/^[0-9a-f-]{36}$/);

    const result = await service.query("flu", "Is fever common?");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.verified).toBe(true);
    expect(result.value.confidence).toBe(0.9);
    expect(result.value.finalAttempt).toBe(1);
    expect(result.value.references.map((r) => r.filename)).toEqual(["notes.md"]);

    const docs = await service.documentsOf("flu");
    expect(docs).toEqual({
      ok: true,
      value: [{ documentId: ingested.value.documentId, filename: "notes.md", domain: "Flu" }],
    });
  });

  it("answers without verification when asked to", async () => {
    await service.ingest("flu", "d1", makeChunks(["fever"]), "a.txt");

    const result = await service.query("flu", "fever?", { verify: false });

    expect(result).toEqual({
      ok: true,
      value: {
        answer: "Fever is common [Source 1].",
        verified: false,
        confidence: 0,
        attempts: [],
        references: [{ sourceId: 1, filename: "a.txt", excerpt: "fever", relevanceScore: expect.any(Number) }],
        domain: "flu",
      },
    });
  });

  it("reports no context for an empty domain", async () => {
    const result = await service.query("measles", "fever?");
    expect(result.ok && result.value.answer).toBe(NO_CONTEXT_ANSWER);
    expect(result.ok && result.value.attempts).toEqual([
      { attempt: 1, status: "no_context", queryUsed: "fever?", confidence: 0, verified: false },
    ]);
  });

  it("rejects blank input and invalid attempt counts", async () => {
    expect(await service.query(" ", "q")).toEqual({ ok: false, reason: "invalid", error: "Domain name is required" });
    expect(await service.query("flu", "")).toEqual({ ok: false, reason: "invalid", error: "Question is required" });
    expect(await service.query("flu", "q", { maxAttempts: 0 })).toEqual({
      ok: false,
      reason: "invalid",
      error: "maxAttempts must be a positive integer, got 0",
    });
    expect(await service.ingest("flu", "", [], "a.txt")).toEqual({
      ok: false,
      reason: "invalid",
      error: "Document id is required",
    });
  });

  it("rejects unsupported file types before extracting", async () => {
    const result = await service.ingestFile("flu", "report.docx", new Uint8Array());
    expect(result).toEqual({
      ok: false,
      reason: "invalid",
      error: "Unsupported file type: .docx. Supported: .pdf, .json, .png, .jpg, .jpeg, .gif, .md, .txt",
    });
  });

  it("reports extraction failures", async () => {
    service = build({
      extract: async () => {
        throw new Error("corrupt file");
      },
    });
    expect(await service.ingestFile("flu", "bad.pdf", new Uint8Array())).toEqual({
      ok: false,
      reason: "failed",
      error: "Extracting bad.pdf failed: corrupt file",
    });
  });

  it("accepts a document that yields no chunks", async () => {
    const result = await service.ingestFile("flu", "empty.txt", new TextEncoder().encode("  \n\n "));
    expect(result.ok && result.value.chunksAdded).toBe(0);
    expect(await index.count("flu")).toBe(0);
  });

  it("reports a generation failure on an unverified query", async () => {
    service = build(textExtractor, {
      generate: async () => {
        throw new Error("upstream down");
      },
    });
    await service.ingest("flu", "d1", makeChunks(["fever"]), "a.txt");

    expect(await service.query("flu", "fever?", { verify: false })).toEqual({
      ok: false,
      reason: "failed",
      error: "Generation failed: upstream down",
    });
  });

  it("manages collections and documents", async () => {
    expect(await service.createCollection("Flu")).toEqual({
      ok: true,
      value: { name: "flu", displayName: "Flu", chunkCount: 0 },
    });
    await service.ingest("flu", "d1", makeChunks(["fever", "cough"]), "a.txt");
    expect(await service.listCollections()).toEqual({
      ok: true,
      value: [{ name: "flu", displayName: "Flu", chunkCount: 2 }],
    });

    expect(await service.deleteDocument("flu", "d1")).toEqual({
      ok: true,
      value: "Document 'd1' deleted successfully",
    });
    expect(await service.deleteDocument("flu", "d1")).toEqual({
      ok: false,
      reason: "not_found",
      error: 'Document "d1" not found',
    });

    expect(await service.deleteCollection("flu")).toEqual({
      ok: true,
      value: "Collection 'flu' deleted successfully",
    });
    expect(await service.deleteCollection("flu")).toMatchObject({ ok: false, reason: "not_found" });
    expect(await service.documentsOf("flu")).toMatchObject({ ok: false, reason: "not_found" });
  });
});
