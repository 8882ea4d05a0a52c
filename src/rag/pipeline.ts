import { randomUUID } from "node:crypto";
import path from "node:path";
import { getChunkingStrategy, type ChunkingStrategy } from "./chunking/index.js";
import { DEFAULT_RAG_CONFIG, type RagConfig } from "./config.js";
import { FileTextExtractor, isSupportedExtension, type DocumentExtractor } from "./document-extractor.js";
import { OpenRouterEmbeddingService } from "./embedding-service.js";
import { errorMessage } from "./errors.js";
import { OpenRouterClient } from "./llm-client.js";
import { OpenRouterQueryRefiner } from "./query-refiner.js";
import { OpenRouterAnswerService, RetrievalGenerator } from "./retriever.js";
import { VerificationLoop } from "./verification-loop.js";
import { AnswerVerifier, OpenRouterJudge } from "./verifier.js";
import { SimilarityIndex } from "./vector-store.js";
import type {
  BoundaryResult,
  Chunk,
  CollectionInfo,
  DocumentInfo,
  Log,
  QueryRunResult,
} from "./types.js";
import { silentLog } from "./types.js";

export interface QueryOptions {
  maxAttempts?: number;
  /** When false, answer from a single retrieval pass without the judge. */
  verify?: boolean;
}

export interface IngestedDocument {
  documentId: string;
  filename: string;
  domain: string;
  chunksAdded: number;
}

export interface RagServiceDeps {
  index: SimilarityIndex;
  chunker: ChunkingStrategy;
  extractor: DocumentExtractor;
  generator: RetrievalGenerator;
  loop: VerificationLoop;
  topK: number;
  log?: Log;
}

const ok = <T>(value: T): BoundaryResult<T> => ({ ok: true, value });

const fail = <T>(reason: "not_found" | "invalid" | "failed", error: string): BoundaryResult<T> => ({
  ok: false,
  reason,
  error,
});

/**
 * Operation surface for callers outside the core. Every method resolves to a
 * BoundaryResult; none of them rejects.
 */
export class RagService {
  private readonly index: SimilarityIndex;
  private readonly chunker: ChunkingStrategy;
  private readonly extractor: DocumentExtractor;
  private readonly generator: RetrievalGenerator;
  private readonly loop: VerificationLoop;
  private readonly topK: number;
  private readonly log: Log;

  constructor(deps: RagServiceDeps) {
    this.index = deps.index;
    this.chunker = deps.chunker;
    this.extractor = deps.extractor;
    this.generator = deps.generator;
    this.loop = deps.loop;
    this.topK = deps.topK;
    this.log = deps.log ?? silentLog;
  }

  async ingest(
    domain: string,
    documentId: string,
    rawChunks: Chunk[],
    filename: string,
  ): Promise<BoundaryResult<number>> {
    if (!domain.trim()) return fail("invalid", "Domain name is required");
    if (!documentId.trim()) return fail("invalid", "Document id is required");

    try {
      return ok(await this.index.upsert(domain, documentId, rawChunks, filename));
    } catch (err) {
      return fail("failed", `Indexing ${filename} failed: ${errorMessage(err)}`);
    }
  }

  async ingestFile(
    domain: string,
    filename: string,
    bytes: Uint8Array,
  ): Promise<BoundaryResult<IngestedDocument>> {
    if (!domain.trim()) return fail("invalid", "Domain name is required");

    const extension = path.extname(filename).toLowerCase();
    if (!isSupportedExtension(extension)) {
      return fail(
        "invalid",
        `Unsupported file type: ${extension || "(none)"}. Supported: ${DEFAULT_RAG_CONFIG.supportedExtensions.join(", ")}`,
      );
    }

    const documentId = randomUUID();
    let chunks: Chunk[];
    try {
      this.log(`RAG: extracting ${filename}...`);
      const text = await this.extractor.extract(bytes, extension);
      chunks = this.chunker.chunk(text);
    } catch (err) {
      return fail("failed", `Extracting ${filename} failed: ${errorMessage(err)}`);
    }

    if (chunks.length === 0) {
      this.log(`RAG: ${filename} produced no chunks, skipping`);
      return ok({ documentId, filename, domain, chunksAdded: 0 });
    }

    this.log(`RAG: embedding ${filename} (${chunks.length} chunks)...`);
    const added = await this.ingest(domain, documentId, chunks, filename);
    if (!added.ok) return added;

    this.log(`RAG: ${filename} done (${added.value} chunks)`);
    return ok({ documentId, filename, domain, chunksAdded: added.value });
  }

  async query(
    domain: string,
    question: string,
    options: QueryOptions = {},
  ): Promise<BoundaryResult<QueryRunResult>> {
    if (!domain.trim()) return fail("invalid", "Domain name is required");
    if (!question.trim()) return fail("invalid", "Question is required");
    const { maxAttempts, verify = true } = options;
    if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts < 1)) {
      return fail("invalid", `maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    try {
      if (verify) {
        return ok(await this.loop.run(domain, question, { maxAttempts }));
      }
      return await this.unverifiedQuery(domain, question);
    } catch (err) {
      return fail("failed", `Query failed: ${errorMessage(err)}`);
    }
  }

  async createCollection(domain: string): Promise<BoundaryResult<CollectionInfo>> {
    if (!domain.trim()) return fail("invalid", "Domain name is required");
    try {
      return ok(await this.index.createCollection(domain));
    } catch (err) {
      return fail("failed", errorMessage(err));
    }
  }

  async listCollections(): Promise<BoundaryResult<CollectionInfo[]>> {
    try {
      return ok(await this.index.listCollections());
    } catch (err) {
      return fail("failed", errorMessage(err));
    }
  }

  async documentsOf(domain: string): Promise<BoundaryResult<DocumentInfo[]>> {
    try {
      if (!(await this.index.hasCollection(domain))) {
        return fail("not_found", `Collection "${domain}" not found`);
      }
      return ok(await this.index.documentsOf(domain));
    } catch (err) {
      return fail("failed", errorMessage(err));
    }
  }

  async deleteDocument(domain: string, documentId: string): Promise<BoundaryResult<string>> {
    try {
      if (!(await this.index.deleteDocument(domain, documentId))) {
        return fail("not_found", `Document "${documentId}" not found`);
      }
      return ok(`Document '${documentId}' deleted successfully`);
    } catch (err) {
      return fail("failed", errorMessage(err));
    }
  }

  async deleteCollection(domain: string): Promise<BoundaryResult<string>> {
    try {
      if (!(await this.index.deleteCollection(domain))) {
        return fail("not_found", `Collection "${domain}" not found`);
      }
      return ok(`Collection '${domain}' deleted successfully`);
    } catch (err) {
      return fail("failed", errorMessage(err));
    }
  }

  private async unverifiedQuery(
    domain: string,
    question: string,
  ): Promise<BoundaryResult<QueryRunResult>> {
    const outcome = await this.generator.answer(domain, question, this.topK);
    switch (outcome.status) {
      case "error":
        return fail("failed", outcome.error);
      case "no_context":
        return ok({
          answer: outcome.answer,
          verified: false,
          confidence: 0,
          attempts: [],
          references: [],
          domain,
        });
      case "answered":
        return ok({
          answer: outcome.answer,
          verified: false,
          confidence: 0,
          attempts: [],
          references: outcome.references,
          domain,
        });
    }
  }
}

/** Wires the OpenRouter-backed collaborators. The caller owns the returned service. */
export function createRagService(config: RagConfig, log: Log = silentLog): RagService {
  const client = new OpenRouterClient(config.apiKey, config.baseUrl);
  const embedder = new OpenRouterEmbeddingService(client, config.embeddingModel);
  const index = new SimilarityIndex(config.collectionsDir, embedder, log);

  const generator = new RetrievalGenerator(
    index,
    new OpenRouterAnswerService(client, config.generationModel),
    { log },
  );
  const verifier = new AnswerVerifier(new OpenRouterJudge(client, config.reasoningModel), log);
  const refiner = new OpenRouterQueryRefiner(client, config.refinementModel);
  const loop = new VerificationLoop(
    generator,
    verifier,
    refiner,
    {
      maxAttempts: config.maxAttempts,
      confidenceThreshold: config.confidenceThreshold,
      baseTopK: config.topK,
    },
    log,
  );

  return new RagService({
    index,
    chunker: getChunkingStrategy(DEFAULT_RAG_CONFIG.defaultChunkingStrategy, {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
    }),
    extractor: new FileTextExtractor(client, config.visionModel, { log }),
    generator,
    loop,
    topK: config.topK,
    log,
  });
}
