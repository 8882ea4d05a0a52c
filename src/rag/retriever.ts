import { DEFAULT_RAG_CONFIG } from "./config.js";
import { buildGroundedPrompt, extractReferences, toContextPreviews } from "./context-builder.js";
import { errorMessage } from "./errors.js";
import type { LlmClient } from "./llm-client.js";
import type { GenerationOutcome, Log, RetrievedChunk } from "./types.js";
import { silentLog } from "./types.js";

export const NO_CONTEXT_ANSWER =
  "No documents found for this disease. Please upload relevant documents first.";

export interface AnswerService {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ChunkSearch {
  search(domain: string, query: string, topK: number): Promise<RetrievedChunk[]>;
}

export class OpenRouterAnswerService implements AnswerService {
  constructor(
    private readonly client: LlmClient,
    private readonly model: string,
    private readonly temperature: number = DEFAULT_RAG_CONFIG.generationTemperature,
    private readonly maxTokens: number = DEFAULT_RAG_CONFIG.generationMaxTokens,
  ) {}

  generate(systemPrompt: string, userPrompt: string): Promise<string> {
    return this.client.chat(
      [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      { model: this.model, temperature: this.temperature, maxTokens: this.maxTokens },
    );
  }
}

export interface RetrievalGeneratorOptions {
  excerptLength?: number;
  contextPreviewLength?: number;
  log?: Log;
}

export class RetrievalGenerator {
  private readonly excerptLength: number;
  private readonly contextPreviewLength: number;
  private readonly log: Log;

  constructor(
    private readonly index: ChunkSearch,
    private readonly answers: AnswerService,
    options: RetrievalGeneratorOptions = {},
  ) {
    this.excerptLength = options.excerptLength ?? DEFAULT_RAG_CONFIG.excerptLength;
    this.contextPreviewLength =
      options.contextPreviewLength ?? DEFAULT_RAG_CONFIG.contextPreviewLength;
    this.log = options.log ?? silentLog;
  }

  async answer(domain: string, query: string, topK: number): Promise<GenerationOutcome> {
    let chunks: RetrievedChunk[];
    try {
      chunks = await this.index.search(domain, query, topK);
    } catch (err) {
      return { status: "error", error: `Retrieval failed: ${errorMessage(err)}` };
    }

    if (chunks.length === 0) {
      this.log(`RAG: no context in "${domain}" for query`);
      return { status: "no_context", answer: NO_CONTEXT_ANSWER };
    }

    const { systemPrompt, userPrompt } = buildGroundedPrompt(domain, query, chunks);
    let answer: string;
    try {
      answer = await this.answers.generate(systemPrompt, userPrompt);
    } catch (err) {
      return { status: "error", error: `Generation failed: ${errorMessage(err)}` };
    }

    const references = extractReferences(answer, chunks, this.excerptLength);
    this.log(
      `RAG: answered from ${chunks.length} chunk(s), ${references.length} cited in "${domain}"`,
    );

    return {
      status: "answered",
      answer,
      references,
      chunksUsed: chunks.length,
      retrievedChunks: toContextPreviews(chunks, this.contextPreviewLength),
    };
  }
}
