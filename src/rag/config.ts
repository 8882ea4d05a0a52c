import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_RAG_CONFIG = {
  baseUrl: "https://openrouter.ai/api/v1",
  collectionsDir: ".rag-cache/collections",

  embeddingModel: "openai/text-embedding-3-small",
  generationModel: "openai/gpt-4o",
  reasoningModel: "openai/o1-mini",
  refinementModel: "openai/gpt-4o",
  visionModel: "openai/gpt-4o",

  chunkSize: 1000,
  chunkOverlap: 200,
  defaultChunkingStrategy: "paragraph",

  topK: 5,
  maxAttempts: 5,
  confidenceThreshold: 0.8,

  generationTemperature: 0.1,
  generationMaxTokens: 2048,
  refinementTemperature: 0.3,
  refinementMaxTokens: 200,
  verificationMaxTokens: 4096,
  visionMaxTokens: 4096,

  // PDF pages with less extracted text than this are read by the vision model
  minPageTextLength: 50,
  pageRenderScale: 2,

  excerptLength: 200,
  contextPreviewLength: 300,
  reasoningPreviewLength: 500,

  supportedExtensions: [".pdf", ".json", ".png", ".jpg", ".jpeg", ".gif", ".md", ".txt"],
} as const;

export interface RagConfig {
  apiKey: string;
  baseUrl: string;
  collectionsDir: string;
  embeddingModel: string;
  generationModel: string;
  reasoningModel: string;
  refinementModel: string;
  visionModel: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  maxAttempts: number;
  confidenceThreshold: number;
}

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().min(1, "OPENROUTER_API_KEY environment variable is required"),
  OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_RAG_CONFIG.baseUrl),
  RAG_COLLECTIONS_DIR: z.string().min(1).default(DEFAULT_RAG_CONFIG.collectionsDir),
  RAG_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_RAG_CONFIG.embeddingModel),
  RAG_GENERATION_MODEL: z.string().min(1).default(DEFAULT_RAG_CONFIG.generationModel),
  RAG_REASONING_MODEL: z.string().min(1).default(DEFAULT_RAG_CONFIG.reasoningModel),
  RAG_REFINEMENT_MODEL: z.string().min(1).default(DEFAULT_RAG_CONFIG.refinementModel),
  RAG_VISION_MODEL: z.string().min(1).default(DEFAULT_RAG_CONFIG.visionModel),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_RAG_CONFIG.chunkSize),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(DEFAULT_RAG_CONFIG.chunkOverlap),
  RAG_TOP_K: z.coerce.number().int().positive().default(DEFAULT_RAG_CONFIG.topK),
  RAG_MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_RAG_CONFIG.maxAttempts),
  RAG_CONFIDENCE_THRESHOLD: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_RAG_CONFIG.confidenceThreshold),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  assertChunkWindow(vars.RAG_CHUNK_SIZE, vars.RAG_CHUNK_OVERLAP);

  return {
    apiKey: vars.OPENROUTER_API_KEY,
    baseUrl: vars.OPENROUTER_BASE_URL.replace(/\/+$/, ""),
    collectionsDir: path.resolve(vars.RAG_COLLECTIONS_DIR),
    embeddingModel: vars.RAG_EMBEDDING_MODEL,
    generationModel: vars.RAG_GENERATION_MODEL,
    reasoningModel: vars.RAG_REASONING_MODEL,
    refinementModel: vars.RAG_REFINEMENT_MODEL,
    visionModel: vars.RAG_VISION_MODEL,
    chunkSize: vars.RAG_CHUNK_SIZE,
    chunkOverlap: vars.RAG_CHUNK_OVERLAP,
    topK: vars.RAG_TOP_K,
    maxAttempts: vars.RAG_MAX_ATTEMPTS,
    confidenceThreshold: vars.RAG_CONFIDENCE_THRESHOLD,
  };
}

// The overlap seed must leave room for new text, otherwise chunking never advances.
export function assertChunkWindow(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`,
    );
  }
}
