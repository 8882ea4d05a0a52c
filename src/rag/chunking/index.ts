import type { ChunkingOptions, ChunkingStrategy } from "./types.js";
import { ParagraphChunker } from "./paragraph-chunker.js";

type ChunkingStrategyFactory = (options: ChunkingOptions) => ChunkingStrategy;

const registry = new Map<string, ChunkingStrategyFactory>();

export function registerChunkingStrategy(name: string, factory: ChunkingStrategyFactory): void {
  registry.set(name, factory);
}

export function getChunkingStrategy(name: string, options: ChunkingOptions): ChunkingStrategy {
  const factory = registry.get(name);
  if (!factory) {
    throw new Error(`Unknown chunking strategy: ${name}`);
  }
  return factory(options);
}

// Register defaults
registerChunkingStrategy("paragraph", (options) => new ParagraphChunker(options));

export { ParagraphChunker, splitParagraphs } from "./paragraph-chunker.js";
export type { ChunkingOptions, ChunkingStrategy } from "./types.js";
