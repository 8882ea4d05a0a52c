import type { Chunk } from "../types.js";

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(text: string): Chunk[];
}
