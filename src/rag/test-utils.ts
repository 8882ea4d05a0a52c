import type { Chunk, RetrievedChunk } from "./types.js";
import type { EmbeddingService } from "./embedding-service.js";

export const VOCABULARY = ["fever", "cough", "rash", "vaccine", "symptoms"] as const;

/**
 * Counts vocabulary words, plus a small constant dimension so no text embeds
 * to the zero vector.
 */
export class KeywordEmbedder implements EmbeddingService {
  calls: string[] = [];

  constructor(private readonly failOn?: string) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failOn && text.includes(this.failOn)) {
      throw new Error(`embedding failed for "${text}"`);
    }
    const words = text.toLowerCase().split(/[^a-z]+/);
    return [...VOCABULARY.map((term) => words.filter((w) => w === term).length), 0.1];
  }
}

export function makeChunks(texts: string[]): Chunk[] {
  return texts.map((text, id) => ({ id, text, charCount: text.length, overlapChars: 0 }));
}

export function retrieved(text: string, filename: string, score: number, chunkId = 0): RetrievedChunk {
  return {
    id: `doc_chunk_${chunkId}`,
    text,
    score,
    metadata: { documentId: "doc", filename, chunkId, charCount: text.length, domain: "flu" },
  };
}
