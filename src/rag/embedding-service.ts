import type { LlmClient } from "./llm-client.js";

export interface EmbeddingService {
  /** Failures propagate; a vector is never silently zeroed. */
  embed(text: string): Promise<number[]>;
}

export class OpenRouterEmbeddingService implements EmbeddingService {
  constructor(
    private readonly client: LlmClient,
    private readonly model: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.client.embed(this.model, [text]);
    if (!embedding) {
      throw new Error("Embedding API returned no vector");
    }
    return embedding;
  }
}
