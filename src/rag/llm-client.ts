import { ExternalServiceError } from "./errors.js";

export type MessageContent =
  | string
  | Array<
      | { type: "text"; text: string }
      | { type: "image_url"; image_url: { url: string; detail?: "low" | "high" | "auto" } }
    >;

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: MessageContent;
}

export interface ChatOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/** The subset of OpenRouter the services below depend on; tests provide fakes. */
export interface LlmClient {
  chat(messages: ChatMessage[], options: ChatOptions): Promise<string>;
  embed(model: string, input: string[]): Promise<number[][]>;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

interface EmbeddingResponse {
  data?: Array<{ embedding?: number[] }>;
}

export class OpenRouterClient implements LlmClient {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string,
  ) {}

  async chat(messages: ChatMessage[], options: ChatOptions): Promise<string> {
    const json = await this.post<ChatCompletionResponse>("/chat/completions", {
      model: options.model,
      messages,
      ...(options.temperature !== undefined && { temperature: options.temperature }),
      ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
    });

    const content = json.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      throw new ExternalServiceError("Chat completion response had no message content");
    }
    return content;
  }

  async embed(model: string, input: string[]): Promise<number[][]> {
    const json = await this.post<EmbeddingResponse>("/embeddings", { model, input });

    const vectors = (json.data ?? []).map((item) => item.embedding);
    if (vectors.length !== input.length) {
      throw new ExternalServiceError(
        `Embedding response had ${vectors.length} vectors for ${input.length} inputs`,
      );
    }
    return vectors.map((vector) => {
      if (!Array.isArray(vector) || vector.length === 0) {
        throw new ExternalServiceError("Invalid embedding response shape");
      }
      return vector;
    });
  }

  private async post<T>(endpoint: string, body: unknown): Promise<T> {
    const res = await fetch(`${this.baseUrl}${endpoint}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new ExternalServiceError(`API error (${res.status}): ${text}`, res.status);
    }

    return (await res.json()) as T;
  }
}
