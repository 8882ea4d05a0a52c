import { DEFAULT_RAG_CONFIG } from "./config.js";
import type { LlmClient } from "./llm-client.js";

export interface RefineInput {
  originalQuery: string;
  previousAnswer: string;
  issues: readonly string[];
  suggestions: readonly string[];
  attempt: number;
  maxAttempts: number;
  domain: string;
}

export interface QueryRefiner {
  refine(input: RefineInput): Promise<string>;
}

export function buildRefinementPrompt(input: RefineInput): string {
  const bullets = (items: readonly string[]) => items.map((item) => `- ${item}`).join("\n");

  return `Based on a failed answer verification, generate an improved search query.

Original Question: ${input.originalQuery}
Disease: ${input.domain}
Attempt: ${input.attempt} of ${input.maxAttempts}

Previous Answer:
${input.previousAnswer}

Previous Answer Issues:
${bullets(input.issues)}

Suggestions:
${bullets(input.suggestions)}

Generate a more specific or differently-phrased query that might retrieve better context.
Focus on the specific information gaps identified.

Return ONLY the refined query, nothing else.`;
}

export class OpenRouterQueryRefiner implements QueryRefiner {
  constructor(
    private readonly client: LlmClient,
    private readonly model: string,
    private readonly temperature: number = DEFAULT_RAG_CONFIG.refinementTemperature,
    private readonly maxTokens: number = DEFAULT_RAG_CONFIG.refinementMaxTokens,
  ) {}

  async refine(input: RefineInput): Promise<string> {
    const content = await this.client.chat(
      [{ role: "user", content: buildRefinementPrompt(input) }],
      { model: this.model, temperature: this.temperature, maxTokens: this.maxTokens },
    );
    const refined = content.trim();
    if (!refined) {
      throw new Error("Refinement model returned an empty query");
    }
    return refined;
  }
}
