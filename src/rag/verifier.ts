import { z } from "zod";
import { DEFAULT_RAG_CONFIG } from "./config.js";
import { errorMessage } from "./errors.js";
import type { LlmClient } from "./llm-client.js";
import type { ContextPreview, Log, VerificationResult } from "./types.js";
import { silentLog } from "./types.js";

/** Returns raw model text expected to contain one JSON verdict object. */
export interface Judge {
  judge(prompt: string): Promise<string>;
}

export class OpenRouterJudge implements Judge {
  constructor(
    private readonly client: LlmClient,
    private readonly model: string,
    private readonly maxTokens: number = DEFAULT_RAG_CONFIG.verificationMaxTokens,
  ) {}

  judge(prompt: string): Promise<string> {
    return this.client.chat([{ role: "user", content: prompt }], {
      model: this.model,
      maxTokens: this.maxTokens,
    });
  }
}

export const verdictSchema = z.object({
  is_verified: z.boolean(),
  confidence: z.number().min(0).max(1),
  issues: z.array(z.string()),
  suggestions: z.array(z.string()),
  reasoning: z.string(),
});

export function extractJsonObject(content: string): string {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new Error("No valid JSON found in response");
  }
  return content.slice(start, end + 1);
}

export function decodeVerdict(content: string): VerificationResult {
  const parsed = verdictSchema.safeParse(JSON.parse(extractJsonObject(content)));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
      .join("; ");
    throw new Error(`Verdict did not match schema: ${details}`);
  }
  const verdict = parsed.data;
  return Object.freeze({
    verified: verdict.is_verified,
    confidence: verdict.confidence,
    issues: Object.freeze([...verdict.issues]),
    suggestions: Object.freeze([...verdict.suggestions]),
    reasoning: verdict.reasoning,
  });
}

export function failedVerification(err: unknown): VerificationResult {
  return Object.freeze({
    verified: false,
    confidence: 0,
    issues: Object.freeze([`Verification error: ${errorMessage(err)}`]),
    suggestions: Object.freeze(["Retry with more specific query"]),
    reasoning: "Verification failed due to technical error",
  });
}

export interface VerifyInput {
  query: string;
  answer: string;
  context: ContextPreview[];
  domain: string;
}

export function buildVerificationPrompt({ query, answer, context, domain }: VerifyInput): string {
  const contextStr = context.map((chunk, i) => `[Chunk ${i + 1}]: ${chunk.text}`).join("\n\n---\n\n");

  return `You are a rigorous medical fact-checker. Your task is to verify if an answer is accurate and well-supported by the provided context.

DISEASE CONTEXT: ${domain}

ORIGINAL QUESTION: ${query}

PROVIDED CONTEXT:
${contextStr}

ANSWER TO VERIFY:
${answer}

VERIFICATION TASK:
1. Check if EVERY claim in the answer is directly supported by the context
2. Identify any statements that go beyond the provided context
3. Check for potential hallucinations or unsupported inferences
4. Verify terminology and facts are accurate
5. Assess overall answer quality and completeness

Respond with a JSON object:
{
    "is_verified": true/false,
    "confidence": 0.0-1.0,
    "supported_claims": ["list of claims that are well-supported"],
    "unsupported_claims": ["list of claims not in context"],
    "issues": ["specific problems found"],
    "suggestions": ["how to improve the answer"],
    "reasoning": "detailed explanation of your verification"
}

Be strict - medical information must be precise.`;
}

/**
 * Grades an answer against its retrieved context. Never throws: any failure of
 * the judge call or of decoding its verdict yields a zero-confidence result.
 */
export class AnswerVerifier {
  constructor(
    private readonly judge: Judge,
    private readonly log: Log = silentLog,
  ) {}

  async verify(input: VerifyInput): Promise<VerificationResult> {
    try {
      const content = await this.judge.judge(buildVerificationPrompt(input));
      return decodeVerdict(content);
    } catch (err) {
      this.log(`RAG: verification degraded to zero confidence: ${errorMessage(err)}`);
      return failedVerification(err);
    }
  }
}
