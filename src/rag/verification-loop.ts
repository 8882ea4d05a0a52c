import { DEFAULT_RAG_CONFIG } from "./config.js";
import { errorMessage } from "./errors.js";
import type { QueryRefiner, RefineInput } from "./query-refiner.js";
import type { VerifyInput } from "./verifier.js";
import type {
  AttemptRecord,
  ContextPreview,
  GenerationOutcome,
  Log,
  QueryRunResult,
  Reference,
  VerificationResult,
} from "./types.js";
import { silentLog } from "./types.js";

export const EXHAUSTED_ANSWER = "Unable to generate a verified answer after multiple attempts.";
export const EXHAUSTED_ERROR = "All verification attempts failed";

export interface AnswerGenerator {
  answer(domain: string, query: string, topK: number): Promise<GenerationOutcome>;
}

export interface Verifier {
  verify(input: VerifyInput): Promise<VerificationResult>;
}

export interface LoopSettings {
  maxAttempts: number;
  confidenceThreshold: number;
  baseTopK: number;
  reasoningPreviewLength: number;
}

interface BestAnswer {
  answer: string;
  references: Reference[];
  retrievedChunks: ContextPreview[];
  verification: VerificationResult;
}

export function formatConfidenceWarning(confidence: number, threshold: number): string {
  return `Answer confidence (${confidence.toFixed(2)}) below threshold (${threshold}). Please verify independently.`;
}

/**
 * Drives retrieve → generate → verify cycles for one question. Each retry
 * widens retrieval by one chunk and searches with a refined query, while
 * verification is always judged against the original question.
 */
export class VerificationLoop {
  private readonly defaults: LoopSettings;

  constructor(
    private readonly generator: AnswerGenerator,
    private readonly verifier: Verifier,
    private readonly refiner: QueryRefiner,
    defaults: Partial<LoopSettings> = {},
    private readonly log: Log = silentLog,
  ) {
    this.defaults = {
      maxAttempts: defaults.maxAttempts ?? DEFAULT_RAG_CONFIG.maxAttempts,
      confidenceThreshold: defaults.confidenceThreshold ?? DEFAULT_RAG_CONFIG.confidenceThreshold,
      baseTopK: defaults.baseTopK ?? DEFAULT_RAG_CONFIG.topK,
      reasoningPreviewLength:
        defaults.reasoningPreviewLength ?? DEFAULT_RAG_CONFIG.reasoningPreviewLength,
    };
  }

  async run(
    domain: string,
    question: string,
    overrides: Partial<LoopSettings> = {},
  ): Promise<QueryRunResult> {
    const settings: LoopSettings = {
      maxAttempts: overrides.maxAttempts ?? this.defaults.maxAttempts,
      confidenceThreshold: overrides.confidenceThreshold ?? this.defaults.confidenceThreshold,
      baseTopK: overrides.baseTopK ?? this.defaults.baseTopK,
      reasoningPreviewLength:
        overrides.reasoningPreviewLength ?? this.defaults.reasoningPreviewLength,
    };
    const { maxAttempts, confidenceThreshold, baseTopK } = settings;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    const attempts: AttemptRecord[] = [];
    let currentQuery = question;
    let best: BestAnswer | null = null;
    let bestConfidence = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await this.generator.answer(domain, currentQuery, baseTopK + (attempt - 1));

      if (outcome.status === "no_context") {
        return {
          answer: outcome.answer,
          verified: false,
          confidence: 0,
          attempts: [
            { attempt: 1, status: "no_context", queryUsed: currentQuery, confidence: 0, verified: false },
          ],
          references: [],
          domain,
        };
      }

      if (outcome.status === "error") {
        this.log(`RAG: attempt ${attempt} failed: ${outcome.error}`);
        return {
          answer: EXHAUSTED_ANSWER,
          verified: false,
          confidence: 0,
          attempts,
          references: [],
          domain,
          error: outcome.error,
        };
      }

      const verification = await this.verifier.verify({
        query: question,
        answer: outcome.answer,
        context: outcome.retrievedChunks,
        domain,
      });

      const accepted = verification.verified && verification.confidence >= confidenceThreshold;
      attempts.push({
        attempt,
        status: accepted ? "verified" : "rejected",
        queryUsed: currentQuery,
        confidence: verification.confidence,
        verified: verification.verified,
        issues: verification.issues,
        reasoning: verification.reasoning.slice(0, settings.reasoningPreviewLength),
      });
      this.log(
        `RAG: attempt ${attempt}/${maxAttempts} confidence ${verification.confidence.toFixed(2)}` +
          (verification.verified ? " (verified)" : ""),
      );

      if (verification.confidence > bestConfidence) {
        bestConfidence = verification.confidence;
        best = {
          answer: outcome.answer,
          references: outcome.references,
          retrievedChunks: outcome.retrievedChunks,
          verification,
        };
      }

      if (accepted) {
        return {
          answer: outcome.answer,
          verified: true,
          confidence: verification.confidence,
          attempts,
          references: outcome.references,
          domain,
          retrievedChunks: outcome.retrievedChunks,
          verificationReasoning: verification.reasoning,
          finalAttempt: attempt,
        };
      }

      if (attempt < maxAttempts) {
        currentQuery = await this.refineOrKeep(currentQuery, {
          originalQuery: question,
          previousAnswer: outcome.answer,
          issues: verification.issues,
          suggestions: verification.suggestions,
          attempt,
          maxAttempts,
          domain,
        });
      }
    }

    if (best) {
      return {
        answer: best.answer,
        verified: best.verification.verified,
        confidence: bestConfidence,
        attempts,
        references: best.references,
        domain,
        retrievedChunks: best.retrievedChunks,
        verificationReasoning: best.verification.reasoning,
        warning: formatConfidenceWarning(bestConfidence, confidenceThreshold),
        finalAttempt: attempts.length,
      };
    }

    return {
      answer: EXHAUSTED_ANSWER,
      verified: false,
      confidence: 0,
      attempts,
      references: [],
      domain,
      error: EXHAUSTED_ERROR,
    };
  }

  // A failed refinement retries with the query that was just used.
  private async refineOrKeep(
    currentQuery: string,
    input: RefineInput,
  ): Promise<string> {
    try {
      const refined = await this.refiner.refine(input);
      this.log(`RAG: refined query for attempt ${input.attempt + 1}: ${refined}`);
      return refined;
    } catch (err) {
      this.log(`RAG: query refinement failed, keeping current query: ${errorMessage(err)}`);
      return currentQuery;
    }
  }
}

