import { describe, expect, it, vi } from "vitest";
import type { LlmClient } from "./llm-client.js";
import {
  AnswerVerifier,
  buildVerificationPrompt,
  decodeVerdict,
  extractJsonObject,
  OpenRouterJudge,
} from "./verifier.js";
import type { Judge, VerifyInput } from "./verifier.js";

const input: VerifyInput = {
  query: "How long does fever last?",
  answer: "Three days [Source 1].",
  context: [
    { text: "Fever lasts three days.", score: 0.9, filename: "flu.pdf" },
    { text: "Rest helps.", score: 0.5, filename: "care.md" },
  ],
  domain: "Flu",
};

const verdict = {
  is_verified: true,
  confidence: 0.92,
  supported_claims: ["fever lasts three days"],
  issues: [],
  suggestions: ["none"],
  reasoning: "Directly stated in chunk 1.",
};

function judgeReturning(content: string): Judge {
  return { judge: async () => content };
}

const degraded = (message: string) => ({
  verified: false,
  confidence: 0,
  issues: [`Verification error: ${message}`],
  suggestions: ["Retry with more specific query"],
  reasoning: "Verification failed due to technical error",
});

describe("extractJsonObject", () => {
  it("takes the span from the first opening brace to the last closing brace", () => {
    expect(extractJsonObject('Sure! {"a": {"b": 1}} hope that helps')).toBe('{"a": {"b": 1}}');
  });

  it("throws when there is no object", () => {
    expect(() => extractJsonObject("no json here")).toThrow("No valid JSON found in response");
    expect(() => extractJsonObject("} backwards {")).toThrow("No valid JSON found in response");
  });
});

describe("decodeVerdict", () => {
  it("maps the verdict and ignores extra fields", () => {
    expect(decodeVerdict(`Here you go:\n${JSON.stringify(verdict)}`)).toEqual({
      verified: true,
      confidence: 0.92,
      issues: [],
      suggestions: ["none"],
      reasoning: "Directly stated in chunk 1.",
    });
  });

  it("returns a frozen result", () => {
    const result = decodeVerdict(JSON.stringify(verdict));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.issues)).toBe(true);
  });

  it("rejects a confidence outside [0, 1]", () => {
    expect(() => decodeVerdict(JSON.stringify({ ...verdict, confidence: 1.4 }))).toThrow(
      /^Verdict did not match schema: confidence/,
    );
  });
});

describe("buildVerificationPrompt", () => {
  it("includes the question, numbered chunks and the answer", () => {
    const prompt = buildVerificationPrompt(input);
    expect(prompt).toContain("DISEASE CONTEXT: Flu");
    expect(prompt).toContain("ORIGINAL QUESTION: How long does fever last?");
    expect(prompt).toContain("[Chunk 1]: Fever lasts three days.\n\n---\n\n[Chunk 2]: Rest helps.");
    expect(prompt).toContain("ANSWER TO VERIFY:\nThree days [Source 1].");
  });
});

describe("AnswerVerifier", () => {
  it("returns the decoded verdict", async () => {
    const verifier = new AnswerVerifier(judgeReturning(JSON.stringify(verdict)));
    const result = await verifier.verify(input);
    expect(result.verified).toBe(true);
    expect(result.confidence).toBe(0.92);
  });

  it("degrades when the judge answers without JSON", async () => {
    const verifier = new AnswerVerifier(judgeReturning("I think it is fine."));
    expect(await verifier.verify(input)).toEqual(degraded("No valid JSON found in response"));
  });

  it("degrades when a required field is missing", async () => {
    const { reasoning: _dropped, ...partial } = verdict;
    const verifier = new AnswerVerifier(judgeReturning(JSON.stringify(partial)));
    const result = await verifier.verify(input);
    expect(result.verified).toBe(false);
    expect(result.confidence).toBe(0);
    expect(result.issues[0]).toMatch(/^Verification error: Verdict did not match schema: reasoning/);
  });

  it("degrades when the judge call throws", async () => {
    const log = vi.fn();
    const judge: Judge = {
      judge: async () => {
        throw new Error("timeout");
      },
    };
    const verifier = new AnswerVerifier(judge, log);

    expect(await verifier.verify(input)).toEqual(degraded("timeout"));
    expect(log).toHaveBeenCalledWith("RAG: verification degraded to zero confidence: timeout");
  });
});

describe("OpenRouterJudge", () => {
  it("sends the prompt as a single user message", async () => {
    const chat = vi.fn<LlmClient["chat"]>(async () => "{}");
    const judge = new OpenRouterJudge({ chat, embed: async () => [] }, "test/judge", 1000);

    await judge.judge("check this");
    expect(chat).toHaveBeenCalledWith([{ role: "user", content: "check this" }], {
      model: "test/judge",
      maxTokens: 1000,
    });
  });
});
