import type { ContextPreview, Reference, RetrievedChunk } from "./types.js";

export interface GroundedPrompt {
  systemPrompt: string;
  userPrompt: string;
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function buildGroundedPrompt(
  domain: string,
  query: string,
  chunks: RetrievedChunk[],
): GroundedPrompt {
  const contextParts = chunks.map(
    (chunk, i) => `[Source ${i + 1}: ${chunk.metadata.filename}]\n${chunk.text}`,
  );

  const systemPrompt =
    `You are a precise medical information assistant specialized in ${domain}.\n\n` +
    "CRITICAL RULES:\n" +
    "1. ONLY use information explicitly stated in the provided context\n" +
    '2. If the answer is not in the context, say "I cannot find this information in the provided documents"\n' +
    "3. NEVER make assumptions or add information from general knowledge\n" +
    "4. Always cite sources using [Source N] format\n" +
    "5. Be precise and factual\n" +
    "6. If information is partial or unclear, acknowledge the limitation";

  const userPrompt =
    `Context from ${domain} documents:\n\n` +
    contextParts.join("\n\n---\n\n") +
    `\n\n---\n\nQuestion: ${query}\n\n` +
    "Please provide a precise answer based ONLY on the context above. " +
    "Include [Source N] citations for every fact you state.";

  return { systemPrompt, userPrompt };
}

/**
 * Lists the sources the answer cites, in source order. Matching is textual:
 * a `[Source N]` marker counts whether or not the claim next to it holds.
 */
export function extractReferences(
  answer: string,
  chunks: RetrievedChunk[],
  excerptLength: number,
): Reference[] {
  const references: Reference[] = [];
  chunks.forEach((chunk, i) => {
    if (!answer.includes(`[Source ${i + 1}]`)) return;
    references.push({
      sourceId: i + 1,
      filename: chunk.metadata.filename,
      excerpt: truncate(chunk.text, excerptLength),
      relevanceScore: chunk.score,
    });
  });
  return references;
}

export function toContextPreviews(chunks: RetrievedChunk[], maxLength: number): ContextPreview[] {
  return chunks.map((chunk) => ({
    text: truncate(chunk.text, maxLength),
    score: chunk.score,
    filename: chunk.metadata.filename,
  }));
}
