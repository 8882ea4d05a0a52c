export interface Chunk {
  id: number;
  text: string;
  charCount: number;
  /** Leading characters carried over from the previous chunk. */
  overlapChars: number;
}

export interface ChunkMetadata {
  documentId: string;
  filename: string;
  chunkId: number;
  charCount: number;
  domain: string;
}

export interface RetrievedChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface CollectionInfo {
  name: string;
  displayName: string;
  chunkCount: number;
}

export interface DocumentInfo {
  documentId: string;
  filename: string;
  domain: string;
}

export interface Reference {
  sourceId: number;
  filename: string;
  excerpt: string;
  relevanceScore: number;
}

/** Truncated chunk handed to the verification judge. */
export interface ContextPreview {
  text: string;
  score: number;
  filename: string;
}

export interface VerificationResult {
  readonly verified: boolean;
  readonly confidence: number;
  readonly issues: readonly string[];
  readonly suggestions: readonly string[];
  readonly reasoning: string;
}

export type GenerationOutcome =
  | { status: "no_context"; answer: string }
  | {
      status: "answered";
      answer: string;
      references: Reference[];
      chunksUsed: number;
      retrievedChunks: ContextPreview[];
    }
  | { status: "error"; error: string };

export type AttemptRecord =
  | {
      readonly attempt: number;
      readonly status: "verified" | "rejected";
      readonly queryUsed: string;
      readonly confidence: number;
      readonly verified: boolean;
      readonly issues: readonly string[];
      readonly reasoning: string;
    }
  | {
      readonly attempt: number;
      readonly status: "no_context";
      readonly queryUsed: string;
      readonly confidence: 0;
      readonly verified: false;
    };

export interface QueryRunResult {
  answer: string;
  verified: boolean;
  confidence: number;
  attempts: AttemptRecord[];
  references: Reference[];
  domain: string;
  /** Context previews the returned answer was judged against. */
  retrievedChunks?: ContextPreview[];
  verificationReasoning?: string;
  finalAttempt?: number;
  warning?: string;
  error?: string;
}

export type BoundaryResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "not_found" | "invalid" | "failed"; error: string };

export type Log = (msg: string) => void;

export const silentLog: Log = () => {};
