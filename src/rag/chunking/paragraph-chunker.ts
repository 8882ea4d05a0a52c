import { assertChunkWindow } from "../config.js";
import type { Chunk } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

const PARAGRAPH_SEPARATOR = "\n\n";

/**
 * Recursively splits text by trying separators in order: \n → " " → hard char limit.
 * Only used for paragraphs that alone exceed the chunk size.
 */
function recursiveSplit(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  for (const sep of ["\n", " "]) {
    const idx = text.lastIndexOf(sep, maxLength);
    if (idx > 0) {
      return [
        text.slice(0, idx).trimEnd(),
        ...recursiveSplit(text.slice(idx + sep.length).trimStart(), maxLength),
      ].filter((piece) => piece.length > 0);
    }
  }

  return [text.slice(0, maxLength), ...recursiveSplit(text.slice(maxLength), maxLength)];
}

export function splitParagraphs(text: string, maxLength: number): string[] {
  return text
    .split(/\n[ \t]*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .flatMap((p) => recursiveSplit(p, maxLength));
}

/**
 * Greedy paragraph packer. Each chunk after the first starts with the tail of
 * the previous one so passages keep their surrounding context at retrieval time.
 */
export class ParagraphChunker implements ChunkingStrategy {
  readonly name = "paragraph";
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(options: ChunkingOptions) {
    assertChunkWindow(options.chunkSize, options.chunkOverlap);
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  chunk(text: string): Chunk[] {
    const chunks: Chunk[] = [];
    let buffer = "";
    let bufferOverlap = 0;

    const emit = (): void => {
      chunks.push({
        id: chunks.length,
        text: buffer,
        charCount: buffer.length,
        overlapChars: bufferOverlap,
      });
    };

    for (const para of splitParagraphs(text, this.chunkSize)) {
      if (buffer.length === 0) {
        buffer = para;
        bufferOverlap = 0;
        continue;
      }

      if (buffer.length + PARAGRAPH_SEPARATOR.length + para.length <= this.chunkSize) {
        buffer += PARAGRAPH_SEPARATOR + para;
        continue;
      }

      emit();
      // Seeded buffer must stay within chunkSize + chunkOverlap.
      const room = this.chunkSize + this.chunkOverlap - PARAGRAPH_SEPARATOR.length - para.length;
      const tailLength = Math.min(this.chunkOverlap, room);
      const tail = tailLength > 0 ? buffer.slice(-tailLength).trimStart() : "";
      buffer = tail.length > 0 ? tail + PARAGRAPH_SEPARATOR + para : para;
      bufferOverlap = tail.length;
    }

    if (buffer.length > 0) emit();
    return chunks;
  }
}
