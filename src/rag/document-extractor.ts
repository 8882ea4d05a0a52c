import { getDocumentProxy } from "unpdf";
import { DEFAULT_RAG_CONFIG } from "./config.js";
import { errorMessage, UnsupportedFileTypeError } from "./errors.js";
import type { LlmClient } from "./llm-client.js";
import type { Log } from "./types.js";
import { silentLog } from "./types.js";

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
};

const VISION_PROMPT = `You are a precise document parser. Extract ALL text content from this image exactly as it appears.

Instructions:
- Extract all visible text, including headers, paragraphs, tables, lists, and captions
- Preserve the structure and formatting as much as possible
- For tables, format them clearly with separators
- Pay special attention to drug names, dosages, terminology, abbreviations and references
- If there are handwritten notes, transcribe them with [handwritten] marker
- Do not summarize - extract the complete text`;

export interface DocumentExtractor {
  extract(bytes: Uint8Array, extension: string): Promise<string>;
}

const SUPPORTED_EXTENSIONS = new Set<string>(DEFAULT_RAG_CONFIG.supportedExtensions);

export function isSupportedExtension(extension: string): boolean {
  return SUPPORTED_EXTENSIONS.has(extension.toLowerCase());
}

/** Page-level PDF access; page numbers are 1-based. */
export interface PdfReader {
  pageTexts(bytes: Uint8Array): Promise<string[]>;
  renderPage(bytes: Uint8Array, pageNumber: number): Promise<Uint8Array>;
}

export async function readPdfPageTexts(bytes: Uint8Array): Promise<string[]> {
  const pdf = await getDocumentProxy(new Uint8Array(bytes));

  const pages: string[] = [];
  for (let i = 1; i <= pdf.numPages; i++) {
    const page = await pdf.getPage(i);
    const textContent = await page.getTextContent();
    pages.push(textContent.items.map((item) => ("str" in item ? item.str : "")).join(" "));
  }
  return pages;
}

export const defaultPdfReader: PdfReader = {
  pageTexts: readPdfPageTexts,
  // Loaded on first use so text-only ingestion never touches the native canvas
  renderPage: async (bytes, pageNumber) => {
    const { renderPdfPage } = await import("./page-renderer.js");
    return renderPdfPage(bytes, pageNumber);
  },
};

/** Renders parsed JSON as indented `key: value` lines. */
export function jsonToText(data: unknown, prefix = ""): string {
  const lines: string[] = [];

  if (Array.isArray(data)) {
    data.forEach((item, i) => {
      if (item !== null && typeof item === "object") {
        lines.push(`${prefix}Item ${i + 1}:`, jsonToText(item, `${prefix}  `));
      } else {
        lines.push(`${prefix}- ${String(item)}`);
      }
    });
  } else if (data !== null && typeof data === "object") {
    for (const [key, value] of Object.entries(data)) {
      if (value !== null && typeof value === "object") {
        lines.push(`${prefix}${key}:`, jsonToText(value, `${prefix}  `));
      } else {
        lines.push(`${prefix}${key}: ${String(value)}`);
      }
    }
  } else {
    lines.push(`${prefix}${String(data)}`);
  }

  return lines.join("\n");
}

export interface FileTextExtractorOptions {
  pdf?: PdfReader;
  minPageTextLength?: number;
  log?: Log;
}

export class FileTextExtractor implements DocumentExtractor {
  private readonly pdf: PdfReader;
  private readonly minPageTextLength: number;
  private readonly log: Log;

  constructor(
    private readonly client: LlmClient,
    private readonly visionModel: string,
    options: FileTextExtractorOptions = {},
  ) {
    this.pdf = options.pdf ?? defaultPdfReader;
    this.minPageTextLength = options.minPageTextLength ?? DEFAULT_RAG_CONFIG.minPageTextLength;
    this.log = options.log ?? silentLog;
  }

  async extract(bytes: Uint8Array, extension: string): Promise<string> {
    const ext = extension.toLowerCase();
    if (!isSupportedExtension(ext)) {
      throw new UnsupportedFileTypeError(ext);
    }

    if (ext === ".pdf") return this.extractPdfText(bytes);
    if (ext === ".json") return jsonToText(JSON.parse(decodeUtf8(bytes)));

    const mimeType = IMAGE_MIME_TYPES[ext];
    if (mimeType) return this.extractImageText(bytes, mimeType);

    return decodeUtf8(bytes);
  }

  /**
   * One `[Page N]` block per page, joined by blank lines. Pages with almost no
   * text layer (scans, slides) are rendered and read by the vision model; if
   * that fails the page keeps whatever text it had.
   */
  async extractPdfText(bytes: Uint8Array): Promise<string> {
    const texts = await this.pdf.pageTexts(bytes);

    const pages: string[] = [];
    for (const [i, text] of texts.entries()) {
      const pageNumber = i + 1;
      let body = text;
      if (text.trim().length < this.minPageTextLength) {
        try {
          const png = await this.pdf.renderPage(bytes, pageNumber);
          const seen = await this.extractImageText(png, "image/png");
          if (seen.trim()) body = seen;
        } catch (err) {
          this.log(`RAG: vision fallback failed for page ${pageNumber}: ${errorMessage(err)}`);
        }
      }
      pages.push(`[Page ${pageNumber}]\n${body}`);
    }
    return pages.join("\n\n");
  }

  private extractImageText(bytes: Uint8Array, mimeType: string): Promise<string> {
    const dataUrl = `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`;
    return this.client.chat(
      [
        { role: "system", content: VISION_PROMPT },
        { role: "user", content: [{ type: "image_url", image_url: { url: dataUrl, detail: "high" } }] },
      ],
      { model: this.visionModel, maxTokens: DEFAULT_RAG_CONFIG.visionMaxTokens },
    );
  }
}

function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes);
}
