import { createCanvas, DOMMatrix, DOMPoint, ImageData, Path2D } from "@napi-rs/canvas";
import { DEFAULT_RAG_CONFIG } from "./config.js";

// Polyfill DOM globals that pdfjs-dist needs in Node.js
for (const [key, value] of Object.entries({ DOMMatrix, DOMPoint, ImageData, Path2D })) {
  if (!(key in globalThis)) {
    Object.defineProperty(globalThis, key, { value, writable: true, configurable: true });
  }
}

// Imported after the polyfills above are installed
let _pdfjs: typeof import("pdfjs-dist/legacy/build/pdf.mjs") | null = null;

async function getPdfjs() {
  if (!_pdfjs) {
    _pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return _pdfjs;
}

/** Rasterises one page (1-based) of a PDF to PNG bytes. */
export async function renderPdfPage(
  bytes: Uint8Array,
  pageNumber: number,
  scale: number = DEFAULT_RAG_CONFIG.pageRenderScale,
): Promise<Uint8Array> {
  const pdfjs = await getPdfjs();
  // pdfjs takes ownership of the buffer it is given
  const pdf = await pdfjs.getDocument({
    data: new Uint8Array(bytes),
    useSystemFonts: true,
    isEvalSupported: false,
  }).promise;

  try {
    const page = await pdf.getPage(pageNumber);
    const viewport = page.getViewport({ scale });
    const canvas = createCanvas(Math.floor(viewport.width), Math.floor(viewport.height));

    await page.render({
      canvasContext: canvas.getContext("2d"),
      viewport,
    }).promise;

    return new Uint8Array(await canvas.encode("png"));
  } finally {
    await pdf.destroy();
  }
}
