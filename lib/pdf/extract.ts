/**
 * PDF text extraction using mupdf.
 */

import mupdf, { type Document as MupdfDocument } from "mupdf";

export interface ExtractTextOptions {
  /** Called after each page is read. */
  onProgress?: (progress: { page: number; totalPages: number }) => void;
}

/**
 * Extract the text of every page, each prefixed with `--- Page N ---`.
 * Pages without text are skipped; a PDF with no text yields "".
 */
export async function extractPdfText(
  pdf: Uint8Array,
  options: ExtractTextOptions = {}
): Promise<string> {
  const doc = openPdfFromBuffer(pdf);
  const totalPages = doc.countPages();
  const parts: string[] = [];

  for (let i = 0; i < totalPages; i++) {
    const page = doc.loadPage(i);
    const text = page.toStructuredText().asText().trim();
    if (text) parts.push(`--- Page ${i + 1} ---\n${text}`);
    options.onProgress?.({ page: i + 1, totalPages });
    await tick();
  }

  return parts.join("\n\n");
}

const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdfFromBuffer(buffer: Uint8Array): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}
