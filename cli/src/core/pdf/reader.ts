/**
 * Page text extraction via pdfjs-dist (pure JS, no canvas).
 *
 * Text items are concatenated in content-stream order; a line ends wherever
 * pdfjs flags an end-of-line. Extraction is best effort: a page that cannot
 * be read yields '' plus a warning, and the scan carries on.
 */

// pdfjs-dist v5, legacy build for Node.js (no canvas requirement). Under
// Node it never spawns a worker thread; parsing runs on the main thread.
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { Logger, PageTextSource } from './types.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

export interface PdfTextSource extends PageTextSource {
  /** Release the pdfjs document. Safe to call more than once. */
  close(): Promise<void>;
}

export interface OpenOptions {
  logger?: Logger;
}

/**
 * Open a PDF for text extraction.
 *
 * @param bytes  Raw PDF bytes. Copied before loading; pdfjs may transfer
 *               (detach) the buffer it is handed.
 * @throws Error if the bytes are not a readable PDF.
 */
export async function openPdfTextSource(
  bytes: Uint8Array,
  opts: OpenOptions = {},
): Promise<PdfTextSource> {
  const doc = await getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false, // no code generation from strings
    disableFontFace: true,
    verbosity: 0,
  }).promise;

  let closed = false;

  return {
    pageCount: doc.numPages,
    extractText: (pageIndex) => extractPageText(doc, pageIndex, opts.logger),
    async close() {
      if (closed) return;
      closed = true;
      await doc.destroy();
    },
  };
}

async function extractPageText(doc: PdfDocument, pageIndex: number, logger?: Logger): Promise<string> {
  try {
    const page = await doc.getPage(pageIndex + 1); // 1-based
    try {
      const content = await page.getTextContent();

      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue; // marked-content delimiters
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      return text;
    } finally {
      page.cleanup();
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger?.warn?.(`Could not extract text from page ${pageIndex + 1}: ${msg}`);
    return '';
  }
}
