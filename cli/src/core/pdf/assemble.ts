/**
 * Page-range extraction via pdf-lib.
 *
 * The source is parsed once; each call copies the requested pages into a
 * fresh document. Metadata updates are disabled so no timestamps or producer
 * string end up in the output. Identical input gives identical bytes.
 */

import { PDFDocument } from 'pdf-lib';
import type { PageAssembler } from './types.js';

/**
 * Load a PDF as a page source for assembling section files.
 * @throws Error if the bytes are not a readable (or are an encrypted) PDF.
 */
export async function createPdfAssembler(bytes: Uint8Array): Promise<PageAssembler> {
  const source = await PDFDocument.load(bytes, { updateMetadata: false });

  return {
    pageCount: source.getPageCount(),
    async assemble(pageIndices: number[]): Promise<Uint8Array> {
      const output = await PDFDocument.create({ updateMetadata: false });
      const pages = await output.copyPages(source, pageIndices);
      for (const page of pages) output.addPage(page);
      return output.save();
    },
  };
}
