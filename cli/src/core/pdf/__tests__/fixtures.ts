/**
 * Test fixtures: in-memory text sources and generated PDFs, so tests don't
 * depend on external files.
 */
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { PageTextSource } from '../types.js';

/** A text source over literal page strings that counts extraction calls. */
export function memorySource(pages: string[]): PageTextSource & { reads: number[] } {
  const reads: number[] = [];
  return {
    pageCount: pages.length,
    reads,
    async extractText(pageIndex: number) {
      reads.push(pageIndex);
      return pages[pageIndex] ?? '';
    },
  };
}

/** `count` pages of filler text, with overrides by zero-based index. */
export function pagesWith(count: number, overrides: Record<number, string> = {}): string[] {
  return Array.from({ length: count }, (_, i) => overrides[i] ?? `Narrative text continues on page ${i + 1}`);
}

/**
 * Build a letter-size PDF; each page is a list of lines drawn top-down in
 * Helvetica, one `drawText` per line.
 */
export async function createTextPdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create({ updateMetadata: false });
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (const lines of pages) {
    const page = doc.addPage([612, 792]);
    lines.forEach((text, i) => {
      page.drawText(text, { x: 72, y: 720 - i * 28, size: 12, font });
    });
  }

  return doc.save();
}

/** One filler line per page, with single-line overrides by zero-based index. */
export function proposalPages(count: number, overrides: Record<number, string> = {}): string[][] {
  return Array.from({ length: count }, (_, i) => [overrides[i] ?? `Body ${i + 1}`]);
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'pdf-sections-test-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
