/**
 * Section boundary scanner: fuzzy-matches each line of each page against a
 * catalog of section titles and records the page where every title first
 * reaches the similarity threshold.
 *
 * Greedy, in a fixed order: pages ascending, lines top to bottom, titles in
 * catalog order. The first qualifying title claims the line; a claimed title
 * is never matched again, even if a better line shows up later.
 */

import { DEFAULT_THRESHOLD } from './layout.js';
import { similarity } from './similarity.js';
import type { BoundaryMap, BoundaryMatch, BoundaryScan, Logger, PageTextSource } from './types.js';

/** Lines shorter than this score deceptively well against short titles. */
export const MIN_LINE_LENGTH = 5;

/** Width of the matched-line preview in diagnostics. */
const PREVIEW_CHARS = 60;

export interface ScanOptions {
  /** Zero-based first page to scan (inclusive). */
  startPage: number;
  titles: readonly string[];
  threshold?: number;
  minLineLength?: number;
  logger?: Logger;
}

/**
 * Find the first page on which each title appears.
 * Titles with no qualifying line are absent from the result; that is not an error.
 */
export async function findSectionBoundaries(
  source: PageTextSource,
  opts: ScanOptions,
): Promise<BoundaryScan> {
  const threshold = opts.threshold ?? DEFAULT_THRESHOLD;
  const minLineLength = opts.minLineLength ?? MIN_LINE_LENGTH;
  const candidates = opts.titles.map((title) => ({ title, normalized: title.toLowerCase() }));
  const boundaries: BoundaryMap = new Map();
  const matches: BoundaryMatch[] = [];

  for (let page = Math.max(0, opts.startPage); page < source.pageCount; page++) {
    // Every title resolved; remaining pages cannot change the result
    if (boundaries.size === candidates.length) break;

    const text = await source.extractText(page);
    for (const line of text.split('\n')) {
      const normalized = line.toLowerCase().trim();
      if (Array.from(normalized).length < minLineLength) continue;

      for (const candidate of candidates) {
        if (boundaries.has(candidate.title)) continue;

        const score = similarity(normalized, candidate.normalized);
        if (score >= threshold) {
          boundaries.set(candidate.title, page);
          matches.push({ title: candidate.title, page, line, score });
          opts.logger?.info?.(
            `Found '${candidate.title}' on page ${page + 1} ` +
            `(match: '${previewLine(line)}' with score ${score.toFixed(2)})`,
          );
          break; // one title per line
        }
      }
    }
  }

  return { boundaries, matches };
}

/** Trimmed line, cut to 60 characters with a trailing '...'. */
export function previewLine(line: string): string {
  const trimmed = line.trim();
  return trimmed.length > PREVIEW_CHARS ? `${trimmed.slice(0, PREVIEW_CHARS)}...` : trimmed;
}
