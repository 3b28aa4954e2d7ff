/**
 * Range resolution: turns fixed sections and detected boundaries into
 * ordered, non-overlapping `[start, end)` page ranges.
 */

import type { BoundaryMap, ExtractionRange, FixedSection, SectionLayout } from './types.js';

/**
 * Resolve every section of a layout to a page range.
 *
 * Fixed sections come first, in layout order, with their nominal ranges
 * (not clamped to the document; see `pageIndicesFor`). Detected sections
 * follow in page order; each runs up to the next detected boundary, the last
 * to the end of the document. Titles found on the same page keep the order
 * they were found in; all but the last get a zero-length range, which is kept.
 */
export function resolveRanges(
  layout: SectionLayout,
  boundaries: BoundaryMap,
  pageCount: number,
): ExtractionRange[] {
  const detected = sortBoundaries(boundaries);
  const ranges = layout.fixed.map((section): ExtractionRange => ({
    name: section.name,
    start: section.startPage,
    end: fixedEnd(section, detected, pageCount),
    source: 'fixed',
  }));

  detected.forEach(([name, start], i) => {
    const end = i + 1 < detected.length ? detected[i + 1][1] : pageCount;
    ranges.push({ name, start, end, source: 'detected' });
  });

  return ranges;
}

/** Zero-based page indices to copy for a range, clamped to the document. */
export function pageIndicesFor(range: ExtractionRange, pageCount: number): number[] {
  const indices: number[] = [];
  for (let page = range.start; page < Math.min(range.end, pageCount); page++) {
    indices.push(page);
  }
  return indices;
}

/** Human-readable 1-based range, e.g. "pages 17-20" or "page 1". */
export function describeRange(range: ExtractionRange, pageCount: number): string {
  const count = pageIndicesFor(range, pageCount).length;
  if (count === 0) return 'no pages';
  const first = range.start + 1;
  const last = range.start + count;
  return first === last ? `page ${first}` : `pages ${first}-${last}`;
}

// ── Internals ────────────────────────────────────────────────

/**
 * Boundary entries by ascending page. Map iteration follows insertion
 * order, which the scanner makes discovery order (page, then line), and
 * `Array.prototype.sort` is stable, so titles on one page keep the order
 * they were found in.
 */
function sortBoundaries(boundaries: BoundaryMap): Array<[string, number]> {
  return [...boundaries.entries()].sort((a, b) => a[1] - b[1]);
}

function fixedEnd(
  section: FixedSection,
  detected: ReadonlyArray<[string, number]>,
  pageCount: number,
): number {
  if (section.pages !== 'until-next') return section.startPage + section.pages;
  const next = detected.find(([, page]) => page >= section.startPage);
  return next ? next[1] : pageCount;
}
