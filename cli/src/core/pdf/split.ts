/**
 * Section splitting: fixed sections, fuzzy boundary detection and range
 * resolution, then one PDF per section written to the output directory.
 *
 * Existing files with the same name are overwritten. Nothing is rolled back
 * on failure: files written before an error stay on disk.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { createPdfAssembler } from './assemble.js';
import { DocumentNotFoundError } from './errors.js';
import {
  DEFAULT_LAYOUT,
  DEFAULT_THRESHOLD,
  FULL_CATALOG,
  scanStart,
  validateLayout,
  validateThreshold,
} from './layout.js';
import { openPdfTextSource } from './reader.js';
import { describeRange, pageIndicesFor, resolveRanges } from './resolve.js';
import { sanitizeFilename } from './sanitize.js';
import { findSectionBoundaries } from './scan.js';
import type {
  DetectOptions,
  DetectResult,
  Logger,
  PageTextSource,
  SectionLayout,
  SectionOutput,
  SectionPlan,
  SplitOptions,
  SplitResult,
} from './types.js';

export const DEFAULT_OUTPUT_DIR = 'split_pdfs';

export interface PlanOptions {
  layout?: SectionLayout;
  threshold?: number;
  logger?: Logger;
}

/**
 * Work out every section's page range without touching the filesystem.
 * Accepts any text source, so callers can plan against in-memory pages.
 */
export async function planSections(
  source: PageTextSource,
  opts: PlanOptions = {},
): Promise<SectionPlan> {
  const layout = opts.layout ?? DEFAULT_LAYOUT;
  const { boundaries, matches } = await findSectionBoundaries(source, {
    startPage: scanStart(layout),
    titles: layout.detected,
    threshold: opts.threshold ?? DEFAULT_THRESHOLD,
    logger: opts.logger,
  });

  const ranges = resolveRanges(layout, boundaries, source.pageCount);

  opts.logger?.info?.(`Detected ${boundaries.size} of ${layout.detected.length} additional sections`);
  for (const range of ranges) {
    if (range.source === 'detected') {
      opts.logger?.debug?.(`  - ${range.name}: page ${range.start + 1}`);
    }
  }

  return { pageCount: source.pageCount, ranges, matches };
}

/**
 * Split a PDF into one file per section.
 *
 * @throws DocumentNotFoundError if `documentPath` does not exist (checked first).
 * @throws SplitOptionsError on an invalid threshold or layout.
 * Read and write errors from the filesystem or PDF libraries propagate as-is.
 */
export async function splitPdf(
  documentPath: string,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  opts: SplitOptions = {},
): Promise<SplitResult> {
  const file = resolve(documentPath);
  if (!existsSync(file)) throw new DocumentNotFoundError(documentPath);

  const threshold = validateThreshold(opts.threshold ?? DEFAULT_THRESHOLD);
  const layout = validateLayout(opts.layout ?? DEFAULT_LAYOUT);
  const dryRun = opts.dryRun ?? false;
  const logger = opts.logger;
  const outDir = resolve(outputDir);

  if (!dryRun) mkdirSync(outDir, { recursive: true });

  const bytes = new Uint8Array(readFileSync(file));
  const source = await openPdfTextSource(bytes, { logger });
  let plan: SectionPlan;
  try {
    plan = await planSections(source, { layout, threshold, logger });
  } finally {
    await source.close();
  }

  const assembler = dryRun ? null : await createPdfAssembler(bytes);
  const sections: SectionOutput[] = [];

  for (const range of plan.ranges) {
    const path = join(outDir, `${sanitizeFilename(range.name)}.pdf`);
    const pages = pageIndicesFor(range, plan.pageCount);

    if (pages.length === 0) {
      logger?.warn?.(
        `'${range.name}' covers no pages (range [${range.start}, ${range.end}) of a ${plan.pageCount}-page document)`,
      );
    }

    if (assembler) {
      writeFileSync(path, await assembler.assemble(pages));
      logger?.info?.(`Created: ${path} (${describeRange(range, plan.pageCount)}, ${pages.length} pages)`);
    }

    sections.push({ name: range.name, path, range, pageCount: pages.length });
  }

  return { file, pageCount: plan.pageCount, sections, matches: plan.matches, dryRun };
}

/**
 * Scan a whole PDF (from the first page) for a catalog of titles.
 * Reports where each title starts; writes nothing.
 *
 * @throws DocumentNotFoundError if `documentPath` does not exist.
 */
export async function detectSections(
  documentPath: string,
  opts: DetectOptions = {},
): Promise<DetectResult> {
  const file = resolve(documentPath);
  if (!existsSync(file)) throw new DocumentNotFoundError(documentPath);

  const threshold = validateThreshold(opts.threshold ?? DEFAULT_THRESHOLD);
  const titles = opts.titles ?? FULL_CATALOG;

  const source = await openPdfTextSource(new Uint8Array(readFileSync(file)), { logger: opts.logger });
  try {
    const { boundaries, matches } = await findSectionBoundaries(source, {
      startPage: 0,
      titles,
      threshold,
      logger: opts.logger,
    });
    const missing = titles.filter((title) => !boundaries.has(title));
    return { file, pageCount: source.pageCount, matches, missing };
  } finally {
    await source.close();
  }
}
