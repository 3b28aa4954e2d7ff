/**
 * Section catalogs and layouts for grant-proposal style documents, plus
 * validation for layouts supplied by the user (e.g. `--layout file.json`).
 */

import { readFileSync } from 'node:fs';
import { SplitOptionsError } from './errors.js';
import { sanitizeFilename } from './sanitize.js';
import type { FixedSection, SectionLayout } from './types.js';

export const DEFAULT_THRESHOLD = 0.7;

/** Every section a complete proposal contains, in document order. */
export const FULL_CATALOG: readonly string[] = Object.freeze([
  'Project Summary',
  'Project Description',
  'References Cited',
  'Data Management and Sharing Plan',
  'Mentoring Plan',
  'Project Personnel and Partner Organizations',
  'Facilities, Equipment and Other Resources',
  'Synergistic Activities',
]);

/**
 * One-page summary, a 15-page description, then the trailing documents
 * wherever they turn up. References Cited is not looked for; it ends up
 * inside whichever section precedes the first trailing document.
 */
export const DEFAULT_LAYOUT: SectionLayout = Object.freeze({
  fixed: Object.freeze([
    Object.freeze({ name: 'Project Summary', startPage: 0, pages: 1 }),
    Object.freeze({ name: 'Project Description', startPage: 1, pages: 15 }),
  ]),
  detected: Object.freeze([
    'Data Management and Sharing Plan',
    'Mentoring Plan',
    'Project Personnel and Partner Organizations',
    'Facilities, Equipment and Other Resources',
    'Synergistic Activities',
  ]),
});

/** Exclusive end of a fixed section when the document does not decide it. */
export function nominalEnd(section: FixedSection): number {
  return section.pages === 'until-next'
    ? section.startPage + 1
    : section.startPage + section.pages;
}

/** First page the scanner looks at: explicit `scanFrom`, else past the last fixed section. */
export function scanStart(layout: SectionLayout): number {
  if (layout.scanFrom !== undefined) return layout.scanFrom;
  return layout.fixed.reduce((end, section) => Math.max(end, nominalEnd(section)), 0);
}

// ── Validation ───────────────────────────────────────────────

function requireName(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new SplitOptionsError(`${name} is required and must be a non-empty string`);
  }
  return value;
}

function requirePageIndex(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new SplitOptionsError(`${name} must be a non-negative integer (got ${String(value)})`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate a similarity threshold. */
export function validateThreshold(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new SplitOptionsError(`threshold must be a number between 0 and 1 (got ${String(value)})`);
  }
  return value;
}

function validateFixedSection(value: unknown, index: number): FixedSection {
  const label = `fixed[${index}]`;
  if (!isRecord(value)) {
    throw new SplitOptionsError(`${label} must be an object with name, startPage and pages`);
  }

  const name = requireName(value.name, `${label}.name`);
  const startPage = requirePageIndex(value.startPage, `${label}.startPage`);
  const pages = value.pages;

  if (pages === 'until-next') {
    return { name, startPage, pages };
  }
  if (typeof pages !== 'number' || !Number.isInteger(pages) || pages < 1) {
    throw new SplitOptionsError(
      `${label}.pages must be a positive integer or "until-next" (got ${String(pages)})`,
    );
  }
  return { name, startPage, pages };
}

/**
 * Validate an untrusted layout value and return a frozen copy.
 * Section names must be unique across fixed and detected sections.
 */
export function validateLayout(value: unknown): SectionLayout {
  if (!isRecord(value)) {
    throw new SplitOptionsError('layout must be an object with "fixed" and "detected" arrays');
  }

  const rawFixed = value.fixed ?? [];
  const rawDetected = value.detected ?? [];
  if (!Array.isArray(rawFixed)) throw new SplitOptionsError('layout.fixed must be an array');
  if (!Array.isArray(rawDetected)) throw new SplitOptionsError('layout.detected must be an array');

  const fixed = rawFixed.map((entry, i) => Object.freeze(validateFixedSection(entry, i)));
  const detected = rawDetected.map((title, i) => requireName(title, `detected[${i}]`));

  if (fixed.length === 0 && detected.length === 0) {
    throw new SplitOptionsError('layout must name at least one section');
  }

  // Names map to output files, so their sanitized forms must be distinct too
  const seen = new Map<string, string>();
  for (const name of [...fixed.map((f) => f.name), ...detected]) {
    const fileName = sanitizeFilename(name);
    if (fileName.length === 0) {
      throw new SplitOptionsError(`Section name "${name}" has no characters usable in a file name`);
    }
    const clash = seen.get(fileName);
    if (clash !== undefined) {
      throw new SplitOptionsError(
        clash === name
          ? `Duplicate section name "${name}" in layout`
          : `Section names "${clash}" and "${name}" would both be written to ${fileName}.pdf`,
      );
    }
    seen.set(fileName, name);
  }

  const scanFrom = value.scanFrom === undefined
    ? undefined
    : requirePageIndex(value.scanFrom, 'layout.scanFrom');

  return Object.freeze({
    fixed: Object.freeze(fixed),
    detected: Object.freeze(detected),
    ...(scanFrom !== undefined && { scanFrom }),
  });
}

/** Read and validate a JSON layout file. */
export function loadLayout(filePath: string): SectionLayout {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SplitOptionsError(`Cannot read layout file ${filePath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SplitOptionsError(`Layout file ${filePath} is not valid JSON: ${msg}`);
  }

  return validateLayout(parsed);
}
