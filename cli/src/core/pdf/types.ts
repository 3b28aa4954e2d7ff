/**
 * Types for section boundary detection and per-section PDF splitting.
 */

// ── Logging ──────────────────────────────────────────────────

/**
 * Optional sink for diagnostics. Every method is optional; a missing
 * method silently drops that level.
 */
export interface Logger {
  debug?: (message: string, ...args: unknown[]) => void;
  info?: (message: string, ...args: unknown[]) => void;
  warn?: (message: string, ...args: unknown[]) => void;
}

// ── Primitives ───────────────────────────────────────────────

/** Page-by-page plain text access to a paginated document. */
export interface PageTextSource {
  readonly pageCount: number;
  /** Zero-based page index. Never rejects: unreadable pages yield ''. */
  extractText(pageIndex: number): Promise<string>;
}

/** Builds a new PDF from an ordered list of zero-based source page indices. */
export interface PageAssembler {
  readonly pageCount: number;
  assemble(pageIndices: number[]): Promise<Uint8Array>;
}

// ── Layout ───────────────────────────────────────────────────

/** Page count of a fixed section, or open-ended up to the first detected boundary. */
export type FixedSectionPages = number | 'until-next';

/** A section that always occupies the same pages, whatever the content. */
export interface FixedSection {
  name: string;
  /** Zero-based first page. */
  startPage: number;
  pages: FixedSectionPages;
}

/**
 * Where sections are expected in a document: fixed sections first, then
 * titles found by fuzzy matching from `scanFrom` onwards.
 */
export interface SectionLayout {
  readonly fixed: readonly FixedSection[];
  /** Catalog order decides which title wins a line when several qualify. */
  readonly detected: readonly string[];
  /** Zero-based page to start scanning. Defaults to the end of the last fixed section. */
  readonly scanFrom?: number;
}

// ── Detection ────────────────────────────────────────────────

/** Section title → zero-based page of its first qualifying line. */
export type BoundaryMap = Map<string, number>;

/** A single line that crossed the similarity threshold. */
export interface BoundaryMatch {
  title: string;
  /** Zero-based page index. */
  page: number;
  /** The matched line as extracted (untrimmed). */
  line: string;
  score: number;
}

export interface BoundaryScan {
  boundaries: BoundaryMap;
  /** One entry per boundary, in discovery order. */
  matches: BoundaryMatch[];
}

// ── Ranges ───────────────────────────────────────────────────

export type RangeSource = 'fixed' | 'detected';

/** Pages `[start, end)` that make up one section. */
export interface ExtractionRange {
  name: string;
  start: number;
  end: number;
  source: RangeSource;
}

export interface SectionPlan {
  pageCount: number;
  ranges: ExtractionRange[];
  matches: BoundaryMatch[];
}

// ── Split result ─────────────────────────────────────────────

/** One written (or, on dry run, planned) section file. */
export interface SectionOutput {
  name: string;
  /** Absolute path of the output PDF. */
  path: string;
  range: ExtractionRange;
  /** Pages actually written, after clamping to the document length. */
  pageCount: number;
}

export interface SplitResult {
  /** Absolute path of the input PDF. */
  file: string;
  pageCount: number;
  sections: SectionOutput[];
  matches: BoundaryMatch[];
  dryRun: boolean;
}

export interface SplitOptions {
  /** Minimum similarity (0–1) for a line to start a section. Default 0.7. */
  threshold?: number;
  layout?: SectionLayout;
  /** Detect and resolve only. Do not create the directory or write files. */
  dryRun?: boolean;
  logger?: Logger;
}

export interface DetectOptions {
  threshold?: number;
  /** Catalog to scan for. Defaults to the full catalog. */
  titles?: readonly string[];
  logger?: Logger;
}

export interface DetectResult {
  file: string;
  pageCount: number;
  matches: BoundaryMatch[];
  /** Catalog titles with no qualifying line anywhere. */
  missing: string[];
}
