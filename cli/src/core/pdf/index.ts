/**
 * Section boundary detection + per-section splitting for paginated PDFs.
 *
 * Usage:
 *   import { splitPdf, detectSections, similarity, ... } from '../core/pdf/index.js';
 */

export { similarity, matchingBlocks } from './similarity.js';
export { findSectionBoundaries, MIN_LINE_LENGTH, previewLine } from './scan.js';
export { resolveRanges, pageIndicesFor, describeRange } from './resolve.js';
export { sanitizeFilename } from './sanitize.js';
export {
  DEFAULT_LAYOUT,
  DEFAULT_THRESHOLD,
  FULL_CATALOG,
  loadLayout,
  scanStart,
  validateLayout,
  validateThreshold,
} from './layout.js';
export { openPdfTextSource } from './reader.js';
export { createPdfAssembler } from './assemble.js';
export { splitPdf, planSections, detectSections, DEFAULT_OUTPUT_DIR } from './split.js';
export { SplitError, DocumentNotFoundError, SplitOptionsError } from './errors.js';
export type { SplitErrorCode } from './errors.js';
export type { MatchingBlock } from './similarity.js';
export type { ScanOptions } from './scan.js';
export type { PdfTextSource } from './reader.js';
export type { PlanOptions } from './split.js';
export type {
  Logger,
  PageTextSource,
  PageAssembler,
  FixedSectionPages,
  FixedSection,
  SectionLayout,
  BoundaryMap,
  BoundaryMatch,
  BoundaryScan,
  RangeSource,
  ExtractionRange,
  SectionPlan,
  SectionOutput,
  SplitResult,
  SplitOptions,
  DetectOptions,
  DetectResult,
} from './types.js';
