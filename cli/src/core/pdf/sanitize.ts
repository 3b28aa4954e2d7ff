/**
 * Filesystem-safe names for section output files.
 *
 *   "Data Management and Sharing Plan"           → "data_management_and_sharing_plan"
 *   "Facilities, Equipment and Other Resources"  → "facilities_equipment_and_other_resources"
 *   "A/B"                                        → "ab"
 */

/** Anything that is not a letter, digit, underscore, whitespace or hyphen. */
const UNSAFE_CHARS = /[^\p{L}\p{N}_\s-]/gu;
const SEPARATOR_RUNS = /[-\s]+/g;

/** Strip unsafe characters first, then collapse hyphen/whitespace runs into one underscore. */
export function sanitizeFilename(name: string): string {
  return name
    .replace(UNSAFE_CHARS, '')
    .replace(SEPARATOR_RUNS, '_')
    .toLowerCase();
}
