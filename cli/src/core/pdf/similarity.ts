/**
 * Character-run similarity (Ratcliff/Obershelp).
 *
 * Finds the longest common contiguous block, then recurses on the pieces to
 * its left and right. The score is 2·M / T, where M is the total size of all
 * blocks found and T the combined length of both strings. Small insertions
 * (stray page numbers, doubled spaces, OCR noise) only cost their own length,
 * which exact or substring matching cannot tolerate.
 *
 * Strings are compared by code point, not UTF-16 unit.
 */

/** `[aStart, bStart, size]`: `a[aStart, aStart+size)` equals `b[bStart, bStart+size)`. */
export type MatchingBlock = readonly [number, number, number];

type IndexMap = Map<string, number[]>;

/** Similarity ratio in [0, 1]. Both strings empty → 1; exactly one empty → 0. */
export function similarity(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 1;

  let matched = 0;
  for (const [, , size] of blocksFor(left, right)) matched += size;
  return (2 * matched) / total;
}

/**
 * Matching blocks in increasing order, adjacent blocks merged.
 * The last entry is always the sentinel `[|a|, |b|, 0]`.
 */
export function matchingBlocks(a: string, b: string): MatchingBlock[] {
  const left = Array.from(a);
  const right = Array.from(b);
  return [...blocksFor(left, right), [left.length, right.length, 0]];
}

// ── Internals ────────────────────────────────────────────────

function blocksFor(a: string[], b: string[]): MatchingBlock[] {
  const b2j = indexPositions(b);
  const found: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const block = findLongestMatch(a, b, b2j, alo, ahi, blo, bhi);
    const [i, j, k] = block;
    if (k === 0) continue;

    found.push(block);
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + k < ahi && j + k < bhi) queue.push([i + k, ahi, j + k, bhi]);
  }

  found.sort((x, y) => x[0] - y[0] || x[1] - y[1] || x[2] - y[2]);
  return mergeAdjacent(found);
}

/** Character → ascending positions in `b`. */
function indexPositions(b: string[]): IndexMap {
  const positions: IndexMap = new Map();
  b.forEach((ch, j) => {
    const list = positions.get(ch);
    if (list) {
      list.push(j);
    } else {
      positions.set(ch, [j]);
    }
  });
  return positions;
}

/**
 * Longest block in `a[alo, ahi)` × `b[blo, bhi)`.
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string[],
  b: string[],
  b2j: IndexMap,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  // j → length of the match ending at a[i-1], b[j]
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    runs = nextRuns;
  }

  return [bestI, bestJ, bestSize];
}

function mergeAdjacent(blocks: MatchingBlock[]): MatchingBlock[] {
  const merged: MatchingBlock[] = [];
  let [i1, j1, k1] = [0, 0, 0];

  for (const [i2, j2, k2] of blocks) {
    if (i1 + k1 === i2 && j1 + k1 === j2) {
      k1 += k2;
    } else {
      if (k1 > 0) merged.push([i1, j1, k1]);
      [i1, j1, k1] = [i2, j2, k2];
    }
  }
  if (k1 > 0) merged.push([i1, j1, k1]);

  return merged;
}
