/** Keywords shorter than this (spaces removed) never get a fuzzy score. */
export const MIN_FUZZY_KEYWORD_LENGTH = 3;

/** Shortest shared run of characters that counts as part of the keyword being present. */
export const MIN_SEGMENT_LENGTH = 3;

const SEGMENT_COVERAGE_WEIGHT = 0.8;
const UNRELATED_FUZZY_CEILING = 0.6;
const UNRELATED_FUZZY_DAMPING = 0.3;

/** Lower-cased with every whitespace run removed; used for comparison only. */
export function compact(text: string): string {
  return text.toLowerCase().replace(/\s+/g, '');
}

type Range = [aLo: number, aHi: number, bLo: number, bHi: number];

function longestMatch(a: string[], b2j: Map<string, number[]>, [aLo, aHi, bLo, bHi]: Range): [number, number, number] {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;
  let lengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    lengths = next;
  }

  return [bestI, bestJ, bestSize];
}

/** Sizes of the Ratcliff/Obershelp matching blocks between `a` and `b`. */
function matchingBlockSizes(a: string[], b: string[]): number[] {
  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = b2j.get(ch);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(ch, [j]);
    }
  });

  const sizes: number[] = [];
  const pending: Range[] = [[0, a.length, 0, b.length]];
  for (let range = pending.pop(); range; range = pending.pop()) {
    const [aLo, aHi, bLo, bHi] = range;
    const [i, j, size] = longestMatch(a, b2j, range);
    if (size === 0) continue;

    sizes.push(size);
    if (aLo < i && bLo < j) pending.push([aLo, i, bLo, j]);
    if (i + size < aHi && j + size < bHi) pending.push([i + size, aHi, j + size, bHi]);
  }
  return sizes;
}

function ratioOf(matched: number, total: number): number {
  return total === 0 ? 1 : (2 * matched) / total;
}

/**
 * Ratcliff/Obershelp similarity: twice the number of characters in matching
 * blocks over the combined length, the same ratio difflib reports.
 */
export function sequenceRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const matched = matchingBlockSizes(left, right).reduce((sum, size) => sum + size, 0);
  return ratioOf(matched, left.length + right.length);
}

/**
 * How strongly `text` contains `keyword`, in [0, 1]. Both sides are compared
 * with whitespace removed, so "백엔드개발자" and "백엔드 개발자" score the same
 * against any text.
 */
export function keywordSimilarity(text: string, keyword: string): number {
  const packedText = compact(text);
  const packedKeyword = compact(keyword);
  if (!packedText || !packedKeyword) return 0;
  if (packedText.includes(packedKeyword)) return 1;

  const textChars = Array.from(packedText);
  const keywordChars = Array.from(packedKeyword);
  if (keywordChars.length < MIN_FUZZY_KEYWORD_LENGTH) return 0;

  const blocks = matchingBlockSizes(textChars, keywordChars);
  const covered = blocks
    .filter(size => size >= MIN_SEGMENT_LENGTH)
    .reduce((sum, size) => sum + size, 0);
  const coverage = (covered / keywordChars.length) * SEGMENT_COVERAGE_WEIGHT;

  let fuzzy = ratioOf(blocks.reduce((sum, size) => sum + size, 0), textChars.length + keywordChars.length);
  // nothing word-sized in common: a shared suffix like 엔드 is not a match
  if (covered === 0 && fuzzy < UNRELATED_FUZZY_CEILING) {
    fuzzy *= UNRELATED_FUZZY_DAMPING;
  }

  return Math.min(Math.max(coverage, fuzzy), 1);
}
