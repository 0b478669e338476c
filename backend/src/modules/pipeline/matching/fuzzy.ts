/**
 * Token-sort similarity: order-insensitive, case-insensitive, punctuation-insensitive.
 * Score is 0..100 (not rounded): 2 * LCS / (len(a) + len(b)) * 100 over the sorted-token strings.
 */

function sortedTokens(s: string): string[] {
  const tokens = s
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .split(" ")
    .filter((t) => t !== "");
  tokens.sort();
  return [...tokens.join(" ")];
}

function lcsLength(a: string[], b: string[]): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? (prev[j - 1] ?? 0) + 1 : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    [prev, curr] = [curr, prev];
    curr.fill(0);
  }
  return prev[b.length] ?? 0;
}

export function tokenSortRatio(a: string, b: string): number {
  const left = sortedTokens(a);
  const right = sortedTokens(b);
  if (left.length === 0 || right.length === 0) return 0;
  return ((2 * lcsLength(left, right)) / (left.length + right.length)) * 100;
}

export type FuzzyMatch<T> = { candidate: T; score: number };

/** Highest-scoring candidate at or above `threshold`; the first one wins a tie. */
export function bestMatch<T>(
  query: string,
  candidates: readonly T[],
  key: (candidate: T) => string,
  threshold = 80,
): FuzzyMatch<T> | null {
  let best: FuzzyMatch<T> | null = null;
  for (const candidate of candidates) {
    const score = tokenSortRatio(query, key(candidate));
    if (score < threshold) continue;
    if (best == null || score > best.score) best = { candidate, score };
  }
  return best;
}
