/**
 * Fuzzy string similarity
 *
 * Normalized indel-distance ratios on a 0-100 scale. tokenSortRatio ignores
 * case, punctuation and token order.
 *
 * @module fuzzy
 */

/**
 * Lowercase, replace anything that is not a letter or digit with a space,
 * collapse whitespace
 */
export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Length of the longest common subsequence (two-row DP)
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  // Keep the shorter string on the inner loop
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let previous = new Uint32Array(inner.length + 1);
  let current = new Uint32Array(inner.length + 1);

  for (let i = 1; i <= outer.length; i++) {
    const ch = outer.charCodeAt(i - 1);
    for (let j = 1; j <= inner.length; j++) {
      if (ch === inner.charCodeAt(j - 1)) {
        current[j] = (previous[j - 1] ?? 0) + 1;
      } else {
        current[j] = Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
      }
    }
    [previous, current] = [current, previous];
    current.fill(0);
  }

  return previous[inner.length] ?? 0;
}

/**
 * 100 * (1 - indel / (len(a) + len(b))), where indel counts insertions and
 * deletions needed to turn a into b. Two empty strings score 0.
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 0;
  }
  const indel = total - 2 * longestCommonSubsequence(a, b);
  return Math.round(100 * (1 - indel / total));
}

/**
 * Sort whitespace-separated tokens of the normalized text
 */
export function sortTokens(text: string): string {
  const normalized = normalizeForMatch(text);
  if (normalized.length === 0) {
    return '';
  }
  return normalized.split(/\s+/).sort().join(' ');
}

/**
 * Ratio of the token-sorted, normalized strings
 *
 * @example tokenSortRatio('git st', 'git status') === 75
 */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}
