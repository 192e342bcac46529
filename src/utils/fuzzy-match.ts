/**
 * Fuzzy string matching using the Ratcliff/Obershelp "gestalt" ratio
 */

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi].
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string[],
  b: string[],
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;

      const size = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { i: i - size + 1, j: j - size + 1, size };
      }
    }
    runLengths = next;
  }

  return best;
}

/**
 * Number of characters covered by the recursive longest-block matching
 */
export function countMatchingCharacters(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);

  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, left.length, 0, right.length]];

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = findLongestMatch(left, right, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) {
      pending.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      pending.push([i + size, ahi, j + size, bhi]);
    }
  }

  return matched;
}

/**
 * Similarity in [0, 1]: 2 * matched / total length. Two empty strings score 1.
 */
export function similarityRatio(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}

/**
 * Cheap upper bound on similarityRatio, from the lengths alone
 */
export function maxPossibleRatio(a: string, b: string): number {
  const la = Array.from(a).length;
  const lb = Array.from(b).length;
  if (la + lb === 0) return 1;
  return (2 * Math.min(la, lb)) / (la + lb);
}

export interface CloseMatch {
  candidate: string;
  score: number;
}

/**
 * Best candidate scoring at least `cutoff`, or null.
 * Equal scores resolve to the lexicographically greater candidate.
 */
export function findCloseMatch(query: string, candidates: Iterable<string>, cutoff: number): CloseMatch | null {
  let best: CloseMatch | null = null;

  for (const candidate of candidates) {
    if (maxPossibleRatio(candidate, query) < cutoff) continue;

    const score = similarityRatio(candidate, query);
    if (score < cutoff) continue;

    if (!best || score > best.score || (score === best.score && candidate > best.candidate)) {
      best = { candidate, score };
    }
  }

  return best;
}
