interface Match {
  readonly a: number;
  readonly b: number;
  readonly size: number;
}

function findLongestMatch(
  a: string,
  b: string,
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number,
): Match {
  let best: Match = { a: aLow, b: bLow, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = aLow; i < aHigh; i++) {
    const next = new Map<number, number>();
    for (let j = bLow; j < bHigh; j++) {
      if (a[i] !== b[j]) continue;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    runLengths = next;
  }

  return best;
}

/** Total size of the Ratcliff/Obershelp matching blocks between two strings. */
export function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLow, aHigh, bLow, bHigh] = range;
    const match = findLongestMatch(a, b, aLow, aHigh, bLow, bHigh);
    if (match.size === 0) continue;

    matched += match.size;
    if (aLow < match.a && bLow < match.b) {
      pending.push([aLow, match.a, bLow, match.b]);
    }
    if (match.a + match.size < aHigh && match.b + match.size < bHigh) {
      pending.push([match.a + match.size, aHigh, match.b + match.size, bHigh]);
    }
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1]: twice the matched characters over the combined
 * length. Two empty strings are identical. Not symmetric: blocks are anchored
 * in `a`, so pass the index key as `a` and the query as `b`.
 */
export function sequenceSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}
