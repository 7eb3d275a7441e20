interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

// Longest common run inside a[alo, ahi) and b[blo, bhi); ties go to the earliest in `a`, then in `b`.
function longestMatch(
  a: readonly string[],
  positions: ReadonlyMap<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i += 1) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    runs = next;
  }
  return best;
}

/** Total length of the recursively found common runs, as Python's difflib counts them (no junk heuristic). */
export function matchingCharacters(s1: string, s2: string): number {
  const a = Array.from(s1);
  const b = Array.from(s2);
  const positions = new Map<string, number[]>();
  b.forEach((char, index) => {
    const list = positions.get(char);
    if (list) {
      list.push(index);
    } else {
      positions.set(char, [index]);
    }
  });

  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  for (let range = pending.pop(); range; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const block = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (block.size === 0) continue;
    matched += block.size;
    if (alo < block.a && blo < block.b) {
      pending.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      pending.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }
  return matched;
}

/** `2 * M / T` over code points: 1.0 for identical strings, 0.0 for nothing in common. */
export function calculateSimilarity(s1: string, s2: string): number {
  const total = Array.from(s1).length + Array.from(s2).length;
  if (total === 0) {
    return 1.0;
  }
  return (2 * matchingCharacters(s1, s2)) / total;
}
