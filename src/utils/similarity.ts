/**
 * Ratcliff/Obershelp similarity: twice the number of matched characters
 * divided by the combined length. Matching blocks are found by taking the
 * longest common substring (earliest in `a`, then earliest in `b`) and
 * recursing on both sides of it.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchedLength(a, b, indexPositions(b))) / total;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) list.push(j);
    else positions.set(ch, [j]);
  }
  return positions;
}

interface Block {
  i: number;
  j: number;
  size: number;
}

function longestMatch(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let runs = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { i: i - k + 1, j: j - k + 1, size: k };
      }
    }
    runs = next;
  }
  return best;
}

function matchedLength(a: string, b: string, positions: Map<string, number[]>): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (size === 0) continue;
    matched += size;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
  }
  return matched;
}
