/**
 * String and set similarity measures for the scene matcher.
 *
 * `sequenceRatio` is the Ratcliff/Obershelp "gestalt" ratio: twice the
 * number of characters in recursively found longest common blocks, over the
 * total length. Long second strings (200+ chars) ignore characters that
 * occur in more than 1% of positions when seeding blocks, as the classic
 * implementation does.
 */

const AUTOJUNK_MIN_LENGTH = 200;

interface Block {
  i: number;
  j: number;
  size: number;
}

function indexPositions(b: readonly string[]): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const list = b2j.get(ch);
    if (list) list.push(j);
    else b2j.set(ch, [j]);
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of [...b2j]) {
      if (list.length > limit) b2j.delete(ch);
    }
  }
  return b2j;
}

function longestMatch(
  a: readonly string[],
  b: readonly string[],
  b2j: Map<string, number[]>,
  alo: number, ahi: number, blo: number, bhi: number,
): Block {
  let besti = alo;
  let bestj = blo;
  let bestSize = 0;
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    const ch = a[i];
    for (const j of (ch === undefined ? undefined : b2j.get(ch)) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestSize = k;
      }
    }
    runs = next;
  }

  // Seeding skipped popular characters; grow the block through them.
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--;
    bestj--;
    bestSize++;
  }
  while (besti + bestSize < ahi && bestj + bestSize < bhi && a[besti + bestSize] === b[bestj + bestSize]) {
    bestSize++;
  }
  return { i: besti, j: bestj, size: bestSize };
}

/** Total size of all matching blocks between `a` and `b`. */
function matchedLength(a: readonly string[], b: readonly string[]): number {
  const b2j = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  for (let range = queue.pop(); range !== undefined; range = queue.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, b, b2j, alo, ahi, blo, bhi);
    if (size === 0) continue;
    total += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }
  return total;
}

/** Similarity in [0, 1]; 1 for two empty strings. Compares code points. */
export function sequenceRatio(left: string, right: string): number {
  const a = Array.from(left);
  const b = Array.from(right);
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchedLength(a, b)) / length;
}

/** |A ∩ B| / |A ∪ B|; 0 when both are empty. */
export function jaccard<T>(left: ReadonlySet<T>, right: ReadonlySet<T>): number {
  let shared = 0;
  for (const item of left) if (right.has(item)) shared++;
  const union = left.size + right.size - shared;
  return union === 0 ? 0 : shared / union;
}
