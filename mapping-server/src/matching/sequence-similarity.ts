/**
 * Ratcliff/Obershelp sequence similarity.
 *
 * Finds the longest common block, then recurses into the unmatched text on each
 * side of it. The ratio is 2 * matched / (len(a) + len(b)). Ties between blocks of
 * equal length go to the earliest start in `a`, then the earliest start in `b`.
 * Strings are compared by code point.
 */

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function indexPositions(b: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((char, index) => {
    const list = positions.get(char);
    if (list) {
      list.push(index);
    } else {
      positions.set(char, [index]);
    }
  });
  return positions;
}

function findLongestBlock(
  a: readonly string[],
  positions: Map<string, number[]>,
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number
): Block {
  let best: Block = { aStart: aLow, bStart: bLow, size: 0 };
  // Length of the match ending at a[i - 1], b[j], keyed by j
  let runs = new Map<number, number>();

  for (let i = aLow; i < aHigh; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a[i] ?? '') ?? []) {
      if (j < bLow) continue;
      if (j >= bHigh) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runs = nextRuns;
  }

  return best;
}

/**
 * Total number of characters covered by the matching blocks of `a` and `b`.
 */
export function countMatchingCharacters(a: string, b: string): number {
  const aChars = Array.from(a);
  const bChars = Array.from(b);
  const positions = indexPositions(bChars);

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, aChars.length, 0, bChars.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLow, aHigh, bLow, bHigh] = next;
    const block = findLongestBlock(aChars, positions, aLow, aHigh, bLow, bHigh);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLow < block.aStart && bLow < block.bStart) {
      queue.push([aLow, block.aStart, bLow, block.bStart]);
    }
    if (block.aStart + block.size < aHigh && block.bStart + block.size < bHigh) {
      queue.push([block.aStart + block.size, aHigh, block.bStart + block.size, bHigh]);
    }
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}
