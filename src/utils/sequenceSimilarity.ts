/**
 * Ratcliff/Obershelp similarity: find the longest common block, recurse on
 * both sides of it, and score `2 * matched / (a.length + b.length)`.
 *
 * Characters of `b` that make up more than 1% of a long (200+) sequence are
 * treated as too common to seed a block, matching the usual "autojunk"
 * behaviour of this algorithm.
 */

type MatchingBlock = {
  aStart: number;
  bStart: number;
  size: number;
};

const AUTOJUNK_MIN_LENGTH = 200;

const buildPositionIndex = (b: string): Map<string, number[]> => {
  const positions = new Map<string, number[]>();
  for (let index = 0; index < b.length; index += 1) {
    const char = b[index];
    const existing = positions.get(char);
    if (existing) {
      existing.push(index);
    } else {
      positions.set(char, [index]);
    }
  }

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const popularLimit = Math.floor(b.length / 100) + 1;
    for (const [char, indices] of positions) {
      if (indices.length > popularLimit) {
        positions.delete(char);
      }
    }
  }

  return positions;
};

const findLongestMatch = (
  a: string,
  b: string,
  positions: Map<string, number[]>,
  bounds: { aLow: number; aHigh: number; bLow: number; bHigh: number },
): MatchingBlock => {
  const { aLow, aHigh, bLow, bHigh } = bounds;
  let bestA = aLow;
  let bestB = bLow;
  let bestSize = 0;
  let runLengths = new Map<number, number>();

  for (let i = aLow; i < aHigh; i += 1) {
    const nextRunLengths = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLow) continue;
      if (j >= bHigh) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }
    runLengths = nextRunLengths;
  }

  // Popular characters never seed a block but may still extend one.
  while (bestA > aLow && bestB > bLow && a[bestA - 1] === b[bestB - 1]) {
    bestA -= 1;
    bestB -= 1;
    bestSize += 1;
  }
  while (
    bestA + bestSize < aHigh &&
    bestB + bestSize < bHigh &&
    a[bestA + bestSize] === b[bestB + bestSize]
  ) {
    bestSize += 1;
  }

  return { aStart: bestA, bStart: bestB, size: bestSize };
};

export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
  const positions = buildPositionIndex(b);
  const pending = [{ aLow: 0, aHigh: a.length, bLow: 0, bHigh: b.length }];
  const blocks: MatchingBlock[] = [];

  while (pending.length > 0) {
    const bounds = pending.pop();
    if (!bounds) break;
    const block = findLongestMatch(a, b, positions, bounds);
    if (block.size === 0) continue;
    blocks.push(block);
    if (bounds.aLow < block.aStart && bounds.bLow < block.bStart) {
      pending.push({
        aLow: bounds.aLow,
        aHigh: block.aStart,
        bLow: bounds.bLow,
        bHigh: block.bStart,
      });
    }
    if (
      block.aStart + block.size < bounds.aHigh &&
      block.bStart + block.size < bounds.bHigh
    ) {
      pending.push({
        aLow: block.aStart + block.size,
        aHigh: bounds.aHigh,
        bLow: block.bStart + block.size,
        bHigh: bounds.bHigh,
      });
    }
  }

  return blocks.sort((left, right) => left.aStart - right.aStart);
}

/** Similarity ratio in [0, 1]; two empty strings score 1. */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matched = getMatchingBlocks(a, b).reduce(
    (sum, block) => sum + block.size,
    0,
  );
  return (2 * matched) / total;
}
