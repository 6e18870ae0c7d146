type MatchBlock = { aStart: number; bStart: number; size: number };

function longestCommonBlock(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): MatchBlock {
  let best: MatchBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) {
        continue;
      }
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

function countMatches(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): number {
  if (aLo >= aHi || bLo >= bHi) {
    return 0;
  }
  const block = longestCommonBlock(a, b, aLo, aHi, bLo, bHi);
  if (block.size === 0) {
    return 0;
  }
  return (
    block.size +
    countMatches(a, b, aLo, block.aStart, bLo, block.bStart) +
    countMatches(
      a,
      b,
      block.aStart + block.size,
      aHi,
      block.bStart + block.size,
      bHi,
    )
  );
}

/**
 * Ratcliff/Obershelp similarity: twice the number of matched characters over
 * the combined length. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatches(a, b, 0, a.length, 0, b.length)) / total;
}
