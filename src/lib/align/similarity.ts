export type MatchingBlock = {
  leftStart: number;
  rightStart: number;
  size: number;
};

type SearchRange = {
  leftLow: number;
  leftHigh: number;
  rightLow: number;
  rightHigh: number;
};

const POPULAR_MIN_LENGTH = 200;

/**
 * Positions of every character of `right`. On long strings, characters
 * making up more than about 1% of the text are dropped so they never seed a
 * match on their own.
 */
const indexCharacters = (right: string[]): Map<string, number[]> => {
  const positions = new Map<string, number[]>();

  right.forEach((char, index) => {
    const list = positions.get(char);
    if (list) {
      list.push(index);
    } else {
      positions.set(char, [index]);
    }
  });

  if (right.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(right.length / 100) + 1;
    for (const [char, list] of [...positions.entries()]) {
      if (list.length > limit) {
        positions.delete(char);
      }
    }
  }

  return positions;
};

const findLongestMatch = (
  left: string[],
  right: string[],
  positions: Map<string, number[]>,
  { leftLow, leftHigh, rightLow, rightHigh }: SearchRange,
): MatchingBlock => {
  let bestLeft = leftLow;
  let bestRight = rightLow;
  let bestSize = 0;
  let runLengths = new Map<number, number>();

  for (let i = leftLow; i < leftHigh; i += 1) {
    const nextRunLengths = new Map<number, number>();

    for (const j of positions.get(left[i]) ?? []) {
      if (j < rightLow) {
        continue;
      }
      if (j >= rightHigh) {
        break;
      }

      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > bestSize) {
        bestLeft = i - size + 1;
        bestRight = j - size + 1;
        bestSize = size;
      }
    }

    runLengths = nextRunLengths;
  }

  // Characters left out of the index can still widen a block at its edges.
  while (
    bestLeft > leftLow &&
    bestRight > rightLow &&
    left[bestLeft - 1] === right[bestRight - 1]
  ) {
    bestLeft -= 1;
    bestRight -= 1;
    bestSize += 1;
  }

  while (
    bestLeft + bestSize < leftHigh &&
    bestRight + bestSize < rightHigh &&
    left[bestLeft + bestSize] === right[bestRight + bestSize]
  ) {
    bestSize += 1;
  }

  return { leftStart: bestLeft, rightStart: bestRight, size: bestSize };
};

export const findMatchingBlocks = (leftText: string, rightText: string): MatchingBlock[] => {
  const left = Array.from(leftText);
  const right = Array.from(rightText);
  const positions = indexCharacters(right);
  const blocks: MatchingBlock[] = [];
  const queue: SearchRange[] = [
    { leftLow: 0, leftHigh: left.length, rightLow: 0, rightHigh: right.length },
  ];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) {
      break;
    }

    const block = findLongestMatch(left, right, positions, range);
    if (block.size === 0) {
      continue;
    }

    blocks.push(block);
    if (range.leftLow < block.leftStart && range.rightLow < block.rightStart) {
      queue.push({
        leftLow: range.leftLow,
        leftHigh: block.leftStart,
        rightLow: range.rightLow,
        rightHigh: block.rightStart,
      });
    }
    if (
      block.leftStart + block.size < range.leftHigh &&
      block.rightStart + block.size < range.rightHigh
    ) {
      queue.push({
        leftLow: block.leftStart + block.size,
        leftHigh: range.leftHigh,
        rightLow: block.rightStart + block.size,
        rightHigh: range.rightHigh,
      });
    }
  }

  return blocks.sort(
    (a, b) => a.leftStart - b.leftStart || a.rightStart - b.rightStart,
  );
};

/**
 * `2 * M / T`: M is the number of characters covered by matching blocks and
 * T the combined length of both strings. Two empty strings score 1.
 */
export const similarityRatio = (leftText: string, rightText: string): number => {
  const total = Array.from(leftText).length + Array.from(rightText).length;
  if (total === 0) {
    return 1;
  }

  const matched = findMatchingBlocks(leftText, rightText).reduce(
    (sum, block) => sum + block.size,
    0,
  );

  return (2 * matched) / total;
};
