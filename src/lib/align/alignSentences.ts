import type { AlignedRow } from "@/types/comparison";
import { InvalidConfigurationError } from "@/lib/errors";
import { similarityRatio } from "@/lib/align/similarity";
import { diffSentencePair } from "@/lib/align/tokenDiff";

export const DEFAULT_MATCH_THRESHOLD = 0.3;

export const assertValidThreshold = (threshold: number, setting = "threshold"): void => {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidConfigurationError(
      setting,
      `Match threshold must be a number between 0 and 1, received ${threshold}.`,
    );
  }
};

type BestCandidate = {
  index: number;
  score: number;
};

const findBestCandidate = (
  sentence: string,
  candidates: readonly string[],
  consumed: boolean[],
): BestCandidate | null => {
  let best: BestCandidate | null = null;

  for (let index = 0; index < candidates.length; index += 1) {
    if (consumed[index]) {
      continue;
    }

    const score = similarityRatio(sentence, candidates[index]);
    if (score > (best?.score ?? 0)) {
      best = { index, score };
    }
  }

  return best;
};

/**
 * Greedy, order-sensitive alignment of source sentences (`left`) against
 * rendered sentences (`right`). Each left sentence takes the most similar
 * right sentence still available, so swapping the inputs can change the
 * result. Rows follow `left` order; unmatched right sentences come last in
 * their own order.
 */
export const alignSentences = (
  left: readonly string[],
  right: readonly string[],
  threshold = DEFAULT_MATCH_THRESHOLD,
): AlignedRow[] => {
  assertValidThreshold(threshold);

  const consumed = new Array<boolean>(right.length).fill(false);
  const rows: AlignedRow[] = [];

  for (const sentence of left) {
    const best = findBestCandidate(sentence, right, consumed);

    if (best && best.score >= threshold) {
      consumed[best.index] = true;
      const { left: leftSpans, right: rightSpans } = diffSentencePair(
        sentence,
        right[best.index],
      );
      rows.push({
        status: "matched",
        left: leftSpans,
        right: rightSpans,
        isUnmatchedLeft: false,
      });
      continue;
    }

    rows.push({
      status: "missing",
      left: [{ text: sentence, kind: "missing" }],
      right: [],
      isUnmatchedLeft: true,
    });
  }

  right.forEach((sentence, index) => {
    if (!consumed[index]) {
      rows.push({
        status: "extra",
        left: [],
        right: [{ text: sentence, kind: "extra" }],
        isUnmatchedLeft: false,
      });
    }
  });

  return rows;
};

export const align = alignSentences;
