import type { DiffSpan, TokenClass } from "@/types/comparison";
import { numericallyEqual } from "@/lib/align/normalizeNumber";
import { tokenizeSentence } from "@/lib/align/tokenize";

export type TokenDiff = {
  left: DiffSpan[];
  right: DiffSpan[];
};

export const classifyTokenPair = (left: string, right: string): TokenClass => {
  if (left === right) {
    return "equal";
  }

  if (left.toLowerCase() === right.toLowerCase()) {
    return "case-diff";
  }

  if (numericallyEqual(left, right)) {
    return "decimal-diff";
  }

  return "diff";
};

/**
 * Compares tokens index by index. There is no insertion or deletion
 * recovery: a token dropped early in a sentence shifts every later position.
 */
export const diffTokens = (leftTokens: string[], rightTokens: string[]): TokenDiff => {
  const left: DiffSpan[] = [];
  const right: DiffSpan[] = [];
  const length = Math.max(leftTokens.length, rightTokens.length);

  for (let index = 0; index < length; index += 1) {
    if (index >= leftTokens.length) {
      right.push({ text: rightTokens[index], kind: "extra" });
      continue;
    }

    if (index >= rightTokens.length) {
      left.push({ text: leftTokens[index], kind: "missing" });
      continue;
    }

    const kind = classifyTokenPair(leftTokens[index], rightTokens[index]);
    left.push({ text: leftTokens[index], kind });
    right.push({ text: rightTokens[index], kind });
  }

  return { left, right };
};

export const diffSentencePair = (leftSentence: string, rightSentence: string): TokenDiff =>
  diffTokens(tokenizeSentence(leftSentence), tokenizeSentence(rightSentence));
