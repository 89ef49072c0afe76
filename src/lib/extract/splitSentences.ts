const SENTENCE_BOUNDARY_REGEX = /(?<=[.!?])\s+(?=[A-Z])/;

export const splitSentences = (text: string): string[] =>
  text
    .split(SENTENCE_BOUNDARY_REGEX)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
