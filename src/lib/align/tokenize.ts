const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;

// A word run starts on a word boundary and may carry internal periods
// ("3.00", "U.S"), but always ends on a word character.
const TOKEN_REGEX = new RegExp(
  String.raw`(?<!${WORD_CHAR})${WORD_CHAR}+[.\p{L}\p{N}_]*(?<=${WORD_CHAR})|[^\p{L}\p{N}_\s]`,
  "gu",
);

export const tokenizeSentence = (sentence: string): string[] =>
  Array.from(sentence.matchAll(TOKEN_REGEX), (match) => match[0]);
