const DIGITS = String.raw`\p{Nd}(?:_?\p{Nd})*`;

const DECIMAL_LITERAL_REGEX = new RegExp(
  String.raw`^[+-]?(?:${DIGITS}(?:\.(?:${DIGITS})?)?|\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`,
  "u",
);

const DECIMAL_DIGIT_REGEX = /\p{Nd}/u;
const NON_ASCII_DIGIT_REGEX = /(?![0-9])\p{Nd}/gu;

// Decimal digit blocks are runs of ten starting at zero, some back to back.
const digitValue = (char: string): string => {
  const codePoint = char.codePointAt(0) ?? 0;
  let start = codePoint;
  while (DECIMAL_DIGIT_REGEX.test(String.fromCodePoint(start - 1))) {
    start -= 1;
  }
  return String((codePoint - start) % 10);
};

const toAsciiDigits = (token: string): string =>
  token.replace(NON_ASCII_DIGIT_REGEX, digitValue);

const SPECIAL_LITERAL_REGEX = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Reads a token as a decimal floating point literal. Returns `null` when the
 * token is not one, so formatting variants like "3.0" and "3.00" compare
 * equal while "3.0.1" never does. Digits of any script are accepted.
 */
export const normalizeNumber = (token: string): number | null => {
  if (DECIMAL_LITERAL_REGEX.test(token)) {
    return Number(toAsciiDigits(token).replace(/_/g, ""));
  }

  const special = SPECIAL_LITERAL_REGEX.exec(token);
  if (!special) {
    return null;
  }

  if (special[2].toLowerCase() === "nan") {
    return Number.NaN;
  }

  return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
};

export const numericallyEqual = (a: string, b: string): boolean => {
  const left = normalizeNumber(a);
  const right = normalizeNumber(b);
  return left !== null && right !== null && left === right;
};
