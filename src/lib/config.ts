import { DEFAULT_MATCH_THRESHOLD, assertValidThreshold } from "@/lib/align/alignSentences";
import { InvalidConfigurationError } from "@/lib/errors";

export type AppConfig = {
  matchThreshold: number;
  comparisonTtlMs: number;
  maxUploadBytes: number;
};

const DEFAULT_TTL_MINUTES = 120;
const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

type Env = Record<string, string | undefined>;

const readNumber = (env: Env, name: string, fallback: number): number => {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigurationError(name, `${name} must be a number, received "${raw}".`);
  }

  return value;
};

const readPositive = (env: Env, name: string, fallback: number): number => {
  const value = readNumber(env, name, fallback);
  if (value <= 0) {
    throw new InvalidConfigurationError(name, `${name} must be greater than 0, received ${value}.`);
  }

  return value;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const matchThreshold = readNumber(env, "MATCH_THRESHOLD", DEFAULT_MATCH_THRESHOLD);
  assertValidThreshold(matchThreshold, "MATCH_THRESHOLD");

  return {
    matchThreshold,
    comparisonTtlMs: readPositive(env, "COMPARISON_TTL_MINUTES", DEFAULT_TTL_MINUTES) * 60 * 1000,
    maxUploadBytes: Math.floor(readPositive(env, "MAX_UPLOAD_BYTES", DEFAULT_MAX_UPLOAD_BYTES)),
  };
};

let cachedConfig: AppConfig | null = null;

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }

  return cachedConfig;
};

export const resetConfigCache = (): void => {
  cachedConfig = null;
};

/**
 * Threshold from a form field, falling back to the configured default when
 * the field is absent or blank.
 */
export const parseThreshold = (raw: string | null | undefined, fallback: number): number => {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return fallback;
  }

  const value = Number(trimmed);
  assertValidThreshold(value);
  return value;
};
