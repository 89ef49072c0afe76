import type { DocumentSide } from "@/types/comparison";

export class InvalidConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.setting = setting;
  }
}

/**
 * Raised when text cannot be pulled out of an uploaded document. Kept apart
 * from configuration errors so callers can report a bad upload as such.
 */
export class ExtractionError extends Error {
  readonly fileName: string;
  readonly side: DocumentSide;

  constructor(fileName: string, side: DocumentSide, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
    this.fileName = fileName;
    this.side = side;
  }
}

export const isInvalidConfigurationError = (
  error: unknown,
): error is InvalidConfigurationError => error instanceof InvalidConfigurationError;

export const isExtractionError = (error: unknown): error is ExtractionError =>
  error instanceof ExtractionError;
