import type { DocumentPair, PairingResult, UploadedDocument } from "@/types/comparison";

const UNSAFE_CHARACTERS = /[^A-Za-z0-9_.-]/g;

/**
 * Reduces an uploaded file name to a safe ASCII name: accents are folded,
 * path separators and whitespace runs become underscores, and anything
 * outside `[A-Za-z0-9_.-]` is dropped.
 */
export const secureFileName = (fileName: string): string =>
  fileName
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .replace(/[/\\]/g, " ")
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join("_")
    .replace(UNSAFE_CHARACTERS, "")
    .replace(/^[._]+|[._]+$/g, "");

export const fileStem = (fileName: string): string => {
  const safeName = secureFileName(fileName);
  const dot = safeName.lastIndexOf(".");
  return dot > 0 ? safeName.slice(0, dot) : safeName;
};

const indexByStem = (documents: UploadedDocument[]): Map<string, UploadedDocument> => {
  const byStem = new Map<string, UploadedDocument>();

  for (const document of documents) {
    const stem = fileStem(document.fileName);
    if (stem) {
      byStem.set(stem, document);
    }
  }

  return byStem;
};

export const pairDocuments = (
  sources: UploadedDocument[],
  renderings: UploadedDocument[],
): PairingResult => {
  const sourceByStem = indexByStem(sources);
  const renderingByStem = indexByStem(renderings);

  const pairs: DocumentPair[] = [];
  for (const [key, source] of sourceByStem) {
    const rendering = renderingByStem.get(key);
    if (rendering) {
      pairs.push({ key, source, rendering });
    }
  }
  pairs.sort((a, b) => a.key.localeCompare(b.key, undefined, { numeric: true }));

  return {
    pairs,
    unpaired: {
      source: sources
        .filter((document) => !renderingByStem.has(fileStem(document.fileName)))
        .map((document) => document.fileName),
      rendering: renderings
        .filter((document) => !sourceByStem.has(fileStem(document.fileName)))
        .map((document) => document.fileName),
    },
  };
};
