import { alignSentences } from "@/lib/align/alignSentences";
import { ExtractionError } from "@/lib/errors";
import { extractDocxSentences } from "@/lib/extract/extractDocx";
import { extractHtmlSentences } from "@/lib/extract/extractHtml";
import type {
  AlignedRow,
  ComparisonSummary,
  DocumentComparison,
  DocumentPair,
  DocumentSide,
  TokenClass,
  UploadedDocument,
} from "@/types/comparison";

type BuildDocumentComparisonInput = {
  pair: DocumentPair;
  threshold: number;
  expiresAtMs: number;
  id?: string;
};

const emptyTokenCounts = (): Record<TokenClass, number> => ({
  equal: 0,
  "case-diff": 0,
  "decimal-diff": 0,
  diff: 0,
  missing: 0,
  extra: 0,
});

export const summarizeRows = (rows: AlignedRow[]): ComparisonSummary => {
  const tokenCounts = emptyTokenCounts();
  let matchedRows = 0;
  let missingRows = 0;
  let extraRows = 0;
  let changedRows = 0;

  for (const row of rows) {
    if (row.status === "missing") {
      missingRows += 1;
      continue;
    }

    if (row.status === "extra") {
      extraRows += 1;
      continue;
    }

    matchedRows += 1;
    const spans = [...row.left, ...row.right];
    for (const span of spans) {
      tokenCounts[span.kind] += 1;
    }
    if (spans.some((span) => span.kind !== "equal")) {
      changedRows += 1;
    }
  }

  return {
    totalRows: rows.length,
    matchedRows,
    missingRows,
    extraRows,
    changedRows,
    tokenCounts,
  };
};

const decodeUtf8 = (data: Uint8Array): string => new TextDecoder("utf-8").decode(data);

const extractSide = async (
  document: UploadedDocument,
  side: DocumentSide,
): Promise<string[]> => {
  try {
    return side === "source"
      ? await extractDocxSentences(document.data)
      : extractHtmlSentences(decodeUtf8(document.data));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionError(
      document.fileName,
      side,
      `Unable to read ${document.fileName}: ${reason}`,
      { cause: error },
    );
  }
};

export const compareSentences = (
  sourceSentences: string[],
  renderingSentences: string[],
  threshold: number,
): { rows: AlignedRow[]; summary: ComparisonSummary } => {
  const rows = alignSentences(sourceSentences, renderingSentences, threshold);
  return { rows, summary: summarizeRows(rows) };
};

export const buildDocumentComparison = async ({
  pair,
  threshold,
  expiresAtMs,
  id = crypto.randomUUID(),
}: BuildDocumentComparisonInput): Promise<DocumentComparison> => {
  const [sourceSentences, renderingSentences] = await Promise.all([
    extractSide(pair.source, "source"),
    extractSide(pair.rendering, "rendering"),
  ]);

  const { rows, summary } = compareSentences(sourceSentences, renderingSentences, threshold);

  return {
    id,
    key: pair.key,
    sourceFileName: pair.source.fileName,
    renderingFileName: pair.rendering.fileName,
    threshold,
    sourceSentenceCount: sourceSentences.length,
    renderingSentenceCount: renderingSentences.length,
    rows,
    summary,
    generatedAt: new Date().toISOString(),
    expiresAt: new Date(expiresAtMs).toISOString(),
  };
};
