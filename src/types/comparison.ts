export type TokenClass =
  | "equal"
  | "case-diff"
  | "decimal-diff"
  | "diff"
  | "missing"
  | "extra";

export type DiffSpan = {
  text: string;
  kind: TokenClass;
};

export type RowStatus = "matched" | "missing" | "extra";

/**
 * One row of the report: an aligned sentence pair, a source-only sentence
 * (`isUnmatchedLeft`), or a rendering-only sentence (empty `left`).
 */
export type AlignedRow = {
  status: RowStatus;
  left: DiffSpan[];
  right: DiffSpan[];
  isUnmatchedLeft: boolean;
};

export type MarkupRow = {
  leftMarkup: string;
  rightMarkup: string;
  isUnmatchedLeft: boolean;
};

export type DocumentSide = "source" | "rendering";

export type UploadedDocument = {
  fileName: string;
  data: Uint8Array;
};

export type DocumentPair = {
  key: string;
  source: UploadedDocument;
  rendering: UploadedDocument;
};

export type PairingResult = {
  pairs: DocumentPair[];
  unpaired: {
    source: string[];
    rendering: string[];
  };
};

export type ComparisonSummary = {
  totalRows: number;
  matchedRows: number;
  missingRows: number;
  extraRows: number;
  changedRows: number;
  tokenCounts: Record<TokenClass, number>;
};

export type DocumentComparison = {
  id: string;
  key: string;
  sourceFileName: string;
  renderingFileName: string;
  threshold: number;
  sourceSentenceCount: number;
  renderingSentenceCount: number;
  rows: AlignedRow[];
  summary: ComparisonSummary;
  generatedAt: string;
  expiresAt: string;
};

export type ComparisonLink = {
  name: string;
  comparisonId: string;
  url: string;
  summary: ComparisonSummary;
};

export type CompareResponse = {
  results: ComparisonLink[];
  unpaired: PairingResult["unpaired"];
};
