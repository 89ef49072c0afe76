import type { AlignedRow, DiffSpan, MarkupRow } from "@/types/comparison";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export const renderSpanMarkup = (span: DiffSpan): string =>
  span.kind === "equal"
    ? escapeHtml(span.text)
    : `<span class="${span.kind}">${escapeHtml(span.text)}</span>`;

export const renderSpansMarkup = (spans: DiffSpan[]): string =>
  spans.map(renderSpanMarkup).join(" ");

export const toMarkupRows = (rows: AlignedRow[]): MarkupRow[] =>
  rows.map((row) => ({
    leftMarkup: renderSpansMarkup(row.left),
    rightMarkup: renderSpansMarkup(row.right),
    isUnmatchedLeft: row.isUnmatchedLeft,
  }));
