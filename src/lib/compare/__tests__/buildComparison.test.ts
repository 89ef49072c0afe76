import JSZip from "jszip";
import { describe, it, expect } from "vitest";
import { ExtractionError } from "@/lib/errors";
import type { DocumentPair } from "@/types/comparison";
import { buildDocumentComparison, compareSentences, summarizeRows } from "../buildComparison";

const encode = (text: string) => new TextEncoder().encode(text);

const buildDocx = async (paragraphs: string[]): Promise<Uint8Array> => {
  const body = paragraphs.map((text) => `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`).join("");
  const zip = new JSZip();
  zip.file(
    "word/document.xml",
    `<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`,
  );
  return zip.generateAsync({ type: "uint8array" });
};

const buildPair = async (): Promise<DocumentPair> => ({
  key: "report",
  source: {
    fileName: "report.docx",
    data: await buildDocx(["Revenue was 3.0 million. Costs fell sharply."]),
  },
  rendering: {
    fileName: "report.html",
    data: encode("<p>Revenue was 3.00 million.</p><p>Zebra quilt jumps!</p>"),
  },
});

describe("summarizeRows", () => {
  it("counts rows by status and tokens of matched rows", () => {
    const { summary } = compareSentences(
      ["The cat sat.", "Revenue was 3.0 million.", "Costs fell sharply."],
      ["The cat sat.", "Revenue was 3.00 million.", "Zebra quilt jumps!"],
      0.3,
    );

    expect(summary).toEqual({
      totalRows: 4,
      matchedRows: 2,
      missingRows: 1,
      extraRows: 1,
      changedRows: 1,
      tokenCounts: {
        equal: 16,
        "case-diff": 0,
        "decimal-diff": 2,
        diff: 0,
        missing: 0,
        extra: 0,
      },
    });
  });

  it("reports zeros for no rows", () => {
    expect(summarizeRows([])).toEqual({
      totalRows: 0,
      matchedRows: 0,
      missingRows: 0,
      extraRows: 0,
      changedRows: 0,
      tokenCounts: {
        equal: 0,
        "case-diff": 0,
        "decimal-diff": 0,
        diff: 0,
        missing: 0,
        extra: 0,
      },
    });
  });

  it("counts an empty matched row as matched", () => {
    const summary = summarizeRows([
      { status: "matched", left: [], right: [], isUnmatchedLeft: false },
    ]);

    expect(summary.matchedRows).toBe(1);
    expect(summary.extraRows).toBe(0);
    expect(summary.changedRows).toBe(0);
  });
});

describe("buildDocumentComparison", () => {
  it("extracts, aligns and summarizes a document pair", async () => {
    const pair = await buildPair();
    const comparison = await buildDocumentComparison({
      pair,
      threshold: 0.3,
      expiresAtMs: Date.UTC(2030, 0, 1),
      id: "comparison-1",
    });

    expect(comparison).toMatchObject({
      id: "comparison-1",
      key: "report",
      sourceFileName: "report.docx",
      renderingFileName: "report.html",
      threshold: 0.3,
      sourceSentenceCount: 2,
      renderingSentenceCount: 2,
      expiresAt: "2030-01-01T00:00:00.000Z",
    });
    expect(comparison.rows.map((row) => row.status)).toEqual(["matched", "missing", "extra"]);
    expect(comparison.rows[1].left).toEqual([{ text: "Costs fell sharply.", kind: "missing" }]);
    expect(comparison.rows[2].right).toEqual([{ text: "Zebra quilt jumps!", kind: "extra" }]);
    expect(comparison.summary.tokenCounts["decimal-diff"]).toBe(2);
  });

  it("generates an id when none is given", async () => {
    const comparison = await buildDocumentComparison({
      pair: await buildPair(),
      threshold: 0.3,
      expiresAtMs: Date.now() + 1000,
    });

    expect(comparison.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("wraps extraction failures with the file and side", async () => {
    const pair = await buildPair();
    const broken: DocumentPair = {
      ...pair,
      source: { fileName: "report.docx", data: encode("not a zip") },
    };

    const result = buildDocumentComparison({ pair: broken, threshold: 0.3, expiresAtMs: 0 });

    await expect(result).rejects.toBeInstanceOf(ExtractionError);
    await expect(result).rejects.toMatchObject({
      fileName: "report.docx",
      side: "source",
      message: "Unable to read report.docx: File is not a readable .docx package.",
    });
  });
});
