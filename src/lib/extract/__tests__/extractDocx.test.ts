import JSZip from "jszip";
import { describe, it, expect } from "vitest";
import { extractDocxSentences, extractDocxText, readDocumentParagraphs } from "../extractDocx";

const WORD_NAMESPACE = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

const documentXml = (body: string) =>
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<w:document xmlns:w="${WORD_NAMESPACE}"><w:body>${body}<w:sectPr/></w:body></w:document>`;

const buildDocx = async (body: string | null): Promise<Uint8Array> => {
  const zip = new JSZip();
  zip.file("[Content_Types].xml", "<Types/>");
  if (body !== null) {
    zip.file("word/document.xml", documentXml(body));
  }
  return zip.generateAsync({ type: "uint8array" });
};

const BODY = [
  `<w:p><w:r><w:t xml:space="preserve">Revenue was </w:t></w:r><w:r><w:rPr><w:b/></w:rPr><w:t>3.0</w:t></w:r><w:r><w:t xml:space="preserve"> million.</w:t></w:r></w:p>`,
  `<w:p/>`,
  `<w:p><w:r><w:t xml:space="preserve">   </w:t></w:r></w:p>`,
  `<w:p><w:hyperlink><w:r><w:t>Click here</w:t></w:r></w:hyperlink><w:r><w:tab/><w:t>now.</w:t></w:r></w:p>`,
  `<w:tbl><w:tr><w:tc><w:p><w:r><w:t>Cell text.</w:t></w:r></w:p></w:tc></w:tr></w:tbl>`,
  `<w:p><w:r><w:t>Line one</w:t><w:br/><w:t>Line two &amp; co.</w:t></w:r></w:p>`,
].join("");

describe("readDocumentParagraphs", () => {
  it("reads body paragraphs and skips blank ones and tables", () => {
    expect(readDocumentParagraphs(documentXml(BODY))).toEqual([
      "Revenue was 3.0 million.",
      "Click here\tnow.",
      "Line one\nLine two & co.",
    ]);
  });
});

describe("extractDocxText", () => {
  it("joins paragraphs with newlines", async () => {
    const data = await buildDocx(BODY);
    await expect(extractDocxText(data)).resolves.toBe(
      "Revenue was 3.0 million.\nClick here\tnow.\nLine one\nLine two & co.",
    );
  });

  it("rejects data that is not a zip package", async () => {
    await expect(extractDocxText(new TextEncoder().encode("plain text"))).rejects.toThrow(
      "File is not a readable .docx package.",
    );
  });

  it("rejects a package without a main document part", async () => {
    const data = await buildDocx(null);
    await expect(extractDocxText(data)).rejects.toThrow(
      "Package has no word/document.xml part.",
    );
  });
});

describe("extractDocxSentences", () => {
  it("splits the document text into sentences", async () => {
    const data = await buildDocx(BODY);
    await expect(extractDocxSentences(data)).resolves.toEqual([
      "Revenue was 3.0 million.",
      "Click here\tnow.",
      "Line one\nLine two & co.",
    ]);
  });

  it("returns no sentences for an empty body", async () => {
    const data = await buildDocx("");
    await expect(extractDocxSentences(data)).resolves.toEqual([]);
  });
});
