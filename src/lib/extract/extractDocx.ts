import * as cheerio from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import JSZip from "jszip";
import { splitSentences } from "@/lib/extract/splitSentences";

const DOCUMENT_PART = "word/document.xml";

const RUN_CONTENT: Record<string, string> = {
  "w:tab": "\t",
  "w:ptab": "\t",
  "w:br": "\n",
  "w:cr": "\n",
  "w:noBreakHyphen": "-",
};

const elementChildren = (node: Element): Element[] => node.children.filter(isTag);

const textOf = (node: Element): string =>
  node.children.map((child: AnyNode) => (isText(child) ? child.data : "")).join("");

const runText = (run: Element): string =>
  elementChildren(run)
    .map((child) => (child.name === "w:t" ? textOf(child) : RUN_CONTENT[child.name] ?? ""))
    .join("");

const paragraphText = (paragraph: Element): string =>
  elementChildren(paragraph)
    .flatMap((child) => {
      if (child.name === "w:r") {
        return [child];
      }
      // Hyperlink text lives in runs nested one level down.
      return child.name === "w:hyperlink"
        ? elementChildren(child).filter((nested) => nested.name === "w:r")
        : [];
    })
    .map(runText)
    .join("");

/**
 * Top-level body paragraphs of a WordprocessingML part, blank ones dropped.
 * Table cells, headers and text boxes are not part of the body flow.
 */
export const readDocumentParagraphs = (documentXml: string): string[] => {
  const $ = cheerio.load(documentXml, { xml: true });

  return $("w\\:body")
    .first()
    .children("w\\:p")
    .toArray()
    .map(paragraphText)
    .filter((text) => text.trim().length > 0);
};

export const extractDocxText = async (data: Uint8Array): Promise<string> => {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new Error("File is not a readable .docx package.", { cause: error });
  }

  const documentEntry = zip.file(DOCUMENT_PART);
  if (!documentEntry) {
    throw new Error(`Package has no ${DOCUMENT_PART} part.`);
  }

  const documentXml = await documentEntry.async("string");
  return readDocumentParagraphs(documentXml).join("\n");
};

export const extractDocxSentences = async (data: Uint8Array): Promise<string[]> =>
  splitSentences(await extractDocxText(data));
