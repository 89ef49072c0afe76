import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import { splitSentences } from "@/lib/extract/splitSentences";

const HIDDEN_SELECTORS = ["script", "style", "noscript", "header", "footer", "nav"];

const collectTextNodes = (nodes: AnyNode[], output: string[]): string[] => {
  for (const node of nodes) {
    if (isText(node)) {
      output.push(node.data);
    } else if (hasChildren(node)) {
      collectTextNodes(node.children, output);
    }
  }

  return output;
};

/**
 * Visible text of a page, one line per text node, with page chrome removed.
 */
export const extractVisibleText = (html: string): string => {
  const $ = cheerio.load(html);
  $(HIDDEN_SELECTORS.join(", ")).remove();

  return collectTextNodes($.root().toArray(), [])
    .join("\n")
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(" ");
};

export const extractHtmlSentences = (html: string): string[] =>
  splitSentences(extractVisibleText(html));
