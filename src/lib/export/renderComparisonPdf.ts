import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import type { DiffSpan, DocumentComparison, TokenClass } from "@/types/comparison";

type Fonts = {
  regular: PDFFont;
  bold: PDFFont;
};

type PlacedWord = {
  text: string;
  kind: TokenClass;
  x: number;
  width: number;
};

type LayoutLine = PlacedWord[];

type RowLayout = {
  left: LayoutLine[];
  right: LayoutLine[];
};

const PAGE_WIDTH = 1000;
const PAGE_HEIGHT = 700;
const PAGE_MARGIN = 28;
const HEADER_HEIGHT = 58;
const COLUMN_GAP = 18;
const ROW_GAP = 8;
const FONT_SIZE = 10.5;
const LINE_HEIGHT = 15;

const COLUMN_WIDTH = (PAGE_WIDTH - PAGE_MARGIN * 2 - COLUMN_GAP) / 2;

const COLOR_TEXT = rgb(0.19, 0.24, 0.31);
const COLOR_MUTED = rgb(0.44, 0.5, 0.58);
const COLOR_BORDER = rgb(0.85, 0.89, 0.94);

const KIND_COLORS: Record<TokenClass, ReturnType<typeof rgb>> = {
  equal: COLOR_TEXT,
  "case-diff": rgb(0.71, 0.45, 0.03),
  "decimal-diff": rgb(0.11, 0.37, 0.75),
  diff: rgb(0.55, 0.16, 0.67),
  missing: rgb(0.74, 0.12, 0.12),
  extra: rgb(0.08, 0.5, 0.24),
};

const KIND_LABELS: Record<Exclude<TokenClass, "equal">, string> = {
  missing: "Missing",
  extra: "Extra",
  "case-diff": "Case difference",
  "decimal-diff": "Number format",
  diff: "Changed",
};

const fontFor = (kind: TokenClass, fonts: Fonts): PDFFont =>
  kind === "extra" ? fonts.bold : fonts.regular;

const characterSets = new WeakMap<PDFFont, Set<number>>();

const supportedCharacters = (font: PDFFont): Set<number> => {
  const cached = characterSets.get(font);
  if (cached) {
    return cached;
  }

  const created = new Set(font.getCharacterSet());
  characterSets.set(font, created);
  return created;
};

// Standard fonts only cover WinAnsi; anything else is shown as "?".
const toEncodable = (value: string, font: PDFFont): string => {
  const supported = supportedCharacters(font);
  return Array.from(value.replace(/\s+/g, " "))
    .map((char) => (supported.has(char.codePointAt(0) ?? 0) ? char : "?"))
    .join("");
};

const splitWords = (spans: DiffSpan[]): { text: string; kind: TokenClass }[] =>
  spans.flatMap((span) =>
    span.text
      .split(/\s+/)
      .filter((word) => word.length > 0)
      .map((word) => ({ text: word, kind: span.kind })),
  );

const layoutSpans = (spans: DiffSpan[], fonts: Fonts, maxWidth: number): LayoutLine[] => {
  const lines: LayoutLine[] = [];
  let current: LayoutLine = [];
  let cursorX = 0;
  const spaceWidth = fonts.regular.widthOfTextAtSize(" ", FONT_SIZE);

  for (const word of splitWords(spans)) {
    const font = fontFor(word.kind, fonts);
    const text = toEncodable(word.text, font);
    const width = font.widthOfTextAtSize(text, FONT_SIZE);
    const x = current.length === 0 ? 0 : cursorX + spaceWidth;

    if (current.length > 0 && x + width > maxWidth) {
      lines.push(current);
      current = [{ text, kind: word.kind, x: 0, width }];
      cursorX = width;
      continue;
    }

    current.push({ text, kind: word.kind, x, width });
    cursorX = x + width;
  }

  if (current.length > 0) {
    lines.push(current);
  }

  return lines;
};

const drawLine = (page: PDFPage, line: LayoutLine, originX: number, y: number, fonts: Fonts) => {
  for (const word of line) {
    const color = KIND_COLORS[word.kind];
    page.drawText(word.text, {
      x: originX + word.x,
      y,
      font: fontFor(word.kind, fonts),
      size: FONT_SIZE,
      color,
    });

    if (word.kind === "missing") {
      page.drawLine({
        start: { x: originX + word.x, y: y + FONT_SIZE * 0.35 },
        end: { x: originX + word.x + word.width, y: y + FONT_SIZE * 0.35 },
        thickness: 0.8,
        color,
      });
    } else if (word.kind !== "equal" && word.kind !== "extra") {
      page.drawLine({
        start: { x: originX + word.x, y: y - 2 },
        end: { x: originX + word.x + word.width, y: y - 2 },
        thickness: 0.7,
        color,
      });
    }
  }
};

const drawHeader = (
  page: PDFPage,
  comparison: DocumentComparison,
  fonts: Fonts,
  pageNumber: number,
) => {
  const top = PAGE_HEIGHT - PAGE_MARGIN;
  const title = pageNumber === 1 ? comparison.key : `${comparison.key} (cont. ${pageNumber})`;
  page.drawText(toEncodable(title, fonts.bold), {
    x: PAGE_MARGIN,
    y: top - 16,
    font: fonts.bold,
    size: 15,
    color: COLOR_TEXT,
  });
  page.drawText(
    toEncodable(
      `${comparison.sourceFileName} vs ${comparison.renderingFileName} - threshold ${comparison.threshold}`,
      fonts.regular,
    ),
    { x: PAGE_MARGIN, y: top - 32, font: fonts.regular, size: 9.5, color: COLOR_MUTED },
  );

  const legend = Object.values(KIND_LABELS).join("  |  ");
  page.drawText(legend, {
    x: PAGE_MARGIN,
    y: top - 46,
    font: fonts.regular,
    size: 8.5,
    color: COLOR_MUTED,
  });
  page.drawLine({
    start: { x: PAGE_MARGIN, y: top - HEADER_HEIGHT + 4 },
    end: { x: PAGE_WIDTH - PAGE_MARGIN, y: top - HEADER_HEIGHT + 4 },
    thickness: 0.8,
    color: COLOR_BORDER,
  });
};

/**
 * Two-column report: source sentences on the left, rendered sentences on
 * the right, one row per aligned pair. Rows taller than the remaining space
 * continue on the next page.
 */
export const renderComparisonPdfBuffer = async (
  comparison: DocumentComparison,
): Promise<Buffer> => {
  const output = await PDFDocument.create();
  output.setTitle(`${comparison.key} comparison report`);

  const [regular, bold] = await Promise.all([
    output.embedFont(StandardFonts.Helvetica),
    output.embedFont(StandardFonts.HelveticaBold),
  ]);
  const fonts: Fonts = { regular, bold };

  const layouts: RowLayout[] = comparison.rows.map((row) => ({
    left: layoutSpans(row.left, fonts, COLUMN_WIDTH),
    right: layoutSpans(row.right, fonts, COLUMN_WIDTH),
  }));

  const contentTop = PAGE_HEIGHT - PAGE_MARGIN - HEADER_HEIGHT - FONT_SIZE;
  let pageNumber = 1;
  let page = output.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  drawHeader(page, comparison, fonts, pageNumber);
  let cursorY = contentTop;

  const nextPage = () => {
    pageNumber += 1;
    page = output.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    drawHeader(page, comparison, fonts, pageNumber);
    cursorY = contentTop;
  };

  if (layouts.length === 0) {
    page.drawText("Neither document produced any sentences.", {
      x: PAGE_MARGIN,
      y: cursorY,
      font: fonts.regular,
      size: FONT_SIZE,
      color: COLOR_MUTED,
    });
  }

  for (const layout of layouts) {
    const lineCount = Math.max(layout.left.length, layout.right.length, 1);

    for (let lineIndex = 0; lineIndex < lineCount; lineIndex += 1) {
      if (cursorY < PAGE_MARGIN) {
        nextPage();
      }

      const leftLine = layout.left[lineIndex];
      const rightLine = layout.right[lineIndex];
      if (leftLine) {
        drawLine(page, leftLine, PAGE_MARGIN, cursorY, fonts);
      }
      if (rightLine) {
        drawLine(page, rightLine, PAGE_MARGIN + COLUMN_WIDTH + COLUMN_GAP, cursorY, fonts);
      }
      cursorY -= LINE_HEIGHT;
    }

    cursorY -= ROW_GAP;
  }

  const bytes = await output.save();
  return Buffer.from(bytes);
};
