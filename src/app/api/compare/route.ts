import { NextResponse } from "next/server";
import { buildDocumentComparison } from "@/lib/compare/buildComparison";
import { pairDocuments } from "@/lib/compare/pairDocuments";
import { getConfig, parseThreshold } from "@/lib/config";
import { isExtractionError, isInvalidConfigurationError } from "@/lib/errors";
import { getExpiryMs, saveComparison } from "@/lib/store/comparisonStore";
import type { CompareResponse, UploadedDocument } from "@/types/comparison";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const maxDuration = 60;

const asUploadedDocument = async (file: File): Promise<UploadedDocument> => ({
  fileName: file.name,
  data: new Uint8Array(await file.arrayBuffer()),
});

const readFiles = (formData: FormData, field: string): File[] =>
  formData.getAll(field).filter((entry): entry is File => entry instanceof File && entry.size > 0);

const methodNotAllowedResponse = () =>
  NextResponse.json(
    { error: "Method not allowed. Use POST /api/compare with docxFiles and htmlFiles." },
    {
      status: 405,
      headers: { Allow: "POST, OPTIONS" },
    },
  );

export async function GET() {
  return methodNotAllowedResponse();
}

export async function OPTIONS() {
  return new NextResponse(null, {
    status: 204,
    headers: {
      Allow: "POST, OPTIONS",
      "Access-Control-Allow-Methods": "POST, OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type",
    },
  });
}

export async function POST(request: Request) {
  try {
    const config = getConfig();
    const formData = await request.formData();
    const docxFiles = readFiles(formData, "docxFiles");
    const htmlFiles = readFiles(formData, "htmlFiles");

    if (docxFiles.length === 0 || htmlFiles.length === 0) {
      return NextResponse.json(
        { error: "At least one .docx file and one .html file are required." },
        { status: 400 },
      );
    }

    const oversized = [...docxFiles, ...htmlFiles].find((file) => file.size > config.maxUploadBytes);
    if (oversized) {
      return NextResponse.json(
        { error: `${oversized.name} exceeds the ${config.maxUploadBytes} byte upload limit.` },
        { status: 413 },
      );
    }

    const thresholdField = formData.get("threshold");
    const threshold = parseThreshold(
      typeof thresholdField === "string" ? thresholdField : null,
      config.matchThreshold,
    );

    const [sources, renderings] = await Promise.all([
      Promise.all(docxFiles.map(asUploadedDocument)),
      Promise.all(htmlFiles.map(asUploadedDocument)),
    ]);
    const { pairs, unpaired } = pairDocuments(sources, renderings);

    if (pairs.length === 0) {
      return NextResponse.json(
        { error: "No .docx and .html files share a file name.", unpaired },
        { status: 400 },
      );
    }

    const expiresAtMs = getExpiryMs(config.comparisonTtlMs);
    const comparisons = await Promise.all(
      pairs.map((pair) => buildDocumentComparison({ pair, threshold, expiresAtMs })),
    );

    for (const comparison of comparisons) {
      saveComparison({ result: comparison, expiresAtMs });
    }

    console.info(
      `Compared ${comparisons.length} document pair(s) at threshold ${threshold}; ` +
        `${unpaired.source.length + unpaired.rendering.length} file(s) unpaired.`,
    );

    const body: CompareResponse = {
      results: comparisons.map((comparison) => ({
        name: comparison.key,
        comparisonId: comparison.id,
        url: `/compare/${comparison.id}`,
        summary: comparison.summary,
      })),
      unpaired,
    };

    return NextResponse.json(body);
  } catch (error) {
    if (isInvalidConfigurationError(error) && error.setting === "threshold") {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    if (isExtractionError(error)) {
      console.error(`Failed to extract text from ${error.side} ${error.fileName}`, error);
      return NextResponse.json(
        { error: error.message, fileName: error.fileName, side: error.side },
        { status: 422 },
      );
    }

    console.error("Failed to compare documents", error);
    return NextResponse.json(
      { error: "Unable to process the document comparison." },
      { status: 500 },
    );
  }
}
