import { NextResponse } from "next/server";
import { getStoredComparisonState } from "@/lib/store/comparisonStore";
import type { DocumentComparison } from "@/types/comparison";

export type ComparisonLookup =
  | { ok: true; comparison: DocumentComparison }
  | { ok: false; response: NextResponse };

/**
 * Resolves a stored comparison, or the 410/404 response to send instead.
 * An expired id answers 410 once; afterwards it is forgotten and answers 404.
 */
export const lookupComparison = (id: string): ComparisonLookup => {
  const state = getStoredComparisonState(id);

  if (state.state === "expired") {
    return {
      ok: false,
      response: NextResponse.json(
        { error: "Comparison expired; please re-upload the documents." },
        { status: 410 },
      ),
    };
  }

  if (state.state === "missing") {
    return {
      ok: false,
      response: NextResponse.json({ error: "Comparison not found or expired." }, { status: 404 }),
    };
  }

  return { ok: true, comparison: state.record.result };
};
