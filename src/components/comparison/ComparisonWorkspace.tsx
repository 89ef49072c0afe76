"use client";

import { useCallback, useState, type FormEvent } from "react";
import type { CompareResponse } from "@/types/comparison";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isCompareResponse = (value: unknown): value is CompareResponse =>
  isRecord(value) && Array.isArray(value.results) && isRecord(value.unpaired);

const parseApiPayload = async (
  response: Response,
): Promise<{ payload: unknown; text: string | null }> => {
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("application/json")) {
    const payload: unknown = await response.json();
    return { payload, text: null };
  }

  const text = await response.text();
  return { payload: null, text };
};

const toApiError = (response: Response, payload: unknown, text: string | null): Error => {
  if (isRecord(payload) && typeof payload.error === "string" && payload.error.trim()) {
    return new Error(payload.error);
  }

  if (text && /^<!doctype html/i.test(text.trim())) {
    return new Error(`Request failed (${response.status}). API returned HTML instead of JSON.`);
  }

  if (text && text.trim()) {
    return new Error(`Request failed (${response.status}): ${text.slice(0, 220)}`);
  }

  return new Error(`Request failed (${response.status}).`);
};

export const ComparisonWorkspace = ({ defaultThreshold }: { defaultThreshold: number }) => {
  const [docxFiles, setDocxFiles] = useState<File[]>([]);
  const [htmlFiles, setHtmlFiles] = useState<File[]>([]);
  const [threshold, setThreshold] = useState(String(defaultThreshold));
  const [response, setResponse] = useState<CompareResponse | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [isComparing, setIsComparing] = useState(false);

  const canCompare = docxFiles.length > 0 && htmlFiles.length > 0 && !isComparing;

  const onSubmit = useCallback(
    async (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      setError(null);
      setIsComparing(true);

      const formData = new FormData();
      docxFiles.forEach((file) => formData.append("docxFiles", file));
      htmlFiles.forEach((file) => formData.append("htmlFiles", file));
      formData.append("threshold", threshold);

      try {
        const apiResponse = await fetch("/api/compare", { method: "POST", body: formData });
        const { payload, text } = await parseApiPayload(apiResponse);
        if (!apiResponse.ok) {
          throw toApiError(apiResponse, payload, text);
        }

        if (!isCompareResponse(payload)) {
          throw new Error("Compare response is missing its results.");
        }

        setResponse(payload);
      } catch (requestError) {
        setResponse(null);
        setError(
          requestError instanceof Error ? requestError.message : "Unable to compare the documents.",
        );
      } finally {
        setIsComparing(false);
      }
    },
    [docxFiles, htmlFiles, threshold],
  );

  const unpairedNames = response
    ? [...response.unpaired.source, ...response.unpaired.rendering]
    : [];

  return (
    <div className="mx-auto flex w-full max-w-4xl flex-col gap-6 p-8">
      <header>
        <h1 className="text-2xl font-bold text-[var(--color-text-primary)]">Sentence diff</h1>
        <p className="text-sm text-[var(--color-text-tertiary)]">
          Upload source documents (.docx) and their rendered pages (.html). Files are paired by
          name.
        </p>
      </header>

      <form
        onSubmit={(event) => void onSubmit(event)}
        className="flex flex-col gap-4 rounded-lg border border-[var(--color-border)] bg-white p-5"
      >
        <label className="flex flex-col gap-1 text-sm font-medium">
          Source documents
          <input
            type="file"
            name="docxFiles"
            accept=".docx,application/vnd.openxmlformats-officedocument.wordprocessingml.document"
            multiple
            onChange={(event) => setDocxFiles(Array.from(event.target.files ?? []))}
          />
        </label>
        <label className="flex flex-col gap-1 text-sm font-medium">
          Rendered pages
          <input
            type="file"
            name="htmlFiles"
            accept=".html,.htm,text/html"
            multiple
            onChange={(event) => setHtmlFiles(Array.from(event.target.files ?? []))}
          />
        </label>
        <label className="flex items-center gap-3 text-sm font-medium">
          Match threshold
          <input
            type="number"
            name="threshold"
            min={0}
            max={1}
            step={0.05}
            value={threshold}
            onChange={(event) => setThreshold(event.target.value)}
            className="w-24 rounded-md border border-[var(--color-border)] px-2 py-1"
          />
        </label>
        <button
          type="submit"
          disabled={!canCompare}
          className="self-start rounded-md px-4 py-1.5 text-sm font-medium text-white disabled:cursor-not-allowed disabled:opacity-50"
          style={{ background: "var(--color-accent)" }}
        >
          {isComparing ? "Comparing..." : "Compare"}
        </button>
      </form>

      {response ? (
        <section className="flex flex-col gap-3">
          <h2 className="text-lg font-semibold">Results</h2>
          <ul className="flex flex-col gap-2">
            {response.results.map((result) => (
              <li
                key={result.comparisonId}
                className="flex items-center justify-between rounded-md border border-[var(--color-border)] bg-white px-4 py-2 text-sm"
              >
                <a href={result.url} className="font-medium text-[var(--color-accent)]">
                  {result.name}
                </a>
                <span className="text-[var(--color-text-tertiary)]">
                  {result.summary.matchedRows} matched, {result.summary.missingRows} missing,{" "}
                  {result.summary.extraRows} extra
                </span>
                <a
                  href={`/api/compare/${result.comparisonId}/export`}
                  className="text-[var(--color-text-secondary)] underline"
                >
                  PDF
                </a>
              </li>
            ))}
          </ul>
          {unpairedNames.length > 0 ? (
            <p className="text-sm text-[var(--color-text-tertiary)]">
              Not paired: {unpairedNames.join(", ")}
            </p>
          ) : null}
        </section>
      ) : null}

      {error ? (
        <div
          role="alert"
          className="rounded-lg border px-4 py-3 text-sm"
          style={{
            background: "var(--color-removed-bg)",
            borderColor: "var(--color-removed)",
            color: "var(--color-removed-text)",
          }}
        >
          {error}
        </div>
      ) : null}
    </div>
  );
};
