import { Fragment } from "react";
import type { DiffSpan, TokenClass } from "@/types/comparison";

const KIND_TITLES: Record<Exclude<TokenClass, "equal">, string> = {
  missing: "Missing from the rendering",
  extra: "Only in the rendering",
  "case-diff": "Differs in letter case",
  "decimal-diff": "Same number, different format",
  diff: "Different text",
};

export const RedlineText = ({
  spans,
  emptyLabel,
}: {
  spans: DiffSpan[];
  emptyLabel?: string;
}) => {
  if (spans.length === 0) {
    return emptyLabel ? (
      <p className="text-sm italic" style={{ color: "var(--color-text-muted)" }}>
        {emptyLabel}
      </p>
    ) : null;
  }

  return (
    <p
      className="whitespace-pre-wrap break-words font-sans text-sm leading-7"
      style={{ color: "var(--color-text-secondary)" }}
    >
      {spans.map((span, index) => (
        <Fragment key={`span-${index}`}>
          {index > 0 ? " " : null}
          {span.kind === "equal" ? (
            <span>{span.text}</span>
          ) : (
            <span className={span.kind} title={KIND_TITLES[span.kind]} data-kind={span.kind}>
              {span.text}
            </span>
          )}
        </Fragment>
      ))}
    </p>
  );
};
