import clsx from "clsx";
import { RedlineText } from "@/components/comparison/RedlineText";
import type { AlignedRow, RowStatus } from "@/types/comparison";

const STATUS_LABELS: Record<RowStatus, string> = {
  matched: "Matched",
  missing: "Missing",
  extra: "Extra",
};

export const ComparisonTable = ({
  rows,
  sourceLabel,
  renderingLabel,
}: {
  rows: AlignedRow[];
  sourceLabel: string;
  renderingLabel: string;
}) => {
  if (rows.length === 0) {
    return (
      <p className="p-6 text-sm" style={{ color: "var(--color-text-muted)" }}>
        Neither document produced any sentences.
      </p>
    );
  }

  return (
    <table className="w-full table-fixed border-collapse text-left">
      <thead>
        <tr className="border-b border-[var(--color-border)]">
          <th className="w-24 px-3 py-2 text-xs font-semibold uppercase tracking-wide">Row</th>
          <th className="px-3 py-2 text-sm font-semibold">{sourceLabel}</th>
          <th className="px-3 py-2 text-sm font-semibold">{renderingLabel}</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((row, index) => (
          <tr
            key={`row-${index}`}
            data-status={row.status}
            className={clsx(
              "border-b border-[var(--color-border)] align-top",
              row.status === "missing" && "bg-[var(--color-removed-bg)]/40",
              row.status === "extra" && "bg-[var(--color-added-bg)]/40",
            )}
          >
            <td className="px-3 py-2 text-xs" style={{ color: "var(--color-text-tertiary)" }}>
              {index + 1}. {STATUS_LABELS[row.status]}
            </td>
            <td className="px-3 py-2">
              <RedlineText spans={row.left} emptyLabel={row.status === "extra" ? "—" : undefined} />
            </td>
            <td className="px-3 py-2">
              <RedlineText
                spans={row.right}
                emptyLabel={row.status === "missing" ? "—" : undefined}
              />
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};
