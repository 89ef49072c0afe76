// @vitest-environment jsdom
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, it, expect } from "vitest";
import { alignSentences } from "@/lib/align/alignSentences";
import { ComparisonTable } from "../ComparisonTable";
import { RedlineText } from "../RedlineText";

afterEach(() => {
  cleanup();
});

describe("RedlineText", () => {
  it("marks non-equal spans with their class", () => {
    const { container } = render(
      <RedlineText
        spans={[
          { text: "Revenue", kind: "equal" },
          { text: "3.00", kind: "decimal-diff" },
        ]}
      />,
    );

    expect(container.textContent).toBe("Revenue 3.00");
    const marked = container.querySelector("[data-kind]");
    expect(marked?.className).toBe("decimal-diff");
    expect(marked?.getAttribute("title")).toBe("Same number, different format");
    expect(container.querySelectorAll("[data-kind]")).toHaveLength(1);
  });

  it("shows the empty label only when given", () => {
    const { container, rerender } = render(<RedlineText spans={[]} />);
    expect(container.innerHTML).toBe("");

    rerender(<RedlineText spans={[]} emptyLabel="—" />);
    expect(container.textContent).toBe("—");
  });
});

describe("ComparisonTable", () => {
  it("renders one row per aligned pair in order", () => {
    const rows = alignSentences(["Hello World", "Zebras graze."], ["hello World", "Quiet hum"]);
    const { container } = render(
      <ComparisonTable rows={rows} sourceLabel="report.docx" renderingLabel="report.html" />,
    );

    expect(screen.getByText("report.docx").tagName).toBe("TH");
    const bodyRows = Array.from(container.querySelectorAll("tbody tr"));
    expect(bodyRows.map((row) => row.getAttribute("data-status"))).toEqual([
      "matched",
      "missing",
      "extra",
    ]);

    const missingCells = bodyRows[1].querySelectorAll("td");
    expect(missingCells[0].textContent).toBe("2. Missing");
    expect(missingCells[1].textContent).toBe("Zebras graze.");
    expect(missingCells[2].textContent).toBe("—");

    const caseMarks = bodyRows[0].querySelectorAll(".case-diff");
    expect(Array.from(caseMarks, (mark) => mark.textContent)).toEqual(["Hello", "hello"]);
  });

  it("explains an empty comparison", () => {
    render(<ComparisonTable rows={[]} sourceLabel="a.docx" renderingLabel="a.html" />);
    expect(screen.getByText("Neither document produced any sentences.")).toBeTruthy();
  });
});
