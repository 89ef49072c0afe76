import { describe, it, expect } from "vitest";
import { alignSentences } from "../alignSentences";
import { escapeHtml, renderSpansMarkup, toMarkupRows } from "../renderMarkup";

describe("escapeHtml", () => {
  it("escapes markup-significant characters", () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe(
      "&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;",
    );
  });
});

describe("renderSpansMarkup", () => {
  it("wraps only non-equal spans and joins with spaces", () => {
    expect(
      renderSpansMarkup([
        { text: "Revenue", kind: "equal" },
        { text: "3.00", kind: "decimal-diff" },
        { text: "<x>", kind: "diff" },
      ]),
    ).toBe('Revenue <span class="decimal-diff">3.00</span> <span class="diff">&lt;x&gt;</span>');
  });

  it("renders an empty side as an empty string", () => {
    expect(renderSpansMarkup([])).toBe("");
  });
});

describe("toMarkupRows", () => {
  it("serializes aligned rows", () => {
    const rows = toMarkupRows(alignSentences(["Hello World", "A & B"], ["hello World"]));

    expect(rows).toEqual([
      {
        leftMarkup: '<span class="case-diff">Hello</span> World',
        rightMarkup: '<span class="case-diff">hello</span> World',
        isUnmatchedLeft: false,
      },
      {
        leftMarkup: '<span class="missing">A &amp; B</span>',
        rightMarkup: "",
        isUnmatchedLeft: true,
      },
    ]);
  });
});
