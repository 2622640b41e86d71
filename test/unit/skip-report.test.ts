import { describe, it, expect } from "vitest";
import { renderSkipReport, describeSkip, summarizeReasons, SKIP_REPORT_TAG } from "../../src/review/skip-report.js";
import type { SkippedIssue, SkipReport } from "../../src/review/types.js";

function skipped(overrides: Partial<SkippedIssue>): SkippedIssue {
  return {
    file: "a.rs",
    line: 1,
    reason: "line-not-in-range",
    message: "",
    validRanges: [],
    severity: "warning",
    category: "bugs",
    originalIssueBody: "Test issue",
    ...overrides,
  };
}

const REPORT: SkipReport = {
  entries: [
    skipped({ file: "a.rs", line: 15, validRanges: [[1, 10]], originalIssueBody: "Check bounds." }),
    skipped({ file: "b.rs", line: 3, reason: "file-not-in-diff", originalIssueBody: "Unused import.\nRemove it." }),
  ],
  countsByReason: { "line-not-in-range": 1, "file-not-in-diff": 1 },
};

describe("renderSkipReport", () => {
  it("returns an empty string when nothing was skipped", () => {
    expect(renderSkipReport({ entries: [], countsByReason: {} })).toBe("");
  });

  it("lists each skipped issue with its reason, valid lines and body", () => {
    expect(renderSkipReport(REPORT)).toBe(
      [
        SKIP_REPORT_TAG,
        "### Skipped comments (2)\n",
        "- **`a.rs`** L15 — line is outside the changed hunks (valid lines: 1-10)",
        "  > Check bounds.",
        "- **`b.rs`** L3 — file is not part of this diff",
        "  > Unused import. Remove it.",
        "",
        "1 line is outside the changed hunks · 1 file is not part of this diff",
      ].join("\n")
    );
  });

  it("leaves out issue bodies when asked", () => {
    const result = renderSkipReport(REPORT, { includeIssueBody: false });

    expect(result).not.toContain("Check bounds.");
    expect(result.split("\n")).toHaveLength(7);
  });

  it("groups entries by file in order of first appearance", () => {
    const report: SkipReport = {
      entries: [
        skipped({ file: "a.rs", line: 20, validRanges: [[1, 10]] }),
        skipped({ file: "b.rs", line: 4, reason: "binary-file" }),
        skipped({ file: "a.rs", line: 30, validRanges: [[1, 10]] }),
      ],
      countsByReason: { "line-not-in-range": 2, "binary-file": 1 },
    };

    const bullets = renderSkipReport(report, { includeIssueBody: false })
      .split("\n")
      .filter((line) => line.startsWith("- "));

    expect(bullets).toEqual([
      "- **`a.rs`** L20 — line is outside the changed hunks (valid lines: 1-10)",
      "- **`a.rs`** L30 — line is outside the changed hunks (valid lines: 1-10)",
      "- **`b.rs`** L4 — binary file",
    ]);
  });

  it("appends the renamed-file corrections", () => {
    const result = renderSkipReport(
      { entries: [], countsByReason: {} },
      { corrections: [{ from: "old.rs", to: "new.rs", line: 12 }] }
    );

    expect(result).toBe(`${SKIP_REPORT_TAG}\n### Moved to renamed files (1)\n\n- \`old.rs\` → \`new.rs\` L12`);
  });
});

describe("describeSkip", () => {
  it("names the new path of a renamed file", () => {
    const entry = skipped({ reason: "stale-renamed-path", renamedTo: "new.rs", validRanges: [[10, 15]] });

    expect(describeSkip(entry)).toBe("file was renamed to `new.rs` (valid lines: 10-15)");
  });

  it("caps the number of ranges shown", () => {
    const entry = skipped({
      validRanges: [
        [1, 2],
        [5, 5],
        [9, 12],
      ],
    });

    expect(describeSkip(entry, 2)).toBe("line is outside the changed hunks (valid lines: 1-2, 5, +1 more)");
  });

  it("labels deleted files and invalid line numbers", () => {
    expect(describeSkip(skipped({ reason: "deleted-file" }))).toBe("file is deleted");
    expect(describeSkip(skipped({ reason: "invalid-line-number" }))).toBe("invalid line number");
    expect(describeSkip(skipped({ reason: "patch-unavailable" }))).toBe("no patch available");
  });
});

describe("summarizeReasons", () => {
  it("counts reasons in the order they were first seen", () => {
    expect(summarizeReasons({ entries: [], countsByReason: { "deleted-file": 2, "binary-file": 1 } })).toBe(
      "2 file is deleted · 1 binary file"
    );
  });
});
