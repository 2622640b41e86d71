import { describe, it, expect } from "vitest";
import { createReviewSession, reviewDiff } from "../../src/review/pipeline.js";
import { parseConfigYaml } from "../../src/config-loader/loader.js";
import { parseDiff } from "../../src/diff/parser.js";
import { SKIP_REPORT_TAG } from "../../src/review/skip-report.js";
import { PR_DIFF, SAMPLE_CONFIG_YAML, addedFileDiff, makeIssue } from "../fixtures/sample-diff.js";

describe("reviewDiff", () => {
  it("posts the in-range comment and reports the other two", () => {
    const run = reviewDiff({
      diff: addedFileDiff("a.rs", 10),
      commitSha: "abc123",
      issues: [
        makeIssue({ file: "a.rs", line: 5 }),
        makeIssue({ file: "a.rs", line: 15 }),
        makeIssue({ file: "b.rs", line: 3 }),
      ],
    });

    expect(run.payload).toEqual({
      commitSha: "abc123",
      comments: [{ path: "a.rs", line: 5, side: "RIGHT", body: "**🟡 Warning** — bugs\n\nTest issue" }],
    });
    expect(run.skipReport.entries.map((e) => [e.file, e.line, e.reason, e.validRanges])).toEqual([
      ["a.rs", 15, "line-not-in-range", [[1, 10]]],
      ["b.rs", 3, "file-not-in-diff", []],
    ]);
    expect(run.skipReport.countsByReason).toEqual({ "line-not-in-range": 1, "file-not-in-diff": 1 });
    expect(run.skipReportMarkdown).toBe(
      [
        SKIP_REPORT_TAG,
        "### Skipped comments (2)\n",
        "- **`a.rs`** L15 — line is outside the changed hunks (valid lines: 1-10)",
        "  > Test issue",
        "- **`b.rs`** L3 — file is not part of this diff",
        "  > Test issue",
        "",
        "1 line is outside the changed hunks · 1 file is not part of this diff",
      ].join("\n")
    );
  });

  it("reports auto-corrected renames in the markdown", () => {
    const run = reviewDiff({
      diff: PR_DIFF,
      commitSha: "abc123",
      issues: [makeIssue({ file: "old.rs", line: 12 })],
    });

    expect(run.payload.comments.map((c) => c.path)).toEqual(["new.rs"]);
    expect(run.skipReportMarkdown).toBe(`${SKIP_REPORT_TAG}\n### Moved to renamed files (1)\n\n- \`old.rs\` → \`new.rs\` L12`);
  });

  it("applies the rename policy and comment options from config", () => {
    const run = reviewDiff({
      diff: PR_DIFF,
      commitSha: "abc123",
      issues: [makeIssue({ file: "old.rs", line: 12 }), makeIssue({ file: "src/lib.rs", line: 12, body: "Off by one." })],
      config: parseConfigYaml(SAMPLE_CONFIG_YAML),
    });

    expect(run.payload.comments).toEqual([{ path: "src/lib.rs", line: 12, side: "RIGHT", body: "Off by one." }]);
    expect(run.validation.rejected[0].reason).toBe("stale-renamed-path");
    expect(run.skipReportMarkdown).toContain(
      "- **`old.rs`** L12 — file was renamed to `new.rs` (valid lines: 10-15)"
    );
  });

  it("returns an empty payload and no markdown when there are no issues", () => {
    const run = reviewDiff({ diff: PR_DIFF, commitSha: "abc123", issues: [] });

    expect(run.payload).toEqual({ commitSha: "abc123", comments: [] });
    expect(run.skipReportMarkdown).toBe("");
  });
});

describe("createReviewSession", () => {
  it("indexes the diff once and reuses it across calls", () => {
    const session = createReviewSession(PR_DIFF);
    const issues = [makeIssue({ file: "src/lib.rs", line: 12 }), makeIssue({ file: "src/lib.rs", line: 30 })];

    const first = session.review("sha-one", issues);
    const second = session.review("sha-two", issues);

    expect(first.validation).toEqual(second.validation);
    expect(first.payload.commitSha).toBe("sha-one");
    expect(second.payload.commitSha).toBe("sha-two");
    expect(session.validate(issues)).toEqual(first.validation);
    expect(session.index.files.get("src/lib.rs")?.ranges).toEqual([
      [10, 15],
      [51, 62],
    ]);
  });

  it("accepts an already parsed diff set and keeps its parse errors", () => {
    const diffSet = parseDiff(
      ["diff --git a/a.rs b/a.rs", "--- a/a.rs", "+++ b/a.rs", "@@ -1,1 +1,x @@", " one"].join("\n")
    );

    const session = createReviewSession(diffSet);

    expect(session.diffSet).toBe(diffSet);
    expect(session.diffSet.errors.map((e) => e.kind)).toEqual(["malformed-hunk-header"]);
    expect(session.validate([makeIssue({ file: "a.rs", line: 1 })]).rejected[0].reason).toBe("line-not-in-range");
  });
});
