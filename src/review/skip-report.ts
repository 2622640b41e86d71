import { formatRanges } from "../diff/range-index.js";
import type { PathCorrection, RejectionReason, SkippedIssue, SkipReport } from "./types.js";

export const SKIP_REPORT_TAG = "<!-- hunkmap-skip-report -->";

const REASON_LABELS: Record<RejectionReason, string> = {
  "file-not-in-diff": "file is not part of this diff",
  "deleted-file": "file is deleted",
  "binary-file": "binary file",
  "line-not-in-range": "line is outside the changed hunks",
  "invalid-line-number": "invalid line number",
  "stale-renamed-path": "file was renamed",
  "patch-unavailable": "no patch available",
};

export interface SkipReportOptions {
  maxRangesShown?: number;
  includeIssueBody?: boolean;
  corrections?: readonly PathCorrection[];
}

/**
 * Renders skipped issues as markdown for a human reviewer, grouped by file,
 * with the lines that could have been commented on instead.
 * Returns an empty string when nothing was skipped or corrected.
 */
export function renderSkipReport(report: SkipReport, options: SkipReportOptions = {}): string {
  const { maxRangesShown = 10, includeIssueBody = true, corrections = [] } = options;
  if (report.entries.length === 0 && corrections.length === 0) return "";

  const parts: string[] = [SKIP_REPORT_TAG];

  if (report.entries.length > 0) {
    parts.push(`### Skipped comments (${report.entries.length})\n`);

    for (const group of groupByFile(report.entries).values()) {
      for (const entry of group) {
        parts.push(`- **\`${entry.file}\`** L${entry.line} — ${describeSkip(entry, maxRangesShown)}`);
        if (includeIssueBody) {
          parts.push(`  > ${oneLine(entry.originalIssueBody)}`);
        }
      }
    }
    parts.push("");
    parts.push(summarizeReasons(report));
  }

  if (corrections.length > 0) {
    if (report.entries.length > 0) parts.push("");
    parts.push(`### Moved to renamed files (${corrections.length})\n`);
    for (const c of corrections) {
      parts.push(`- \`${c.from}\` → \`${c.to}\` L${c.line}`);
    }
  }

  return parts.join("\n");
}

export function describeSkip(entry: SkippedIssue, maxRangesShown = 10): string {
  const label = REASON_LABELS[entry.reason];
  switch (entry.reason) {
    case "line-not-in-range":
      return `${label} (valid lines: ${formatRanges(entry.validRanges, maxRangesShown)})`;
    case "stale-renamed-path":
      return `${label} to \`${entry.renamedTo ?? "?"}\` (valid lines: ${formatRanges(entry.validRanges, maxRangesShown)})`;
    default:
      return label;
  }
}

/** `2 line is outside the changed hunks · 1 file is not part of this diff` */
export function summarizeReasons(report: SkipReport): string {
  return Object.entries(report.countsByReason)
    .map(([reason, count]) => `${count} ${labelFor(reason)}`)
    .join(" · ");
}

function labelFor(reason: string): string {
  return isRejectionReason(reason) ? REASON_LABELS[reason] : reason;
}

function isRejectionReason(value: string): value is RejectionReason {
  return Object.hasOwn(REASON_LABELS, value);
}

function groupByFile(entries: readonly SkippedIssue[]): Map<string, SkippedIssue[]> {
  const groups = new Map<string, SkippedIssue[]>();
  for (const entry of entries) {
    const group = groups.get(entry.file);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.file, [entry]);
    }
  }
  return groups;
}

function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, " ").trim();
}
