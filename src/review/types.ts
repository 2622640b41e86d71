import type { LineRange } from "../diff/types.js";

export type Severity = "error" | "warning" | "info";

/** A proposed line comment from an issue producer (rule engine, LLM, validator) */
export interface Issue {
  /** Repository-root-relative path */
  file: string;
  /** 1-based line number in the NEW version of the file */
  line: number;
  severity: Severity;
  category: string;
  body: string;
  suggestedFix?: string;
}

export type RejectionReason =
  | "file-not-in-diff"
  | "deleted-file"
  | "binary-file"
  | "line-not-in-range"
  | "invalid-line-number"
  | "stale-renamed-path"
  | "patch-unavailable";

export type RenamePolicy = "auto-correct" | "strict";

export interface AcceptedOutcome {
  kind: "accepted";
  /** Position of the issue in the validated list */
  issueIndex: number;
  file: string;
  line: number;
  /** Path the issue originally used when it was rewritten after a rename */
  correctedFrom?: string;
}

export interface RejectedOutcome {
  kind: "rejected";
  issueIndex: number;
  file: string;
  line: number;
  reason: RejectionReason;
  message: string;
  /** Every commentable range of the file, empty when the file has none or is unknown */
  validRanges: readonly LineRange[];
  /** New path of a renamed file the issue referred to by its old path */
  renamedTo?: string;
}

export type ValidationOutcome = AcceptedOutcome | RejectedOutcome;

export interface ValidationResult {
  accepted: readonly AcceptedOutcome[];
  rejected: readonly RejectedOutcome[];
}

export interface ReviewComment {
  path: string;
  line: number;
  side: "RIGHT";
  body: string;
}

/** One batched "create review" request anchored to a head commit */
export interface ReviewPayload {
  commitSha: string;
  comments: readonly ReviewComment[];
}

export interface SkippedIssue {
  file: string;
  line: number;
  reason: RejectionReason;
  message: string;
  validRanges: readonly LineRange[];
  renamedTo?: string;
  severity: Severity;
  category: string;
  originalIssueBody: string;
}

export interface SkipReport {
  entries: readonly SkippedIssue[];
  countsByReason: Readonly<Partial<Record<RejectionReason, number>>>;
}

export interface PathCorrection {
  from: string;
  to: string;
  line: number;
}
