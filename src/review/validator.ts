import { ContractViolationError, describeValue, isArray } from "../errors.js";
import { findRange, formatRanges, type IndexedFile, type RangeIndex } from "../diff/range-index.js";
import type { LineRange } from "../diff/types.js";
import type {
  AcceptedOutcome,
  Issue,
  RejectedOutcome,
  RejectionReason,
  RenamePolicy,
  ValidationOutcome,
  ValidationResult,
} from "./types.js";

export interface ValidateOptions {
  /** What to do with an issue that uses a renamed file's old path. Defaults to "auto-correct". */
  renamePolicy?: RenamePolicy;
}

const NO_RANGES: readonly LineRange[] = Object.freeze([]);

/**
 * Checks each issue against the commentable lines of a diff.
 *
 * Every issue yields exactly one outcome, in input order. The index is
 * never modified, so the same index can back any number of calls.
 */
export function validateIssues(
  issues: readonly Issue[],
  index: RangeIndex,
  options: ValidateOptions = {}
): ValidationResult {
  if (!isArray(issues)) {
    throw new ContractViolationError(`validateIssues expects an array of issues, received ${describeValue(issues)}`);
  }
  if (typeof index !== "object" || index === null || !(index.files instanceof Map)) {
    throw new ContractViolationError(`validateIssues expects a RangeIndex, received ${describeValue(index)}`);
  }

  const policy = options.renamePolicy ?? "auto-correct";
  const accepted: AcceptedOutcome[] = [];
  const rejected: RejectedOutcome[] = [];

  issues.forEach((issue, issueIndex) => {
    const outcome = validateIssue(issue, issueIndex, index, policy);
    if (outcome.kind === "accepted") {
      accepted.push(outcome);
    } else {
      rejected.push(outcome);
    }
  });

  return Object.freeze({ accepted: Object.freeze(accepted), rejected: Object.freeze(rejected) });
}

export function validateIssue(
  issue: Issue,
  issueIndex: number,
  index: RangeIndex,
  policy: RenamePolicy = "auto-correct"
): ValidationOutcome {
  if (typeof issue !== "object" || issue === null) {
    throw new ContractViolationError(`Issue #${issueIndex} must be an object, received ${describeValue(issue)}`);
  }
  const { line } = issue;
  let file = issue.file;
  let correctedFrom: string | undefined;

  const reject = (
    reason: RejectionReason,
    message: string,
    validRanges: readonly LineRange[] = NO_RANGES,
    renamedTo?: string
  ): RejectedOutcome => {
    const outcome: RejectedOutcome = { kind: "rejected", issueIndex, file, line, reason, message, validRanges };
    if (renamedTo !== undefined) outcome.renamedTo = renamedTo;
    return Object.freeze(outcome);
  };

  if (!Number.isInteger(line) || line <= 0) {
    return reject("invalid-line-number", `Line ${String(line)} is not a positive line number`);
  }

  // A path that is itself in the diff is never treated as stale, even if another file was renamed away from it
  const renamedTo = index.files.has(file) ? undefined : index.renames.get(file);
  if (renamedTo !== undefined) {
    if (policy === "strict") {
      return reject(
        "stale-renamed-path",
        `${file} was renamed to ${renamedTo}; resubmit the issue against the new path`,
        index.files.get(renamedTo)?.ranges ?? NO_RANGES,
        renamedTo
      );
    }
    correctedFrom = file;
    file = renamedTo;
  }

  const entry: IndexedFile | undefined = index.files.get(file);
  if (!entry) {
    return reject("file-not-in-diff", `${file} is not part of this diff`);
  }

  if (entry.status === "deleted") {
    return reject("deleted-file", `${file} is deleted in this diff and has no lines to comment on`);
  }
  if (entry.patchOmitted) {
    return reject("patch-unavailable", `${file} has no patch available to comment on; its diff was too large to load`);
  }
  if (entry.status === "binary") {
    return reject("binary-file", `${file} is a binary file and has no lines to comment on`);
  }

  if (!findRange(entry.ranges, line)) {
    return reject(
      "line-not-in-range",
      `Line ${line} of ${file} is outside the diff (valid ranges: ${formatRanges(entry.ranges)})`,
      entry.ranges
    );
  }

  const outcome: AcceptedOutcome = { kind: "accepted", issueIndex, file, line };
  if (correctedFrom !== undefined) outcome.correctedFrom = correctedFrom;
  return Object.freeze(outcome);
}
