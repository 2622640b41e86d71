import { ContractViolationError, describeValue, isArray } from "../errors.js";
import { formatInlineComment, type InlineFormatOptions } from "./inline-formatter.js";
import type {
  AcceptedOutcome,
  Issue,
  RejectedOutcome,
  PathCorrection,
  RejectionReason,
  ReviewComment,
  ReviewPayload,
  SkipReport,
  SkippedIssue,
} from "./types.js";

export interface AssembleInput {
  commitSha: string;
  accepted: readonly AcceptedOutcome[];
  rejected: readonly RejectedOutcome[];
  /** The list the outcomes were validated from; outcomes point into it by index */
  issues: readonly Issue[];
  format?: InlineFormatOptions;
}

export interface AssembledReview {
  payload: ReviewPayload;
  skipReport: SkipReport;
  /** Accepted comments whose path was rewritten from a renamed file's old path */
  corrections: readonly PathCorrection[];
}

/**
 * Turns validation outcomes into one review payload and a skip report.
 * No accepted outcomes still yields a payload, just with zero comments.
 */
export function assembleReview(input: AssembleInput): AssembledReview {
  const { commitSha, accepted, rejected, issues, format } = input;

  if (typeof commitSha !== "string" || commitSha.length === 0) {
    throw new ContractViolationError(`assembleReview expects a commit SHA, received ${describeValue(commitSha)}`);
  }
  if (!isArray(accepted) || !isArray(rejected) || !isArray(issues)) {
    throw new ContractViolationError("assembleReview expects accepted, rejected and issues arrays");
  }

  const comments: ReviewComment[] = accepted.map((outcome) => {
    const issue = issueAt(issues, outcome.issueIndex);
    return Object.freeze({
      path: outcome.file,
      line: outcome.line,
      side: "RIGHT" as const,
      body: formatInlineComment(issue, format),
    });
  });

  const entries: SkippedIssue[] = [];
  const countsByReason: Partial<Record<RejectionReason, number>> = {};

  for (const outcome of rejected) {
    const issue = issueAt(issues, outcome.issueIndex);
    const entry: SkippedIssue = {
      file: outcome.file,
      line: outcome.line,
      reason: outcome.reason,
      message: outcome.message,
      validRanges: outcome.validRanges,
      severity: issue.severity,
      category: issue.category,
      originalIssueBody: issue.body,
    };
    if (outcome.renamedTo !== undefined) entry.renamedTo = outcome.renamedTo;
    entries.push(Object.freeze(entry));
    countsByReason[outcome.reason] = (countsByReason[outcome.reason] ?? 0) + 1;
  }

  const corrections: PathCorrection[] = [];
  for (const outcome of accepted) {
    if (outcome.correctedFrom !== undefined) {
      corrections.push(Object.freeze({ from: outcome.correctedFrom, to: outcome.file, line: outcome.line }));
    }
  }

  return {
    corrections: Object.freeze(corrections),
    payload: Object.freeze({ commitSha, comments: Object.freeze(comments) }),
    skipReport: Object.freeze({ entries: Object.freeze(entries), countsByReason: Object.freeze(countsByReason) }),
  };
}

function issueAt(issues: readonly Issue[], issueIndex: number): Issue {
  const issue = issues[issueIndex];
  if (!issue) {
    throw new ContractViolationError(`Outcome refers to issue #${issueIndex}, but only ${issues.length} issues were given`);
  }
  return issue;
}

/** Plain JSON form of a payload, as a create-review request body expects it */
export function toCreateReviewRequest(payload: ReviewPayload): {
  commit_id: string;
  comments: { path: string; line: number; side: "RIGHT"; body: string }[];
} {
  return {
    commit_id: payload.commitSha,
    comments: payload.comments.map(({ path, line, side, body }) => ({ path, line, side, body })),
  };
}
