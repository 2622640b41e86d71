import { parseDiff } from "../diff/parser.js";
import { buildRangeIndex, type RangeIndex } from "../diff/range-index.js";
import type { DiffSet } from "../diff/types.js";
import type { HunkmapConfig } from "../config-loader/schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { validateIssues } from "./validator.js";
import { assembleReview, type AssembledReview } from "./assembler.js";
import { renderSkipReport } from "./skip-report.js";
import type { Issue, ValidationResult } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "pipeline" });

export interface ReviewRun extends AssembledReview {
  validation: ValidationResult;
  /** Markdown skip report, empty when nothing was skipped or moved */
  skipReportMarkdown: string;
}

/**
 * A parsed and indexed diff for one head commit. The index is built once;
 * every validate/review call reads it without modifying it.
 */
export interface ReviewSession {
  readonly diffSet: DiffSet;
  readonly index: RangeIndex;
  validate(issues: readonly Issue[]): ValidationResult;
  review(commitSha: string, issues: readonly Issue[]): ReviewRun;
}

export function createReviewSession(
  diff: string | DiffSet,
  config: HunkmapConfig = DEFAULT_CONFIG
): ReviewSession {
  const diffSet = typeof diff === "string" ? parseDiff(diff) : diff;
  const index = buildRangeIndex(diffSet);

  for (const error of diffSet.errors) {
    log.warn({ kind: error.kind, line: error.lineNumber, path: error.path }, error.message);
  }
  log.debug({ files: diffSet.files.length, renames: index.renames.size }, "Indexed diff");

  const validate = (issues: readonly Issue[]): ValidationResult =>
    validateIssues(issues, index, { renamePolicy: config.validation.renamePolicy });

  return Object.freeze({
    diffSet,
    index,
    validate,
    review(commitSha: string, issues: readonly Issue[]): ReviewRun {
      const validation = validate(issues);
      const assembled = assembleReview({
        commitSha,
        accepted: validation.accepted,
        rejected: validation.rejected,
        issues,
        format: config.comments,
      });

      log.info(
        {
          commit: commitSha,
          issues: issues.length,
          accepted: validation.accepted.length,
          skipped: validation.rejected.length,
          corrected: assembled.corrections.length,
        },
        "Validated review comments"
      );

      return {
        ...assembled,
        validation,
        skipReportMarkdown: renderSkipReport(assembled.skipReport, {
          ...config.skipReport,
          corrections: assembled.corrections,
        }),
      };
    },
  });
}

export interface ReviewDiffInput {
  diff: string;
  commitSha: string;
  issues: readonly Issue[];
  config?: HunkmapConfig;
}

/** One-shot parse, index, validate and assemble */
export function reviewDiff(input: ReviewDiffInput): ReviewRun {
  return createReviewSession(input.diff, input.config).review(input.commitSha, input.issues);
}
