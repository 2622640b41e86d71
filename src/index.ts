export { parseDiff, parseFilePatch, diffSetFromFiles, parseHunkHeader, type FilePatch } from "./diff/parser.js";
export {
  buildRangeIndex,
  findRange,
  formatRanges,
  mergeRanges,
  type IndexedFile,
  type RangeIndex,
} from "./diff/range-index.js";
export { newLineRange } from "./diff/types.js";
export type {
  DiffParseError,
  DiffParseErrorKind,
  DiffSet,
  FileDiff,
  FileStatus,
  Hunk,
  LineRange,
} from "./diff/types.js";

export { validateIssues, validateIssue, type ValidateOptions } from "./review/validator.js";
export {
  assembleReview,
  toCreateReviewRequest,
  type AssembleInput,
  type AssembledReview,
} from "./review/assembler.js";
export { formatInlineComment, type InlineFormatOptions } from "./review/inline-formatter.js";
export { renderSkipReport, describeSkip, summarizeReasons, SKIP_REPORT_TAG, type SkipReportOptions } from "./review/skip-report.js";
export { parseIssues } from "./review/issue-schema.js";
export {
  createReviewSession,
  reviewDiff,
  type ReviewDiffInput,
  type ReviewRun,
  type ReviewSession,
} from "./review/pipeline.js";
export { publishReview, type PublishOptions, type PublishResult } from "./review/orchestrator.js";
export type {
  AcceptedOutcome,
  Issue,
  PathCorrection,
  RejectedOutcome,
  RejectionReason,
  RenamePolicy,
  ReviewComment,
  ReviewPayload,
  Severity,
  SkippedIssue,
  SkipReport,
  ValidationOutcome,
  ValidationResult,
} from "./review/types.js";

export { parseConfig, type HunkmapConfig, type HunkmapConfigInput } from "./config-loader/schema.js";
export { loadRepoConfig, parseConfigYaml } from "./config-loader/loader.js";
export { DEFAULT_CONFIG, CONFIG_FILENAME } from "./config/defaults.js";

export {
  createGitHubClient,
  createGitHubClientFromEnv,
  type CreateReviewParams,
  type GitHubClient,
  type PullRequestRef,
} from "./github/client.js";
export { fetchDiffSet, fetchDiffSetFromFiles } from "./github/pulls.js";
export { submitReview } from "./github/reviews.js";

export { ContractViolationError, ConfigError } from "./errors.js";
