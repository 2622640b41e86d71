import type { GitHubClient, PullRequestRef } from "../github/client.js";
import { fetchDiffSet, fetchDiffSetFromFiles } from "../github/pulls.js";
import { submitReview } from "../github/reviews.js";
import { loadRepoConfig } from "../config-loader/loader.js";
import type { HunkmapConfig } from "../config-loader/schema.js";
import type { RetryOptions } from "../utils/retry.js";
import { createReviewSession, type ReviewRun } from "./pipeline.js";
import type { Issue } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "orchestrator" });

export interface PublishOptions {
  /** PR head commit the comments are anchored to */
  headSha: string;
  issues: readonly Issue[];
  /** "diff" reads the raw unified diff; "files" pages through the file listing */
  diffSource?: "diff" | "files";
  /** Skips loading `.hunkmap.yml` from the repository */
  config?: HunkmapConfig;
  retry?: RetryOptions;
}

export interface PublishResult {
  reviewId: number | null;
  run: ReviewRun;
}

/**
 * Fetches the PR diff, validates the issues against it and creates one
 * pending review with every valid comment. Skipped issues go into the
 * review body so a human can act on them.
 */
export async function publishReview(
  client: GitHubClient,
  pr: PullRequestRef,
  options: PublishOptions
): Promise<PublishResult> {
  const startTime = Date.now();

  // 1. Load repo config
  const config =
    options.config ?? (await loadRepoConfig(client, pr.owner, pr.repo, options.headSha));

  // 2. Fetch and parse the diff
  const diffSet =
    options.diffSource === "files"
      ? await fetchDiffSetFromFiles(client, pr)
      : await fetchDiffSet(client, pr);

  // 3. Validate and assemble
  const run = createReviewSession(diffSet, config).review(options.headSha, options.issues);

  // 4. Post
  const reviewId = await submitReview(
    client,
    pr,
    run.payload,
    run.skipReportMarkdown || undefined,
    options.retry
  );

  log.info(
    {
      pr: pr.pullNumber,
      reviewId,
      posted: run.payload.comments.length,
      skipped: run.skipReport.entries.length,
      durationMs: Date.now() - startTime,
    },
    "Review published"
  );
  return { reviewId, run };
}
