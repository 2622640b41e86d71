import type { GitHubClient, PullRequestRef } from "./client.js";
import type { ReviewPayload } from "../review/types.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-reviews" });

/**
 * Creates one pending review from an assembled payload.
 * Returns the review id, or null when there was nothing to post.
 */
export async function submitReview(
  client: GitHubClient,
  pr: PullRequestRef,
  payload: ReviewPayload,
  body?: string,
  retry: RetryOptions = {}
): Promise<number | null> {
  if (payload.comments.length === 0 && !body) {
    log.info({ pr: pr.pullNumber, commit: payload.commitSha }, "No comments to post, skipping review");
    return null;
  }

  const reviewId = await withRetry(
    () =>
      client.createPendingReview({
        ...pr,
        commitId: payload.commitSha,
        body,
        comments: payload.comments,
      }),
    retry
  );

  log.info(
    {
      pr: pr.pullNumber,
      reviewId,
      commit: payload.commitSha,
      commentCount: payload.comments.length,
    },
    "Created pending review"
  );
  return reviewId;
}
