import type { GitHubClient, PullRequestRef } from "./client.js";
import { diffSetFromFiles, parseDiff } from "../diff/parser.js";
import type { DiffSet } from "../diff/types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-pulls" });

/** Fetches the full unified diff of a pull request and parses it */
export async function fetchDiffSet(
  client: GitHubClient,
  pr: PullRequestRef
): Promise<DiffSet> {
  const diff = await client.getPullRequestDiff(pr);
  const diffSet = parseDiff(diff);

  log.info(
    { owner: pr.owner, repo: pr.repo, pr: pr.pullNumber, fileCount: diffSet.files.length, parseErrors: diffSet.errors.length },
    "Fetched PR diff"
  );
  return diffSet;
}

/**
 * Builds the DiffSet from the per-file listing instead of the raw diff.
 * GitHub truncates the raw diff for very large pull requests; the listing
 * pages through every file.
 */
export async function fetchDiffSetFromFiles(
  client: GitHubClient,
  pr: PullRequestRef
): Promise<DiffSet> {
  const files = await client.listPullRequestFiles(pr);
  const diffSet = diffSetFromFiles(files);

  log.info(
    { owner: pr.owner, repo: pr.repo, pr: pr.pullNumber, fileCount: diffSet.files.length },
    "Fetched PR files"
  );
  return diffSet;
}
