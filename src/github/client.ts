import { Octokit } from "@octokit/rest";
import { loadEnv } from "../config/env.js";
import { ConfigError } from "../errors.js";
import type { FilePatch } from "../diff/parser.js";
import type { ReviewComment } from "../review/types.js";

export interface PullRequestRef {
  owner: string;
  repo: string;
  pullNumber: number;
}

export interface CreateReviewParams extends PullRequestRef {
  commitId: string;
  body?: string;
  comments: readonly ReviewComment[];
}

/**
 * The slice of the GitHub API this library needs. Everything that talks to
 * the network sits behind it so the review pipeline can be run against a fake.
 */
export interface GitHubClient {
  getPullRequestDiff(pr: PullRequestRef): Promise<string>;
  listPullRequestFiles(pr: PullRequestRef): Promise<FilePatch[]>;
  /** Returns null when the file does not exist at `ref` */
  getFileContent(params: { owner: string; repo: string; path: string; ref: string }): Promise<string | null>;
  /** Creates a pending review (no event) and returns its id */
  createPendingReview(params: CreateReviewParams): Promise<number>;
}

const PER_PAGE = 100;

export function createGitHubClient(octokit: Octokit): GitHubClient {
  return {
    async getPullRequestDiff(pr) {
      const response = await octokit.pulls.get({
        owner: pr.owner,
        repo: pr.repo,
        pull_number: pr.pullNumber,
        mediaType: { format: "diff" },
      });
      // The diff media type swaps the JSON body for raw text
      const data: unknown = response.data;
      if (typeof data !== "string") {
        throw new Error(`Expected diff text for ${pr.owner}/${pr.repo}#${pr.pullNumber}`);
      }
      return data;
    },

    async listPullRequestFiles(pr) {
      const files: FilePatch[] = [];
      let page = 1;

      while (true) {
        const { data } = await octokit.pulls.listFiles({
          owner: pr.owner,
          repo: pr.repo,
          pull_number: pr.pullNumber,
          per_page: PER_PAGE,
          page,
        });

        files.push(
          ...data.map((f) => ({
            filename: f.filename,
            status: f.status,
            patch: f.patch,
            previousFilename: f.previous_filename,
            additions: f.additions,
            deletions: f.deletions,
          }))
        );

        if (data.length < PER_PAGE) break;
        page++;
      }
      return files;
    },

    async getFileContent({ owner, repo, path, ref }) {
      try {
        const { data } = await octokit.repos.getContent({ owner, repo, path, ref });
        if (Array.isArray(data) || !("content" in data) || !data.content) return null;
        return Buffer.from(data.content, "base64").toString("utf-8");
      } catch (err) {
        if (httpStatus(err) === 404) return null;
        throw err;
      }
    },

    async createPendingReview(params) {
      const { data } = await octokit.pulls.createReview({
        owner: params.owner,
        repo: params.repo,
        pull_number: params.pullNumber,
        commit_id: params.commitId,
        body: params.body,
        comments: params.comments.map((c) => ({
          path: c.path,
          line: c.line,
          side: c.side,
          body: c.body,
        })),
      });
      return data.id;
    },
  };
}

/** Client authenticated with GITHUB_TOKEN */
export function createGitHubClientFromEnv(): GitHubClient {
  const token = loadEnv().GITHUB_TOKEN;
  if (!token) {
    throw new ConfigError("GITHUB_TOKEN is required to talk to GitHub");
  }
  return createGitHubClient(new Octokit({ auth: token }));
}

/** HTTP status carried by an Octokit request error, if any */
export function httpStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}
