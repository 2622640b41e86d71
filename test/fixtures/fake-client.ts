import { vi } from "vitest";
import type { GitHubClient } from "../../src/github/client.js";
import type { FilePatch } from "../../src/diff/parser.js";

export interface FakeClientOptions {
  diff?: string;
  files?: FilePatch[];
  /** Contents of `.hunkmap.yml`, null when the repository has none */
  configYaml?: string | null;
  reviewId?: number;
}

export function createFakeClient(options: FakeClientOptions = {}) {
  return {
    getPullRequestDiff: vi.fn<GitHubClient["getPullRequestDiff"]>().mockResolvedValue(options.diff ?? ""),
    listPullRequestFiles: vi.fn<GitHubClient["listPullRequestFiles"]>().mockResolvedValue(options.files ?? []),
    getFileContent: vi.fn<GitHubClient["getFileContent"]>().mockResolvedValue(options.configYaml ?? null),
    createPendingReview: vi.fn<GitHubClient["createPendingReview"]>().mockResolvedValue(options.reviewId ?? 1),
  } satisfies GitHubClient;
}

export function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}
