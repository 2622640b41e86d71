import { describe, it, expect, vi } from "vitest";
import { withRetry, isTransientError } from "../../src/utils/retry.js";
import { httpError } from "../fixtures/fake-client.js";

describe("isTransientError", () => {
  it("retries rate limits and server errors only", () => {
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(500))).toBe(true);
    expect(isTransientError(httpError(404))).toBe(false);
    expect(isTransientError(new Error("socket hang up"))).toBe(false);
    expect(isTransientError("boom")).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn<() => Promise<string>>().mockResolvedValue("ok");

    expect(await withRetry(fn)).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("uses a custom retry predicate", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, retryOn: () => true });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
