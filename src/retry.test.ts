import { describe, it, expect, vi } from "vitest";
import { NonRetryableError, httpStatus, isRetryable, withRetry } from "./retry.js";

function httpError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("httpStatus", () => {
  it("reads octokit and azure-devops-node-api error shapes", () => {
    expect(httpStatus(httpError(404))).toBe(404);
    expect(httpStatus(Object.assign(new Error("boom"), { statusCode: 503 }))).toBe(503);
    expect(httpStatus(new Error("plain"))).toBeUndefined();
    expect(httpStatus("text")).toBeUndefined();
  });
});

describe("isRetryable", () => {
  it("does not retry client errors or NonRetryableError", () => {
    expect(isRetryable(httpError(401))).toBe(false);
    expect(isRetryable(httpError(422))).toBe(false);
    expect(isRetryable(new NonRetryableError("bad token"))).toBe(false);
  });

  it("retries server errors, rate limits and network failures", () => {
    expect(isRetryable(httpError(500))).toBe(true);
    expect(isRetryable(httpError(429))).toBe(true);
    expect(isRetryable(new Error("ECONNRESET"))).toBe(true);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(httpError(502)).mockResolvedValueOnce("ok");
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(withRetry("Fetch", fn, { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2_000);
  });

  it("backs off exponentially up to the cap", async () => {
    const err = httpError(503);
    const fn = vi.fn().mockRejectedValue(err);
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(withRetry("Fetch", fn, { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 300, sleep })).rejects.toBe(
      err,
    );
    expect(fn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200, 300]);
  });

  it("gives up immediately on a non-retryable error", async () => {
    const err = httpError(404);
    const fn = vi.fn().mockRejectedValue(err);
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(withRetry("Fetch", fn, { sleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
