import * as log from "./log.js";
import { errorMessage } from "./errors.js";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** Thrown (or mapped to) for failures a retry cannot fix: bad credentials, missing repository. */
export class NonRetryableError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NonRetryableError";
    this.status = status;
  }
}

const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 410, 422]);

/** octokit errors carry `status`, azure-devops-node-api errors `statusCode`. */
export function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

/**
 * Client errors other than rate limiting (403 with a retry hint is handled by
 * octokit's throttling plugin before it reaches us) will fail the same way again.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof NonRetryableError) return false;
  const status = httpStatus(err);
  return status === undefined || !NON_RETRYABLE_STATUSES.has(status);
}

const DEFAULTS = {
  maxAttempts: 4,
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
  sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
} satisfies Required<RetryOptions>;

/** Retry a read with exponential backoff. Mutations are never retried within a run. */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, sleep } = { ...DEFAULTS, ...opts };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isRetryable(err)) {
        throw err;
      }

      const msg = errorMessage(err);
      if (attempt >= maxAttempts) {
        log.error(`${label} failed after ${maxAttempts} attempts: ${msg}`);
        throw err;
      }

      const delayMs = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      log.warn(
        `${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${(delayMs / 1000).toFixed(1)}s… — ${msg}`,
      );
      await sleep(delayMs);
    }
  }
}
