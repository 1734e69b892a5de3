import { writeFileSync } from "node:fs";
import type { ApplyResult } from "../automation/apply-batch.js";
import { errorMessage } from "../errors.js";
import * as log from "../log.js";
import type { ScopedLog } from "../log.js";
import type {
  OperationBatch,
  OperationOutcome,
  Provider,
  RepoRunCounts,
  RepoRunReport,
  RunReport,
  WebhookConfig,
} from "../types.js";
import { COUNT_KEYS, emptyCounts } from "../types.js";

export function buildRepoReport(
  repository: string,
  provider: Provider,
  evaluated: number,
  batch: OperationBatch,
  result: ApplyResult,
): RepoRunReport {
  const counts = emptyCounts();
  counts.evaluated = evaluated;
  counts.skipped = batch.skipped.length;
  counts.planned = batch.operations.length;
  counts.truncated = batch.truncated;
  counts.applied = result.applied.length;
  counts.failed = result.failed.length;

  for (const op of result.applied) {
    if (op.kind === "mark-stale") counts.markedStale++;
    else if (op.kind === "unmark-stale") counts.unmarkedStale++;
    else counts.closed++;
  }

  const outcomes: OperationOutcome[] = result.dryRun
    ? batch.operations.map((op): OperationOutcome => ({
        entityId: op.entityId,
        entityKind: op.entityKind,
        operation: op.kind,
        status: "dry-run",
      }))
    : [
        ...result.applied.map((op): OperationOutcome => ({
          entityId: op.entityId,
          entityKind: op.entityKind,
          operation: op.kind,
          status: "applied",
        })),
        ...result.failed.map((f): OperationOutcome => ({
          entityId: f.operation.entityId,
          entityKind: f.operation.entityKind,
          operation: f.operation.kind,
          status: "failed",
          error: f.message,
        })),
      ];

  return {
    repository,
    provider,
    status: "ok",
    counts,
    outcomes,
    skipped: batch.skipped.map((s) => ({ entityId: s.entityId, reason: s.error.message })),
  };
}

export function failedRepoReport(repository: string, provider: Provider, err: unknown): RepoRunReport {
  return {
    repository,
    provider,
    status: "failed",
    error: errorMessage(err),
    counts: emptyCounts(),
    outcomes: [],
    skipped: [],
  };
}

function addCounts(into: RepoRunCounts, from: RepoRunCounts): void {
  for (const key of COUNT_KEYS) {
    into[key] += from[key];
  }
}

export function buildRunReport(
  repositories: RepoRunReport[],
  version: string,
  dryRun: boolean,
  now: Date = new Date(),
): RunReport {
  const totals = emptyCounts();
  for (const repo of repositories) addCounts(totals, repo.counts);
  return { generatedAt: now.toISOString(), version, dryRun, repositories, totals };
}

export function writeRunReport(report: RunReport, destination: string): void {
  const json = JSON.stringify(report, null, 2);
  if (destination === "-") {
    process.stdout.write(json + "\n");
  } else {
    writeFileSync(destination, json + "\n", "utf-8");
    log.success(`Run report written to ${destination}`);
  }
}

/** Failures are logged, not thrown. */
export async function sendWebhookPayload(
  payload: unknown,
  config: WebhookConfig,
  out: ScopedLog = log,
): Promise<void> {
  const method = config.method ?? "POST";
  try {
    const response = await fetch(config.url, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...config.headers,
      },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      out.warn(`Webhook ${method} to ${config.url} returned ${response.status}: ${response.statusText}`);
      return;
    }
    out.success(`Webhook ${method} to ${config.url} succeeded (${response.status})`);
  } catch (err: unknown) {
    out.warn(`Webhook ${method} to ${config.url} failed: ${errorMessage(err)}`);
  }
}
