import { InvalidConfigError, InvalidEntityError } from "../errors.js";
import { CLOSE_REASONS, ENTITY_KINDS } from "../types.js";
import type { EntitySnapshot, PolicyConfig, TrackedEntity } from "../types.js";
import { hasLabel } from "./labels.js";

/** Activity dated this far past `now` is still accepted as "now". */
export const CLOCK_SKEW_MS = 5 * 60 * 1000;

function checkDays(problems: string[], name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    problems.push(`${name} must be a non-negative integer (got ${value})`);
  }
}

export function policyProblems(config: PolicyConfig): string[] {
  const problems: string[] = [];

  for (const kind of ENTITY_KINDS) {
    const policy = config.perKind[kind];
    const prefix = kind === "issue" ? "issue" : "pull request";
    checkDays(problems, `${prefix} daysBeforeStale`, policy.daysBeforeStale);
    checkDays(problems, `${prefix} daysBeforeClose`, policy.daysBeforeClose);
    if (policy.staleLabel.trim() === "") {
      problems.push(`${prefix} stale label must not be empty`);
    }
  }

  if (!Number.isInteger(config.maxOperationsPerRun) || config.maxOperationsPerRun <= 0) {
    problems.push(`operationsPerRun must be a positive integer (got ${config.maxOperationsPerRun})`);
  }
  if (!CLOSE_REASONS.includes(config.closeIssueReason)) {
    problems.push(`closeIssueReason must be one of ${CLOSE_REASONS.join(", ")} (got ${config.closeIssueReason})`);
  }

  return problems;
}

export function assertValidPolicy(config: PolicyConfig, source?: string): void {
  const problems = policyProblems(config);
  if (problems.length > 0) {
    throw new InvalidConfigError(problems, source);
  }
}

/**
 * Turn a tracker snapshot into a TrackedEntity, or explain why it cannot be
 * trusted. Activity slightly in the future is clamped to `now`.
 */
export function validateEntity(
  snapshot: EntitySnapshot,
  config: PolicyConfig,
  now: Date,
): TrackedEntity | InvalidEntityError {
  const { lastActivityAt, staleSince } = snapshot;

  if (!lastActivityAt || Number.isNaN(lastActivityAt.getTime())) {
    return new InvalidEntityError(snapshot.id, "missing last activity date");
  }
  if (lastActivityAt.getTime() - now.getTime() > CLOCK_SKEW_MS) {
    return new InvalidEntityError(
      snapshot.id,
      `last activity ${lastActivityAt.toISOString()} is in the future`,
    );
  }
  if (staleSince && Number.isNaN(staleSince.getTime())) {
    return new InvalidEntityError(snapshot.id, "invalid stale-since date");
  }

  const staleLabel = config.perKind[snapshot.kind].staleLabel;
  const labeled = hasLabel(snapshot.labels, staleLabel);
  if (labeled && !staleSince) {
    return new InvalidEntityError(snapshot.id, `carries '${staleLabel}' but has no stale-since date`);
  }
  if (!labeled && staleSince) {
    return new InvalidEntityError(snapshot.id, `has a stale-since date but no '${staleLabel}' label`);
  }

  return {
    ...snapshot,
    lastActivityAt: lastActivityAt.getTime() > now.getTime() ? now : lastActivityAt,
  };
}
