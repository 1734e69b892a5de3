import type {
  EntitySnapshot,
  Operation,
  OperationBatch,
  OperationKind,
  PolicyConfig,
  SkippedEntity,
  TrackedEntity,
} from "../types.js";
import { hasAnyLabel } from "./labels.js";
import { daysSince } from "./staleness.js";
import { assertValidPolicy, validateEntity } from "./validate.js";

// Closing removes an entity from every future run, so it goes first.
const PRIORITY: Record<OperationKind, number> = {
  close: 0,
  "unmark-stale": 1,
  "mark-stale": 2,
};

function isExempt(entity: TrackedEntity, config: PolicyConfig): boolean {
  if (config.requiredAnyLabels.length > 0 && !hasAnyLabel(entity.labels, config.requiredAnyLabels)) {
    return true;
  }
  if (hasAnyLabel(entity.labels, config.perKind[entity.kind].exemptLabels)) {
    return true;
  }
  return entity.kind === "pull_request" && config.exemptDraftPr && entity.draft === true;
}

function decide(entity: TrackedEntity, config: PolicyConfig, now: Date): Operation | null {
  const policy = config.perKind[entity.kind];
  const target = { entityId: entity.id, entityKind: entity.kind };

  if (!entity.staleSince) {
    if (daysSince(entity.lastActivityAt, now) < policy.daysBeforeStale) return null;
    return {
      ...target,
      kind: "mark-stale",
      addLabel: policy.staleLabel,
      comment: policy.staleMessage || undefined,
      markStaleSince: now,
    };
  }

  const updatedSinceStale = entity.lastActivityAt.getTime() > entity.staleSince.getTime();
  if (updatedSinceStale && config.removeStaleWhenUpdated) {
    return { ...target, kind: "unmark-stale", removeLabel: policy.staleLabel };
  }

  if (daysSince(entity.staleSince, now) < policy.daysBeforeClose) return null;
  return {
    ...target,
    kind: "close",
    comment: policy.closeMessage || undefined,
    closeReason: entity.kind === "issue" ? config.closeIssueReason : undefined,
    addLabel: policy.closeLabel || undefined,
  };
}

/**
 * Decide which open entities become stale, return to fresh, or close.
 *
 * Pure: the returned batch describes mutations, the caller applies them.
 * Throws InvalidConfigError for an unusable policy; entities that cannot be
 * trusted are reported in `skipped` and do not affect the others.
 */
export function evaluate(
  entities: readonly EntitySnapshot[],
  config: PolicyConfig,
  now: Date = new Date(),
): OperationBatch {
  assertValidPolicy(config);

  const skipped: SkippedEntity[] = [];
  const operations: Operation[] = [];

  for (const snapshot of entities) {
    const entity = validateEntity(snapshot, config, now);
    if (entity instanceof Error) {
      skipped.push({ entityId: snapshot.id, error: entity });
      continue;
    }
    if (isExempt(entity, config)) continue;

    const op = decide(entity, config, now);
    if (op) operations.push(op);
  }

  // Array.prototype.sort is stable, so input order holds within a priority
  operations.sort((a, b) => PRIORITY[a.kind] - PRIORITY[b.kind]);

  const limit = config.maxOperationsPerRun;
  const truncated = Math.max(0, operations.length - limit);
  return {
    operations: truncated > 0 ? operations.slice(0, limit) : operations,
    skipped,
    truncated,
  };
}
