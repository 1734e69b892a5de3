import { MutationFailure } from "../errors.js";
import type { ScopedLog } from "../log.js";
import * as log from "../log.js";
import type { EntityTracker } from "../trackers/tracker.js";
import type { MutationCommand, Operation, OperationBatch } from "../types.js";
import { entityLabel } from "../types.js";

export interface ApplyOptions {
  dryRun?: boolean;
  log?: ScopedLog;
}

export interface ApplyResult {
  applied: Operation[];
  failed: MutationFailure[];
  dryRun: boolean;
}

type Step = [MutationCommand, () => Promise<void>];

function stepsFor(tracker: EntityTracker, op: Operation): Step[] {
  const entity = { id: op.entityId, kind: op.entityKind };
  const steps: Step[] = [];

  switch (op.kind) {
    case "mark-stale": {
      const { addLabel, comment, markStaleSince } = op;
      // The label goes on last: trackers date staleness from it, and any
      // later update counts as activity.
      if (comment) steps.push(["post-comment", () => tracker.postComment(entity, comment)]);
      steps.push(["add-label", () => tracker.addLabel(entity, addLabel)]);
      if (tracker.recordStaleSince) {
        const record = tracker.recordStaleSince.bind(tracker);
        steps.push(["record-stale-since", () => record(entity, markStaleSince)]);
      }
      break;
    }

    case "unmark-stale": {
      const { removeLabel } = op;
      steps.push(["remove-label", () => tracker.removeLabel(entity, removeLabel)]);
      if (tracker.recordStaleSince) {
        const record = tracker.recordStaleSince.bind(tracker);
        steps.push(["record-stale-since", () => record(entity, undefined)]);
      }
      break;
    }

    case "close": {
      const { comment, addLabel, closeReason } = op;
      if (comment) steps.push(["post-comment", () => tracker.postComment(entity, comment)]);
      if (addLabel) steps.push(["add-label", () => tracker.addLabel(entity, addLabel)]);
      steps.push(["close", () => tracker.close(entity, closeReason)]);
      break;
    }
  }

  return steps;
}

export function describeOperation(op: Operation): string {
  const target = entityLabel({ id: op.entityId, kind: op.entityKind });
  switch (op.kind) {
    case "mark-stale":
      return `mark ${target} stale ('${op.addLabel}')`;
    case "unmark-stale":
      return `remove '${op.removeLabel}' from ${target}`;
    case "close":
      return op.closeReason ? `close ${target} as ${op.closeReason}` : `close ${target}`;
  }
}

/**
 * Apply a batch in order. A failing command ends its operation only; the
 * failure is recorded and the next operation proceeds. Nothing is retried.
 */
export async function applyBatch(
  tracker: EntityTracker,
  batch: OperationBatch,
  options: ApplyOptions = {},
): Promise<ApplyResult> {
  const out = options.log ?? log;
  const dryRun = options.dryRun ?? false;
  const result: ApplyResult = { applied: [], failed: [], dryRun };

  for (const op of batch.operations) {
    if (dryRun) {
      out.info(`[DRY RUN] Would ${describeOperation(op)}`);
      continue;
    }

    let failure: MutationFailure | undefined;
    for (const [command, run] of stepsFor(tracker, op)) {
      try {
        await run();
      } catch (err: unknown) {
        failure = new MutationFailure(op, command, err);
        break;
      }
    }

    if (failure) {
      out.warn(`Failed to ${describeOperation(op)}: ${failure.message}`);
      result.failed.push(failure);
    } else {
      out.debug(`Done: ${describeOperation(op)}`);
      result.applied.push(op);
    }
  }

  return result;
}
