import type { ApplyResult } from "../apply-batch.js";
import type { ScopedLog } from "../../log.js";
import type { EntityTracker } from "../../trackers/tracker.js";
import type { EntitySnapshot, OperationBatch, RepoRunReport } from "../../types.js";

/** Read-only view of one repository's sweep, handed to post-run hooks. */
export interface RunContext {
  tracker: EntityTracker;
  entities: readonly EntitySnapshot[];
  batch: OperationBatch;
  result: ApplyResult;
  report: RepoRunReport;
  dryRun: boolean;
  now: Date;
  log: ScopedLog;
}

export interface PostRunHook {
  readonly name: string;
  run(context: RunContext): Promise<void>;
}
