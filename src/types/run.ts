import type { Provider } from "./repository.js";
import type { EntityKind } from "./entity.js";
import type { OperationKind } from "./operations.js";

export interface OperationOutcome {
  entityId: number;
  entityKind: EntityKind;
  operation: OperationKind;
  status: "applied" | "failed" | "dry-run";
  error?: string;
}

export interface RepoRunCounts {
  evaluated: number;
  skipped: number;
  planned: number;
  truncated: number;
  applied: number;
  failed: number;
  markedStale: number;
  unmarkedStale: number;
  closed: number;
}

export interface RepoRunReport {
  repository: string;
  provider: Provider;
  status: "ok" | "failed";
  error?: string;
  counts: RepoRunCounts;
  outcomes: OperationOutcome[];
  skipped: { entityId: number; reason: string }[];
}

export interface RunReport {
  generatedAt: string;
  version: string;
  dryRun: boolean;
  repositories: RepoRunReport[];
  totals: RepoRunCounts;
}

export const COUNT_KEYS = [
  "evaluated",
  "skipped",
  "planned",
  "truncated",
  "applied",
  "failed",
  "markedStale",
  "unmarkedStale",
  "closed",
] as const satisfies readonly (keyof RepoRunCounts)[];

export function emptyCounts(): RepoRunCounts {
  return {
    evaluated: 0,
    skipped: 0,
    planned: 0,
    truncated: 0,
    applied: 0,
    failed: 0,
    markedStale: 0,
    unmarkedStale: 0,
    closed: 0,
  };
}
