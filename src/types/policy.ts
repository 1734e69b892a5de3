import type { EntityKind } from "./entity.js";

export type CloseReason = "completed" | "not_planned";

export const CLOSE_REASONS: readonly CloseReason[] = ["completed", "not_planned"];

export interface KindPolicy {
  daysBeforeStale: number;
  daysBeforeClose: number;
  exemptLabels: string[];
  staleLabel: string;
  /** Empty string means no comment is posted. */
  staleMessage: string;
  closeMessage: string;
  closeLabel?: string;
}

export interface PolicyConfig {
  perKind: Record<EntityKind, KindPolicy>;
  /** When non-empty, only entities carrying at least one of these are processed. */
  requiredAnyLabels: string[];
  closeIssueReason: CloseReason;
  removeStaleWhenUpdated: boolean;
  exemptDraftPr: boolean;
  /** Upper bound on operations issued for one repository per run. */
  maxOperationsPerRun: number;
}

export const DEFAULT_DAYS_BEFORE_STALE = 60;
export const DEFAULT_DAYS_BEFORE_CLOSE = 7;
export const DEFAULT_STALE_LABEL = "stale";
export const DEFAULT_OPERATIONS_PER_RUN = 30;
export const DEFAULT_CLOSE_REASON: CloseReason = "completed";
