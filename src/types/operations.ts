import type { EntityKind } from "./entity.js";
import type { CloseReason } from "./policy.js";
import type { InvalidEntityError } from "../errors.js";

interface OperationTarget {
  entityId: number;
  entityKind: EntityKind;
}

export interface MarkStaleOperation extends OperationTarget {
  kind: "mark-stale";
  addLabel: string;
  comment?: string;
  markStaleSince: Date;
}

export interface UnmarkStaleOperation extends OperationTarget {
  kind: "unmark-stale";
  removeLabel: string;
}

export interface CloseOperation extends OperationTarget {
  kind: "close";
  comment?: string;
  /** Only set for issues; pull requests have no close reason. */
  closeReason?: CloseReason;
  addLabel?: string;
}

export type Operation = MarkStaleOperation | UnmarkStaleOperation | CloseOperation;

export type OperationKind = Operation["kind"];

export interface SkippedEntity {
  entityId: number;
  error: InvalidEntityError;
}

export interface OperationBatch {
  operations: Operation[];
  skipped: SkippedEntity[];
  /** Operations dropped by the per-run limit. */
  truncated: number;
}

export type MutationCommand = "add-label" | "remove-label" | "post-comment" | "close" | "record-stale-since";
