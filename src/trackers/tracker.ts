import type { CloseReason, EntitySnapshot, Provider, TrackedEntity } from "../types.js";

export type EntityRef = Pick<TrackedEntity, "id" | "kind">;

/**
 * The hosting service as seen by the sweeper: a query for open entities and
 * the mutation commands an OperationBatch is made of.
 */
export interface EntityTracker {
  readonly provider: Provider;
  /** Repository label used in logs and reports. */
  readonly label: string;

  listOpen(): Promise<EntitySnapshot[]>;
  addLabel(entity: EntityRef, label: string): Promise<void>;
  removeLabel(entity: EntityRef, label: string): Promise<void>;
  postComment(entity: EntityRef, body: string): Promise<void>;
  close(entity: EntityRef, reason?: CloseReason): Promise<void>;

  /**
   * Persist when an entity was marked stale (`undefined` clears it). Only
   * trackers whose service keeps no label history implement this.
   */
  recordStaleSince?(entity: EntityRef, at: Date | undefined): Promise<void>;
}

export function parseDate(value: string | Date | null | undefined): Date | undefined {
  if (value === null || value === undefined) return undefined;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
