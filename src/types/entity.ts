export type EntityKind = "issue" | "pull_request";

export const ENTITY_KINDS: readonly EntityKind[] = ["issue", "pull_request"];

/** An open issue or pull request as seen by one run. */
export interface TrackedEntity {
  id: number;
  kind: EntityKind;
  labels: string[];
  lastActivityAt: Date;
  /** Set exactly when the entity carries the stale label for its kind. */
  staleSince?: Date;
  createdAt?: Date;
  draft?: boolean;
  title?: string;
  url?: string;
}

/**
 * A tracker record before validation. Hosting APIs occasionally return
 * entities without a usable activity date; those are rejected by `evaluate`.
 */
export interface EntitySnapshot extends Omit<TrackedEntity, "lastActivityAt"> {
  lastActivityAt?: Date | null;
}

export function entityLabel(entity: Pick<TrackedEntity, "id" | "kind">): string {
  return entity.kind === "issue" ? `issue #${entity.id}` : `PR #${entity.id}`;
}
