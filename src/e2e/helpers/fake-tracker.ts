import { vi } from "vitest";
import type { Mock } from "vitest";
import type { ScopedLog } from "../../log.js";
import type { EntityRef, EntityTracker } from "../../trackers/tracker.js";
import type { CloseReason, EntitySnapshot, Provider } from "../../types.js";

/**
 * In-memory tracker that records every mutation as a readable line, e.g.
 * `add-label #1 Stale`. Lines added to `failing` throw instead.
 */
export class FakeTracker implements EntityTracker {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();

  constructor(
    public entities: EntitySnapshot[] = [],
    readonly label = "acme/widgets",
    readonly provider: Provider = "github",
  ) {}

  protected record(call: string): void {
    this.calls.push(call);
    if (this.failing.has(call)) {
      throw Object.assign(new Error(`${call} rejected`), { status: 500 });
    }
  }

  async listOpen(): Promise<EntitySnapshot[]> {
    return this.entities;
  }

  async addLabel(entity: EntityRef, label: string): Promise<void> {
    this.record(`add-label #${entity.id} ${label}`);
  }

  async removeLabel(entity: EntityRef, label: string): Promise<void> {
    this.record(`remove-label #${entity.id} ${label}`);
  }

  async postComment(entity: EntityRef, body: string): Promise<void> {
    this.record(`comment #${entity.id} ${body}`);
  }

  async close(entity: EntityRef, reason?: CloseReason): Promise<void> {
    this.record(reason ? `close #${entity.id} ${reason}` : `close #${entity.id}`);
  }
}

/** A tracker that persists the stale-since date itself, as Azure DevOps does. */
export class RecordingFakeTracker extends FakeTracker {
  async recordStaleSince(entity: EntityRef, at: Date | undefined): Promise<void> {
    this.record(`stale-since #${entity.id} ${at ? at.toISOString() : "cleared"}`);
  }
}

type LogFn = (message: string) => void;

export type MockLog = { [K in keyof ScopedLog]: Mock<LogFn> };

export function silentLog(): MockLog {
  return {
    info: vi.fn<LogFn>(),
    success: vi.fn<LogFn>(),
    warn: vi.fn<LogFn>(),
    error: vi.fn<LogFn>(),
    debug: vi.fn<LogFn>(),
  };
}
