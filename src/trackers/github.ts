import { DEFAULT_CONCURRENCY, runConcurrent } from "../concurrency.js";
import { hasLabel, normalizeLabel } from "../lifecycle/labels.js";
import { effectiveLastActivity } from "../lifecycle/staleness.js";
import { withRetry } from "../retry.js";
import type { CloseReason, EntityKind, EntitySnapshot, GitHubTarget } from "../types.js";
import { repositoryLabel } from "../types.js";
import type { GitHubIssue, GitHubIssueApi, GitHubLabelEvent } from "./github-client.js";
import type { EntityRef, EntityTracker } from "./tracker.js";
import { parseDate } from "./tracker.js";

/** When the stale label was last applied, from the issue's event history. */
export function staleLabeledAt(events: readonly GitHubLabelEvent[], staleLabel: string): Date | undefined {
  const wanted = normalizeLabel(staleLabel);
  let latest: Date | undefined;
  for (const e of events) {
    if (e.event !== "labeled" || normalizeLabel(e.label) !== wanted) continue;
    const at = parseDate(e.createdAt);
    if (at && (!latest || at > latest)) latest = at;
  }
  return latest;
}

export class GitHubTracker implements EntityTracker {
  readonly provider = "github";
  readonly label: string;

  constructor(
    private readonly api: GitHubIssueApi,
    target: GitHubTarget,
    private readonly staleLabels: Record<EntityKind, string>,
    private readonly ascending = false,
  ) {
    this.label = repositoryLabel(target);
  }

  async listOpen(): Promise<EntitySnapshot[]> {
    const issues = await withRetry(`List open issues in ${this.label}`, () =>
      this.api.listOpenIssues(this.ascending ? "asc" : "desc"),
    );
    return runConcurrent(issues, DEFAULT_CONCURRENCY, (issue) => this.toSnapshot(issue));
  }

  private async toSnapshot(issue: GitHubIssue): Promise<EntitySnapshot> {
    const kind: EntityKind = issue.isPullRequest ? "pull_request" : "issue";
    const staleLabel = this.staleLabels[kind];

    let staleSince: Date | undefined;
    if (hasLabel(issue.labels, staleLabel)) {
      const events = await withRetry(`List events for #${issue.number}`, () =>
        this.api.listLabelEvents(issue.number),
      );
      staleSince = staleLabeledAt(events, staleLabel);
    }

    const updatedAt = parseDate(issue.updatedAt);
    return {
      id: issue.number,
      kind,
      title: issue.title,
      url: issue.url,
      labels: issue.labels,
      createdAt: parseDate(issue.createdAt),
      draft: issue.isPullRequest ? issue.draft : undefined,
      staleSince,
      // updated_at also moves when the sweeper labels and comments
      lastActivityAt: updatedAt && effectiveLastActivity(updatedAt, staleSince),
    };
  }

  async addLabel(entity: EntityRef, label: string): Promise<void> {
    await this.api.addLabels(entity.id, [label]);
  }

  async removeLabel(entity: EntityRef, label: string): Promise<void> {
    await this.api.removeLabel(entity.id, label);
  }

  async postComment(entity: EntityRef, body: string): Promise<void> {
    await this.api.createComment(entity.id, body);
  }

  async close(entity: EntityRef, reason?: CloseReason): Promise<void> {
    if (entity.kind === "pull_request") {
      await this.api.closePullRequest(entity.id);
    } else {
      await this.api.closeIssue(entity.id, reason);
    }
  }
}
