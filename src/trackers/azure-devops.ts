import type { IGitApi } from "azure-devops-node-api/GitApi.js";
import {
  CommentThreadStatus,
  CommentType,
  PullRequestStatus,
  type GitPullRequest,
  type GitPullRequestCommentThread,
} from "azure-devops-node-api/interfaces/GitInterfaces.js";
import { DEFAULT_CONCURRENCY, runConcurrent } from "../concurrency.js";
import { hasLabel } from "../lifecycle/labels.js";
import { latestDate } from "../lifecycle/staleness.js";
import * as log from "../log.js";
import { withRetry } from "../retry.js";
import type { AzureDevOpsTarget, EntitySnapshot } from "../types.js";
import { repositoryLabel } from "../types.js";
import { repositoryUrl } from "../repo-url.js";
import type { EntityRef, EntityTracker } from "./tracker.js";
import { parseDate } from "./tracker.js";

/** Pull request property holding the ISO time the stale label was applied. */
export const STALE_SINCE_PROPERTY = "StaleSweeper.StaleSince";
/** Marks comment threads posted by the sweeper so they never count as activity. */
export const GENERATED_THREAD_PROPERTY = "StaleSweeper.Generated";

const PAGE_SIZE = 100;

export type AdoGitApi = Pick<
  IGitApi,
  | "getPullRequests"
  | "getThreads"
  | "getPullRequestProperties"
  | "updatePullRequestProperties"
  | "createPullRequestLabel"
  | "deletePullRequestLabels"
  | "createThread"
  | "updatePullRequest"
>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Read one value from a PropertiesCollection, which the REST API serializes as
 * `{ "Key": { "$type": "System.String", "$value": "…" } }` (sometimes under `value`).
 */
export function readProperty(collection: unknown, key: string): string | undefined {
  if (!isRecord(collection)) return undefined;
  const bag = isRecord(collection.value) ? collection.value : collection;
  const entry = bag[key];
  if (typeof entry === "string") return entry;
  if (isRecord(entry) && typeof entry.$value === "string") return entry.$value;
  return undefined;
}

function isGeneratedThread(thread: GitPullRequestCommentThread): boolean {
  return readProperty(thread.properties, GENERATED_THREAD_PROPERTY) !== undefined;
}

/**
 * Latest human activity: creation, the last source push, and any comment
 * outside system threads and the sweeper's own threads.
 */
export function lastPullRequestActivity(
  pr: GitPullRequest,
  threads: readonly GitPullRequestCommentThread[],
): Date | undefined {
  const dates: (Date | undefined)[] = [
    parseDate(pr.creationDate),
    parseDate(pr.lastMergeSourceCommit?.committer?.date),
  ];
  for (const thread of threads) {
    if (thread.isDeleted || isGeneratedThread(thread)) continue;
    for (const c of thread.comments ?? []) {
      if (c.isDeleted || c.commentType === CommentType.System) continue;
      dates.push(parseDate(c.lastUpdatedDate ?? c.publishedDate));
    }
  }
  return latestDate(dates);
}

/**
 * Azure DevOps pull requests. Work items are not handled: they have tags
 * rather than labels and a per-process state model instead of "closed".
 */
export class AzureDevOpsTracker implements EntityTracker {
  readonly provider = "azure-devops";
  readonly label: string;
  private readonly repositoryId: string;
  private readonly project: string;
  private readonly baseUrl: string;

  constructor(
    private readonly gitApi: AdoGitApi,
    target: AzureDevOpsTarget,
    private readonly staleLabel: string,
    private readonly ascending = false,
  ) {
    this.label = repositoryLabel(target);
    this.repositoryId = target.repository;
    this.project = target.project;
    this.baseUrl = repositoryUrl(target);
  }

  private async fetchActivePullRequests(): Promise<GitPullRequest[]> {
    const all: GitPullRequest[] = [];
    for (let skip = 0; ; skip += PAGE_SIZE) {
      const page = await withRetry(`Fetch pull requests in ${this.label} (skip ${skip})`, () =>
        this.gitApi.getPullRequests(
          this.repositoryId,
          { status: PullRequestStatus.Active },
          this.project,
          undefined,
          skip,
          PAGE_SIZE,
        ),
      );
      all.push(...page);
      if (page.length < PAGE_SIZE) return all;
    }
  }

  async listOpen(): Promise<EntitySnapshot[]> {
    const prs = await this.fetchActivePullRequests();
    log.debug(`${this.label}: API returned ${prs.length} active pull requests`);

    const snapshots = await runConcurrent(prs, DEFAULT_CONCURRENCY, (pr) => this.toSnapshot(pr));
    return snapshots.sort((a, b) => {
      const diff = (a.createdAt?.getTime() ?? 0) - (b.createdAt?.getTime() ?? 0);
      return this.ascending ? diff : -diff;
    });
  }

  private async toSnapshot(pr: GitPullRequest): Promise<EntitySnapshot> {
    const prId = pr.pullRequestId ?? 0;
    const labels = (pr.labels ?? [])
      .filter((l) => l.active !== false)
      .map((l) => l.name ?? "")
      .filter((l) => l !== "");

    const threads = await withRetry(`Fetch threads for PR #${prId}`, () =>
      this.gitApi.getThreads(this.repositoryId, prId, this.project),
    );
    const lastActivityAt = lastPullRequestActivity(pr, threads);

    let staleSince: Date | undefined;
    if (hasLabel(labels, this.staleLabel)) {
      const properties: unknown = await withRetry(`Fetch properties for PR #${prId}`, () =>
        this.gitApi.getPullRequestProperties(this.repositoryId, prId, this.project),
      );
      staleSince = parseDate(readProperty(properties, STALE_SINCE_PROPERTY));
      if (!staleSince) {
        // label applied by hand: treat that as the latest activity
        log.debug(`  #${prId} — '${this.staleLabel}' has no recorded date, using last activity`);
        staleSince = lastActivityAt;
      }
    }

    return {
      id: prId,
      kind: "pull_request",
      title: pr.title ?? "(no title)",
      url: `${this.baseUrl}/pullrequest/${prId}`,
      labels,
      createdAt: parseDate(pr.creationDate),
      draft: pr.isDraft ?? false,
      staleSince,
      lastActivityAt,
    };
  }

  async addLabel(entity: EntityRef, label: string): Promise<void> {
    await this.gitApi.createPullRequestLabel({ name: label }, this.repositoryId, entity.id, this.project);
  }

  async removeLabel(entity: EntityRef, label: string): Promise<void> {
    await this.gitApi.deletePullRequestLabels(this.repositoryId, entity.id, label, this.project);
  }

  async postComment(entity: EntityRef, body: string): Promise<void> {
    await this.gitApi.createThread(
      {
        comments: [{ content: body, commentType: CommentType.Text }],
        status: CommentThreadStatus.Closed,
        properties: {
          [GENERATED_THREAD_PROPERTY]: { $type: "System.String", $value: "true" },
        },
      },
      this.repositoryId,
      entity.id,
      this.project,
    );
  }

  async close(entity: EntityRef): Promise<void> {
    await this.gitApi.updatePullRequest(
      { status: PullRequestStatus.Abandoned },
      this.repositoryId,
      entity.id,
      this.project,
    );
  }

  async recordStaleSince(entity: EntityRef, at: Date | undefined): Promise<void> {
    const patch = at
      ? [{ op: "add", path: `/${STALE_SINCE_PROPERTY}`, value: at.toISOString() }]
      : [{ op: "remove", path: `/${STALE_SINCE_PROPERTY}` }];
    await this.gitApi.updatePullRequestProperties(null, patch, this.repositoryId, entity.id, this.project);
  }
}
