import { describe, it, expect, vi, afterEach } from "vitest";
import { Octokit, RequestError } from "octokit";
import { applyBatch } from "../automation/apply-batch.js";
import { resolvePolicy } from "../config.js";
import { silentLog } from "../e2e/helpers/fake-tracker.js";
import { evaluate } from "../lifecycle/evaluate.js";
import { createGitHubIssueApi, getOctokit, onRateLimit, onSecondaryRateLimit } from "./github-client.js";
import type { GitHubIssue, GitHubIssueApi, GitHubLabelEvent } from "./github-client.js";
import { GitHubTracker, staleLabeledAt } from "./github.js";

function makeIssue(overrides: Partial<GitHubIssue> = {}): GitHubIssue {
  return {
    number: 1,
    isPullRequest: false,
    title: "Test issue",
    url: "https://github.com/acme/widgets/issues/1",
    labels: [],
    createdAt: "2025-01-01T00:00:00Z",
    updatedAt: "2025-02-01T00:00:00Z",
    draft: false,
    ...overrides,
  };
}

function createFakeApi(issues: GitHubIssue[], events: Record<number, GitHubLabelEvent[]> = {}) {
  return {
    listOpenIssues: vi.fn(async () => issues),
    listLabelEvents: vi.fn(async (issueNumber: number) => events[issueNumber] ?? []),
    addLabels: vi.fn(async (_issueNumber: number, _labels: string[]) => {}),
    removeLabel: vi.fn(async () => {}),
    createComment: vi.fn(async (_issueNumber: number, _body: string) => {}),
    closeIssue: vi.fn(async () => {}),
    closePullRequest: vi.fn(async () => {}),
  } satisfies GitHubIssueApi;
}

const target = { provider: "github", owner: "acme", repo: "widgets" } as const;
const staleLabels = { issue: "Stale", pull_request: "Stale" };

describe("staleLabeledAt", () => {
  it("returns the latest time the label was applied", () => {
    const events: GitHubLabelEvent[] = [
      { event: "labeled", label: "Stale", createdAt: "2025-01-05T00:00:00Z" },
      { event: "unlabeled", label: "Stale", createdAt: "2025-01-06T00:00:00Z" },
      { event: "labeled", label: "stale", createdAt: "2025-02-10T00:00:00Z" },
      { event: "labeled", label: "bug", createdAt: "2025-02-20T00:00:00Z" },
    ];
    expect(staleLabeledAt(events, "Stale")).toEqual(new Date("2025-02-10T00:00:00Z"));
  });

  it("returns undefined when the label was never applied", () => {
    expect(staleLabeledAt([], "Stale")).toBeUndefined();
  });
});

describe("GitHubTracker", () => {
  it("builds snapshots for issues and pull requests", async () => {
    const api = createFakeApi(
      [
        makeIssue({ number: 1, labels: ["bug"] }),
        makeIssue({
          number: 2,
          isPullRequest: true,
          draft: true,
          labels: ["Stale"],
          url: "https://github.com/acme/widgets/pull/2",
          updatedAt: "2025-02-10T00:00:30Z",
        }),
      ],
      { 2: [{ event: "labeled", label: "Stale", createdAt: "2025-02-10T00:00:00Z" }] },
    );
    const tracker = new GitHubTracker(api, target, staleLabels);

    const snapshots = await tracker.listOpen();

    expect(api.listOpenIssues).toHaveBeenCalledWith("desc");
    expect(api.listLabelEvents).toHaveBeenCalledTimes(1);
    expect(api.listLabelEvents).toHaveBeenCalledWith(2);
    expect(snapshots[0]).toEqual({
      id: 1,
      kind: "issue",
      title: "Test issue",
      url: "https://github.com/acme/widgets/issues/1",
      labels: ["bug"],
      createdAt: new Date("2025-01-01T00:00:00Z"),
      draft: undefined,
      staleSince: undefined,
      lastActivityAt: new Date("2025-02-01T00:00:00Z"),
    });
    expect(snapshots[1]).toMatchObject({
      id: 2,
      kind: "pull_request",
      draft: true,
      staleSince: new Date("2025-02-10T00:00:00Z"),
      // the update from applying the label itself does not count
      lastActivityAt: new Date("2025-02-10T00:00:00Z"),
    });
  });

  it("keeps a human update made after the stale label", async () => {
    const api = createFakeApi([makeIssue({ labels: ["Stale"], updatedAt: "2025-02-12T08:00:00Z" })], {
      1: [{ event: "labeled", label: "Stale", createdAt: "2025-02-10T00:00:00Z" }],
    });

    const [snapshot] = await new GitHubTracker(api, target, staleLabels).listOpen();

    expect(snapshot.staleSince).toEqual(new Date("2025-02-10T00:00:00Z"));
    expect(snapshot.lastActivityAt).toEqual(new Date("2025-02-12T08:00:00Z"));
  });

  it("dates staleness from the label even when its own comment was held back", async () => {
    let clock = Date.parse("2025-02-10T00:00:00Z");
    const issue = makeIssue({ number: 7, updatedAt: "2025-01-01T00:00:00Z" });
    const events: GitHubLabelEvent[] = [];
    const api = createFakeApi([issue], { 7: events });
    api.createComment.mockImplementation(async () => {
      // rate limited for 90s before it lands
      clock += 90_000;
      issue.updatedAt = new Date(clock).toISOString();
    });
    api.addLabels.mockImplementation(async (_issueNumber, labels) => {
      clock += 1_000;
      const at = new Date(clock).toISOString();
      issue.labels.push(...labels);
      issue.updatedAt = at;
      events.push(...labels.map((label) => ({ event: "labeled" as const, label, createdAt: at })));
    });
    const tracker = new GitHubTracker(api, target, { issue: "stale", pull_request: "stale" });
    const policy = resolvePolicy({ daysBeforeStale: 30, staleIssueMessage: "Going stale" });

    const first = evaluate(await tracker.listOpen(), policy, new Date("2025-02-10T00:00:00Z"));
    expect(first.operations.map((o) => o.kind)).toEqual(["mark-stale"]);
    await applyBatch(tracker, first, { log: silentLog() });

    const [snapshot] = await tracker.listOpen();
    expect(snapshot.staleSince).toEqual(new Date("2025-02-10T00:01:31Z"));
    expect(snapshot.lastActivityAt).toEqual(new Date("2025-02-10T00:01:31Z"));
    expect(evaluate([snapshot], policy, new Date("2025-02-11T00:00:00Z")).operations).toEqual([]);
  });

  it("lists oldest first when ascending", async () => {
    const api = createFakeApi([]);
    await new GitHubTracker(api, target, staleLabels, true).listOpen();
    expect(api.listOpenIssues).toHaveBeenCalledWith("asc");
  });

  it("closes issues with a reason and pull requests without", async () => {
    const api = createFakeApi([]);
    const tracker = new GitHubTracker(api, target, staleLabels);

    await tracker.close({ id: 1, kind: "issue" }, "completed");
    await tracker.close({ id: 2, kind: "pull_request" });

    expect(api.closeIssue).toHaveBeenCalledWith(1, "completed");
    expect(api.closePullRequest).toHaveBeenCalledWith(2);
  });

  it("maps label and comment commands onto the issues API", async () => {
    const api = createFakeApi([]);
    const tracker = new GitHubTracker(api, target, staleLabels);

    await tracker.addLabel({ id: 3, kind: "issue" }, "Stale");
    await tracker.removeLabel({ id: 3, kind: "issue" }, "Stale");
    await tracker.postComment({ id: 3, kind: "issue" }, "hello");

    expect(api.addLabels).toHaveBeenCalledWith(3, ["Stale"]);
    expect(api.removeLabel).toHaveBeenCalledWith(3, "Stale");
    expect(api.createComment).toHaveBeenCalledWith(3, "hello");
  });
});

describe("createGitHubIssueApi", () => {
  const request = { method: "DELETE" as const, url: "https://api.github.com/repos/acme/widgets/issues/1/labels/Stale", headers: {} };

  it("maps REST issues and tells pull requests apart", async () => {
    const paginate = vi.fn().mockResolvedValue([
      {
        number: 7,
        title: "Flaky test",
        html_url: "https://github.com/acme/widgets/issues/7",
        labels: ["bug", { name: "Stale" }, { name: undefined }],
        created_at: "2025-01-01T00:00:00Z",
        updated_at: "2025-01-02T00:00:00Z",
      },
      {
        number: 8,
        title: "Add feature",
        html_url: "https://github.com/acme/widgets/pull/8",
        labels: [],
        created_at: "2025-01-03T00:00:00Z",
        updated_at: "2025-01-04T00:00:00Z",
        pull_request: { url: "https://api.github.com/repos/acme/widgets/pulls/8" },
        draft: true,
      },
    ]);
    const octokit = { paginate, rest: { issues: { listForRepo: vi.fn() } } } as unknown as Octokit;

    const issues = await createGitHubIssueApi(octokit, "acme", "widgets").listOpenIssues("asc");

    expect(paginate.mock.calls[0][1]).toEqual({
      owner: "acme",
      repo: "widgets",
      state: "open",
      sort: "created",
      direction: "asc",
      per_page: 100,
    });
    expect(issues).toEqual([
      makeIssue({
        number: 7,
        title: "Flaky test",
        url: "https://github.com/acme/widgets/issues/7",
        labels: ["bug", "Stale"],
        updatedAt: "2025-01-02T00:00:00Z",
      }),
      makeIssue({
        number: 8,
        isPullRequest: true,
        title: "Add feature",
        url: "https://github.com/acme/widgets/pull/8",
        createdAt: "2025-01-03T00:00:00Z",
        updatedAt: "2025-01-04T00:00:00Z",
        draft: true,
      }),
    ]);
  });

  it("keeps only label events", async () => {
    const paginate = vi.fn().mockResolvedValue([
      { event: "labeled", label: { name: "Stale" }, created_at: "2025-01-01T00:00:00Z" },
      { event: "commented", created_at: "2025-01-02T00:00:00Z" },
      { event: "unlabeled", label: { name: "Stale" }, created_at: "2025-01-03T00:00:00Z" },
    ]);
    const octokit = { paginate, rest: { issues: { listEvents: vi.fn() } } } as unknown as Octokit;

    const events = await createGitHubIssueApi(octokit, "acme", "widgets").listLabelEvents(1);

    expect(events).toEqual([
      { event: "labeled", label: "Stale", createdAt: "2025-01-01T00:00:00Z" },
      { event: "unlabeled", label: "Stale", createdAt: "2025-01-03T00:00:00Z" },
    ]);
  });

  it("treats removing an absent label as done", async () => {
    const removeLabel = vi.fn().mockRejectedValue(new RequestError("Label does not exist", 404, { request }));
    const octokit = { rest: { issues: { removeLabel } } } as unknown as Octokit;

    await expect(createGitHubIssueApi(octokit, "acme", "widgets").removeLabel(1, "Stale")).resolves.toBeUndefined();
  });

  it("propagates other removal failures", async () => {
    const err = new RequestError("Forbidden", 403, { request });
    const octokit = { rest: { issues: { removeLabel: vi.fn().mockRejectedValue(err) } } } as unknown as Octokit;

    await expect(createGitHubIssueApi(octokit, "acme", "widgets").removeLabel(1, "Stale")).rejects.toBe(err);
  });

  it("closes issues with a state reason", async () => {
    const update = vi.fn().mockResolvedValue({});
    const octokit = { rest: { issues: { update } } } as unknown as Octokit;

    await createGitHubIssueApi(octokit, "acme", "widgets").closeIssue(5, "not_planned");

    expect(update).toHaveBeenCalledWith({
      owner: "acme",
      repo: "widgets",
      issue_number: 5,
      state: "closed",
      state_reason: "not_planned",
    });
  });
});

describe("rate limit handlers", () => {
  const request = { method: "POST", url: "/repos/acme/widgets/issues/1/comments" };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries a rate-limited request once", () => {
    const logged = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(onRateLimit(30, request, undefined, 0)).toBe(true);
    expect(onRateLimit(30, request, undefined, 1)).toBe(false);
    expect(logged.mock.calls[0][0]).toContain(
      "GitHub rate limit hit for POST /repos/acme/widgets/issues/1/comments, retry after 30s",
    );
  });

  it("gives up on the secondary rate limit", () => {
    const logged = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(onSecondaryRateLimit(60, request)).toBe(false);
    expect(logged.mock.calls[0][0]).toContain("GitHub secondary rate limit hit for POST");
  });
});

describe("getOctokit", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("requires a token", () => {
    vi.stubEnv("GITHUB_TOKEN", "");
    vi.stubEnv("GH_TOKEN", "");
    expect(() => getOctokit()).toThrow("No GitHub token found");
  });

  it("creates one client and reuses it", () => {
    vi.stubEnv("GITHUB_TOKEN", "test-secret");
    const octokit = getOctokit();
    expect(octokit).toBeInstanceOf(Octokit);
    expect(getOctokit()).toBe(octokit);
  });
});
