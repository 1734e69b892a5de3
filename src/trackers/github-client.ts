import { Octokit, RequestError } from "octokit";
import type { CloseReason } from "../types.js";
import * as log from "../log.js";

export interface GitHubIssue {
  number: number;
  isPullRequest: boolean;
  title: string;
  url: string;
  labels: string[];
  createdAt: string;
  updatedAt: string;
  draft: boolean;
}

export interface GitHubLabelEvent {
  event: "labeled" | "unlabeled";
  label: string;
  createdAt: string;
}

/** The slice of the GitHub REST API the sweeper uses, bound to one repository. */
export interface GitHubIssueApi {
  listOpenIssues(direction: "asc" | "desc"): Promise<GitHubIssue[]>;
  listLabelEvents(issueNumber: number): Promise<GitHubLabelEvent[]>;
  addLabels(issueNumber: number, labels: string[]): Promise<void>;
  removeLabel(issueNumber: number, label: string): Promise<void>;
  createComment(issueNumber: number, body: string): Promise<void>;
  closeIssue(issueNumber: number, reason: CloseReason | undefined): Promise<void>;
  closePullRequest(pullNumber: number): Promise<void>;
}

function getGitHubToken(): string {
  const token = process.env.GITHUB_TOKEN ?? process.env.GH_TOKEN;
  if (!token) {
    throw new Error(
      "No GitHub token found. Set GITHUB_TOKEN (in GitHub Actions: `secrets.GITHUB_TOKEN` " +
        "with issues and pull-requests write permission) or GH_TOKEN.",
    );
  }
  return token;
}

interface ThrottledRequest {
  method: string;
  url: string;
}

/** Retry a rate-limited request once; returning false gives up. */
export function onRateLimit(
  retryAfter: number,
  options: ThrottledRequest,
  _octokit: unknown,
  retryCount: number,
): boolean {
  log.warn(`GitHub rate limit hit for ${options.method} ${options.url}, retry after ${retryAfter}s`);
  return retryCount < 1;
}

export function onSecondaryRateLimit(retryAfter: number, options: ThrottledRequest): boolean {
  log.warn(`GitHub secondary rate limit hit for ${options.method} ${options.url} (retry after ${retryAfter}s)`);
  return false;
}

let cachedOctokit: Octokit | undefined;

export function getOctokit(): Octokit {
  if (!cachedOctokit) {
    log.debug("Creating GitHub client…");
    cachedOctokit = new Octokit({
      auth: getGitHubToken(),
      userAgent: "stale-sweeper",
      throttle: { onRateLimit, onSecondaryRateLimit },
    });
  }
  return cachedOctokit;
}

function labelName(label: string | { name?: string }): string {
  return typeof label === "string" ? label : label.name ?? "";
}

export function createGitHubIssueApi(octokit: Octokit, owner: string, repo: string): GitHubIssueApi {
  return {
    async listOpenIssues(direction) {
      // the issues endpoint returns pull requests too
      const issues = await octokit.paginate(octokit.rest.issues.listForRepo, {
        owner,
        repo,
        state: "open",
        sort: "created",
        direction,
        per_page: 100,
      });
      return issues.map((issue) => ({
        number: issue.number,
        isPullRequest: issue.pull_request !== undefined,
        title: issue.title,
        url: issue.html_url,
        labels: issue.labels.map(labelName).filter((l) => l !== ""),
        createdAt: issue.created_at,
        updatedAt: issue.updated_at,
        draft: issue.draft ?? false,
      }));
    },

    async listLabelEvents(issueNumber) {
      const events = await octokit.paginate(octokit.rest.issues.listEvents, {
        owner,
        repo,
        issue_number: issueNumber,
        per_page: 100,
      });
      const result: GitHubLabelEvent[] = [];
      for (const e of events) {
        const kind = e.event;
        if (kind !== "labeled" && kind !== "unlabeled") continue;
        if (!("label" in e) || !e.label) continue;
        result.push({ event: kind, label: e.label.name, createdAt: e.created_at });
      }
      return result;
    },

    async addLabels(issueNumber, labels) {
      await octokit.rest.issues.addLabels({ owner, repo, issue_number: issueNumber, labels });
    },

    async removeLabel(issueNumber, label) {
      try {
        await octokit.rest.issues.removeLabel({ owner, repo, issue_number: issueNumber, name: label });
      } catch (err: unknown) {
        // 404: the label is already gone, which is the state we wanted
        if (err instanceof RequestError && err.status === 404) return;
        throw err;
      }
    },

    async createComment(issueNumber, body) {
      await octokit.rest.issues.createComment({ owner, repo, issue_number: issueNumber, body });
    },

    async closeIssue(issueNumber, reason) {
      await octokit.rest.issues.update({
        owner,
        repo,
        issue_number: issueNumber,
        state: "closed",
        state_reason: reason,
      });
    },

    async closePullRequest(pullNumber) {
      await octokit.rest.pulls.update({ owner, repo, pull_number: pullNumber, state: "closed" });
    },
  };
}
