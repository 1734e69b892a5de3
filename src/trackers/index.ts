import type { RepositorySettings } from "../config.js";
import { getGitApiForOrg } from "./ado-client.js";
import { AzureDevOpsTracker } from "./azure-devops.js";
import { createGitHubIssueApi, getOctokit } from "./github-client.js";
import { GitHubTracker } from "./github.js";
import type { EntityTracker } from "./tracker.js";

export type { EntityRef, EntityTracker } from "./tracker.js";

export async function createTracker(settings: RepositorySettings): Promise<EntityTracker> {
  const { target, policy, ascending } = settings;

  if (target.provider === "github") {
    const api = createGitHubIssueApi(getOctokit(), target.owner, target.repo);
    const staleLabels = {
      issue: policy.perKind.issue.staleLabel,
      pull_request: policy.perKind.pull_request.staleLabel,
    };
    return new GitHubTracker(api, target, staleLabels, ascending);
  }

  const gitApi = await getGitApiForOrg(target.orgUrl);
  return new AzureDevOpsTracker(gitApi, target, policy.perKind.pull_request.staleLabel, ascending);
}
