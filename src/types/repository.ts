export interface GitHubTarget {
  provider: "github";
  owner: string;
  repo: string;
}

export interface AzureDevOpsTarget {
  provider: "azure-devops";
  orgUrl: string;
  project: string;
  repository: string;
}

export type RepositoryTarget = GitHubTarget | AzureDevOpsTarget;

export type Provider = RepositoryTarget["provider"];

export function repositoryLabel(target: RepositoryTarget): string {
  return target.provider === "github"
    ? `${target.owner}/${target.repo}`
    : `${target.project}/${target.repository}`;
}
