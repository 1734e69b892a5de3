import { execSync } from "node:child_process";
import type { AzureDevOpsTarget, GitHubTarget, RepositoryTarget } from "./types.js";

function azureDevOps(org: string, project: string, repository: string): AzureDevOpsTarget {
  return {
    provider: "azure-devops",
    orgUrl: `https://dev.azure.com/${org}`,
    project: decodeURIComponent(project),
    repository: decodeURIComponent(repository),
  };
}

function gitHub(owner: string, repo: string): GitHubTarget {
  return { provider: "github", owner, repo: repo.replace(/\.git$/, "") };
}

/**
 * Parse a repository URL or git remote into a target.
 * Supports:
 *   https://github.com/{owner}/{repo}[.git]
 *   git@github.com:{owner}/{repo}.git
 *   https://dev.azure.com/{org}/{project}/_git/{repo}
 *   https://{org}.visualstudio.com/{project}/_git/{repo}
 *   git@ssh.dev.azure.com:v3/{org}/{project}/{repo}
 */
export function parseRepositoryUrl(url: string): RepositoryTarget | null {
  const ghHttps = url.match(/https?:\/\/(?:[^@/]+@)?github\.com\/([^/\s]+)\/([^/\s#?]+)/);
  if (ghHttps) return gitHub(ghHttps[1], ghHttps[2]);

  const ghSsh = url.match(/git@github\.com:([^/\s]+)\/([^/\s]+)/);
  if (ghSsh) return gitHub(ghSsh[1], ghSsh[2]);

  const devMatch = url.match(
    /https?:\/\/(?:[^@]+@)?dev\.azure\.com\/([^/]+)\/([^/]+)\/_git\/([^/\s]+)/,
  );
  if (devMatch) return azureDevOps(devMatch[1], devMatch[2], devMatch[3]);

  const vsMatch = url.match(
    /https?:\/\/(?:[^@]+@)?([^.]+)\.visualstudio\.com\/([^/]+)\/_git\/([^/\s]+)/,
  );
  if (vsMatch) return azureDevOps(vsMatch[1], vsMatch[2], vsMatch[3]);

  const sshMatch = url.match(/(?:ssh\.dev\.azure\.com|vs-ssh\.visualstudio\.com):v3\/([^/]+)\/([^/]+)\/([^/\s]+)/);
  if (sshMatch) return azureDevOps(sshMatch[1], sshMatch[2], sshMatch[3]);

  return null;
}

/** Canonical browser URL for a target; used by `setup` to prefill the template. */
export function repositoryUrl(target: RepositoryTarget): string {
  if (target.provider === "github") {
    return `https://github.com/${target.owner}/${target.repo}`;
  }
  return `${target.orgUrl}/${encodeURIComponent(target.project)}/_git/${encodeURIComponent(target.repository)}`;
}

/** Detect the repository from git remotes in the cwd. Returns null outside a git repo or for other hosts. */
export function detectRepository(): RepositoryTarget | null {
  let remoteOutput: string;
  try {
    remoteOutput = execSync("git remote -v", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    return null;
  }

  for (const line of remoteOutput.split("\n")) {
    if (!line.includes("(fetch)")) continue;
    const target = parseRepositoryUrl(line);
    if (target) return target;
  }

  return null;
}
