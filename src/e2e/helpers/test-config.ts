import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

export interface TestConfigOptions {
  repositories?: Array<{ url: string; policy?: Record<string, unknown> }>;
  policy?: Record<string, unknown>;
  hooks?: unknown;
}

export const GITHUB_REPO_URL = "https://github.com/acme/widgets";
export const ADO_REPO_URL = "https://dev.azure.com/contoso/Platform/_git/Api";

function defaultConfig(): TestConfigOptions {
  return {
    repositories: [{ url: GITHUB_REPO_URL }],
    policy: { daysBeforeStale: 30, daysBeforeClose: 7 },
  };
}

export interface TestDir {
  /** Absolute path to the temp directory */
  dir: string;
  /** Absolute path to the config file */
  configPath: string;
  /** Build an absolute path inside the temp dir */
  path: (relative: string) => string;
  cleanup: () => void;
}

/**
 * Creates a temp directory holding a stale-config.json.
 */
export function createTestDir(configOverrides: Partial<TestConfigOptions> = {}): TestDir {
  const dir = mkdtempSync(join(tmpdir(), "stale-sweeper-e2e-"));
  const config = { ...defaultConfig(), ...configOverrides };
  const configPath = join(dir, "stale-config.json");
  writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");

  return {
    dir,
    configPath,
    path: (relative: string) => join(dir, relative),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function multiRepoConfig(
  repoUrls: string[] = [GITHUB_REPO_URL, ADO_REPO_URL],
  overrides: Partial<TestConfigOptions> = {},
): TestDir {
  return createTestDir({
    repositories: repoUrls.map((url) => ({ url })),
    ...overrides,
  });
}
