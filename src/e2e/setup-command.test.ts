import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseSweepConfig } from "../config.js";
import { runCheck, runSetup } from "../pipeline.js";
import { InvalidConfigError } from "../errors.js";

// runSetup resolves the config path relative to cwd, so tests run in a temp dir
describe("e2e: setup command", () => {
  let testDir: string;
  let originalCwd: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "stale-sweeper-setup-"));
    originalCwd = process.cwd();
    process.chdir(testDir);
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("creates a template config file", () => {
    const path = runSetup();

    const configPath = join(testDir, "stale-config.json");
    expect(existsSync(configPath)).toBe(true);
    expect(path.endsWith("stale-config.json")).toBe(true);

    const content: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    expect(content).toMatchObject({
      repositories: [{ url: "https://github.com/{owner}/{repo}" }],
      policy: { daysBeforeIssueStale: 7, daysBeforeIssueClose: 7, daysBeforePrStale: 30, daysBeforePrClose: 5 },
    });
  });

  it("writes a policy the config loader accepts", () => {
    runSetup();
    const content: unknown = JSON.parse(readFileSync(join(testDir, "stale-config.json"), "utf-8"));

    const { policy } = parseSweepConfig(content).repositories[0];
    expect(policy.perKind.issue).toMatchObject({ daysBeforeStale: 7, daysBeforeClose: 7, staleLabel: "stale" });
    expect(policy.perKind.pull_request).toMatchObject({ daysBeforeStale: 30, daysBeforeClose: 5, staleLabel: "stale" });
    expect(policy.perKind.issue.exemptLabels).toEqual(["override-stale"]);
    expect(policy.requiredAnyLabels).toEqual(["stat:awaiting response"]);
    expect(policy.closeIssueReason).toBe("completed");
    expect(policy.removeStaleWhenUpdated).toBe(false);
  });

  it("refuses to overwrite an existing config", () => {
    writeFileSync(join(testDir, "stale-config.json"), "{}", "utf-8");

    expect(() => runSetup()).toThrow("Config file already exists");
    expect(readFileSync(join(testDir, "stale-config.json"), "utf-8")).toBe("{}");
  });
});

describe("e2e: check command", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "stale-sweeper-check-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("returns the resolved config", () => {
    const configPath = join(testDir, "stale-config.json");
    writeFileSync(
      configPath,
      JSON.stringify({ repositories: [{ url: "https://github.com/acme/widgets" }], policy: { daysBeforeStale: 45 } }),
      "utf-8",
    );

    const config = runCheck(configPath);
    expect(config.repositories[0].policy.perKind.pull_request.daysBeforeStale).toBe(45);
  });

  it("throws for an invalid config", () => {
    const configPath = join(testDir, "stale-config.json");
    writeFileSync(configPath, JSON.stringify({ repositories: [{ url: "https://example.com/x" }] }), "utf-8");

    expect(() => runCheck(configPath)).toThrow(InvalidConfigError);
  });
});
