import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { applyBatch } from "./automation/apply-batch.js";
import { createHooks, runHooks } from "./automation/hooks/index.js";
import type { PostRunHook } from "./automation/hooks/index.js";
import { REPOSITORY_CONCURRENCY, runConcurrentSettled } from "./concurrency.js";
import { DEFAULT_CONFIG_FILE, loadSweepConfig } from "./config.js";
import type { RepositorySettings, SweepConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { evaluate } from "./lifecycle/evaluate.js";
import * as log from "./log.js";
import { detectRepository, repositoryUrl } from "./repo-url.js";
import { buildRepoReport, buildRunReport, failedRepoReport } from "./reporting/run-report.js";
import { createTracker } from "./trackers/index.js";
import type { RepoRunReport, RunReport } from "./types.js";
import { ENTITY_KINDS, repositoryLabel } from "./types.js";

export function getVersion(): string {
  const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err: unknown) {
    log.debug(`Could not read ${pkgPath}: ${errorMessage(err)}`);
  }
  return "0.0.0";
}

const TEMPLATE_POLICY = {
  daysBeforeIssueStale: 7,
  daysBeforeIssueClose: 7,
  daysBeforePrStale: 30,
  daysBeforePrClose: 5,
  staleIssueLabel: "stale",
  stalePrLabel: "stale",
  staleIssueMessage:
    "This issue has been marked stale because it has had no activity for 7 days. It will be closed if no further activity occurs.",
  stalePrMessage:
    "This pull request has been marked stale because it has had no activity for 30 days. It will be closed if no further activity occurs.",
  closeIssueMessage: "This issue was closed due to lack of activity after being marked stale for the past 7 days.",
  closePrMessage: "This pull request was closed due to lack of activity after being marked stale for the past 5 days.",
  exemptIssueLabels: ["override-stale"],
  exemptPrLabels: ["override-stale"],
  anyOfLabels: ["stat:awaiting response"],
  closeIssueReason: "completed",
  removeStaleWhenUpdated: false,
  operationsPerRun: 30,
};

/** Write a template config into the cwd, pointing at the current git remote when one is recognised. */
export function runSetup(): string {
  const configPath = resolve(DEFAULT_CONFIG_FILE);
  if (existsSync(configPath)) {
    throw new Error(`Config file already exists: ${configPath}. Remove or rename it and try again.`);
  }

  const detected = detectRepository();
  const template = {
    repositories: [{ url: detected ? repositoryUrl(detected) : "https://github.com/{owner}/{repo}" }],
    policy: TEMPLATE_POLICY,
  };
  writeFileSync(configPath, JSON.stringify(template, null, 2) + "\n", "utf-8");
  log.success(`Created template config: ${configPath}`);
  if (!detected) {
    log.info("Edit the file to add your GitHub or Azure DevOps repository URLs.");
  }
  return configPath;
}

/** Load and validate configuration, printing the policy each repository resolves to. */
export function runCheck(configPath?: string): SweepConfig {
  const config = loadSweepConfig(configPath);
  for (const repo of config.repositories) {
    log.heading(`${repositoryLabel(repo.target)} (${repo.target.provider})`);
    for (const kind of ENTITY_KINDS) {
      if (repo.target.provider === "azure-devops" && kind === "issue") continue;
      const p = repo.policy.perKind[kind];
      const exempt = p.exemptLabels.length > 0 ? `, exempt: ${p.exemptLabels.join(", ")}` : "";
      log.summary(
        kind === "issue" ? "Issues" : "Pull requests",
        `stale after ${p.daysBeforeStale}d, close after ${p.daysBeforeClose}d, label '${p.staleLabel}'${exempt}`,
      );
    }
    if (repo.policy.requiredAnyLabels.length > 0) {
      log.summary("Only with labels", repo.policy.requiredAnyLabels.join(", "));
    }
    log.summary("Operations per run", repo.policy.maxOperationsPerRun);
  }
  log.success(`Configuration is valid (${config.repositories.length} repositories)`);
  return config;
}

interface SweepRepositoryOptions {
  hooks: readonly PostRunHook[];
  dryRun: boolean;
  now: Date;
}

export async function sweepRepository(
  settings: RepositorySettings,
  options: SweepRepositoryOptions,
): Promise<RepoRunReport> {
  const { hooks, dryRun, now } = options;
  const tracker = await createTracker(settings);
  const out = log.scoped(tracker.label);

  out.info("Fetching open issues and pull requests…");
  const startFetch = Date.now();
  const entities = await tracker.listOpen();
  out.success(`Fetched ${entities.length} open entities (${Date.now() - startFetch}ms)`);

  const batch = evaluate(entities, settings.policy, now);
  for (const s of batch.skipped) {
    out.warn(`Skipping ${s.error.message}`);
  }
  if (batch.truncated > 0) {
    out.warn(
      `${batch.truncated} operation(s) left for the next run (operationsPerRun: ${settings.policy.maxOperationsPerRun})`,
    );
  }
  out.info(`${batch.operations.length} operation(s) to apply`);

  const result = await applyBatch(tracker, batch, { dryRun, log: out });
  const report = buildRepoReport(tracker.label, tracker.provider, entities.length, batch, result);
  out.success(
    `${report.counts.markedStale} marked stale, ${report.counts.unmarkedStale} unmarked, ` +
      `${report.counts.closed} closed, ${report.counts.failed} failed`,
  );

  await runHooks(hooks, { tracker, entities, batch, result, report, dryRun, now, log: out });
  return report;
}

export interface SweepOptions {
  configPath?: string;
  dryRun?: boolean;
  /** Set to false to skip post-run hooks. */
  hooks?: boolean;
  now?: Date;
}

/**
 * Sweep every configured repository. Configuration errors throw before any
 * repository is touched; a failing repository is reported and the others continue.
 */
export async function runSweep(options: SweepOptions = {}): Promise<RunReport> {
  log.info("Loading configuration…");
  const config = loadSweepConfig(options.configPath);
  const hooks = options.hooks === false ? [] : createHooks(config.hooks);
  const dryRun = options.dryRun ?? false;
  const now = options.now ?? new Date();

  if (dryRun) log.warn("Dry run: no changes will be made");
  log.info(`Processing ${config.repositories.length} repo(s) (concurrency: ${REPOSITORY_CONCURRENCY})…`);

  const settled = await runConcurrentSettled(config.repositories, REPOSITORY_CONCURRENCY, (repo) =>
    sweepRepository(repo, { hooks, dryRun, now }),
  );

  const reports = settled.map((outcome, i) => {
    if (outcome.status === "fulfilled") return outcome.value;
    const { target } = config.repositories[i];
    const label = repositoryLabel(target);
    log.error(`${label}: ${errorMessage(outcome.reason)}`);
    return failedRepoReport(label, target.provider, outcome.reason);
  });

  return buildRunReport(reports, getVersion(), dryRun, now);
}

export function printSummary(report: RunReport): void {
  const { totals } = report;
  log.heading(report.dryRun ? "Summary (dry run)" : "Summary");
  log.summary("Repositories", report.repositories.length);
  log.summary("Failed repositories", report.repositories.filter((r) => r.status === "failed").length);
  log.summary("Open entities", totals.evaluated);
  log.summary("Skipped (invalid)", totals.skipped);
  log.summary("Operations planned", totals.planned);
  log.summary("Deferred by limit", totals.truncated);
  log.summary("Marked stale", totals.markedStale);
  log.summary("Unmarked stale", totals.unmarkedStale);
  log.summary("Closed", totals.closed);
  log.summary("Failed operations", totals.failed);
}
