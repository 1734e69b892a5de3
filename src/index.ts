// Suppress url.parse() deprecation from azure-devops-node-api (DEP0169)
process.removeAllListeners("warning");
process.on("warning", (w) => {
  const code = "code" in w ? w.code : undefined;
  if (w.name !== "DeprecationWarning" || code !== "DEP0169") console.warn(w);
});

import { resolve } from "node:path";
import { Command } from "commander";
import * as log from "./log.js";
import { getVersion, printSummary, runCheck, runSetup, runSweep } from "./pipeline.js";
import { writeRunReport } from "./reporting/run-report.js";

interface RunArgs {
  config?: string;
  dryRun: boolean;
  output?: string;
  hooks: boolean;
  verbose: boolean;
}

interface CheckArgs {
  config?: string;
  verbose: boolean;
}

const program = new Command()
  .name("stale-sweeper")
  .description("Marks inactive GitHub and Azure DevOps issues and pull requests stale, then closes them")
  .version(getVersion());

program
  .command("setup")
  .description("Generate a template stale-config.json in the current directory")
  .action(() => {
    runSetup();
  });

program
  .command("check")
  .description("Validate the config file and print the resolved policy for each repository")
  .option("--config <path>", "Path to a custom config file")
  .option("--verbose", "Enable debug logging", false)
  .action((opts: CheckArgs) => {
    log.setVerbose(opts.verbose);
    runCheck(opts.config);
  });

program
  .command("run")
  .description("Evaluate open issues and pull requests and apply the resulting operations")
  .option("--config <path>", "Path to a custom config file")
  .option("--dry-run", "Log actions without making changes", false)
  .option("--output <path>", "Write the JSON run report to a file, or - for stdout")
  .option("--no-hooks", "Skip post-run hooks")
  .option("--verbose", "Enable debug logging", false)
  .action(async (opts: RunArgs) => {
    log.setVerbose(opts.verbose);
    log.setStdoutReserved(opts.output === "-");
    log.heading("Stale Sweeper");

    const report = await runSweep({ configPath: opts.config, dryRun: opts.dryRun, hooks: opts.hooks });

    if (opts.output) {
      writeRunReport(report, opts.output === "-" ? "-" : resolve(opts.output));
    }
    printSummary(report);

    if (report.repositories.some((r) => r.status === "failed")) {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
