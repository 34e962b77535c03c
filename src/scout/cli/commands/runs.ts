/**
 * scout runs command - View stored run reports
 */

import { Command } from "commander";
import { loadConfig, getOutputDir } from "../../config/loader.js";
import { listRunReports, readRunReport } from "../../runtime/logger.js";
import { formatReportSummary } from "../../orchestrator/core.js";
import { parsePositiveInt } from "./run.js";

export function registerRunsCommand(program: Command): void {
  const runsCmd = program.command("runs").description("View stored run reports");

  // List runs
  runsCmd
    .command("list")
    .description("List recent runs")
    .option("-n, --limit <n>", "Number of runs to show", parsePositiveInt, 20)
    .option("--json", "Output as JSON")
    .action(async (opts: { limit: number; json?: boolean }) => {
      try {
        const config = await loadConfig();
        const reports = await listRunReports(getOutputDir(config));
        const limited = reports.slice(0, opts.limit);

        if (opts.json) {
          console.log(JSON.stringify(limited, null, 2));
          return;
        }

        if (limited.length === 0) {
          console.log("No runs found");
          return;
        }

        console.log("\nRecent runs:\n");
        for (const entry of limited) {
          console.log(`  ${entry.runId}`);
          console.log(`    Time: ${entry.timestamp.toISOString()}`);
          console.log(`    Size: ${(entry.size / 1024).toFixed(1)}KB`);
          console.log();
        }
      } catch (error) {
        console.error(
          `Failed to list runs: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });

  // Show specific run
  runsCmd
    .command("show")
    .description("Show the report of a specific run")
    .argument("<run-id>", "Run ID to show")
    .option("--json", "Output as JSON")
    .action(async (runId: string, opts: { json?: boolean }) => {
      try {
        const config = await loadConfig();
        const report = await readRunReport(runId, getOutputDir(config));

        if (!report) {
          console.error(`No report found for run: ${runId}`);
          process.exit(1);
        }

        console.log(opts.json ? JSON.stringify(report, null, 2) : formatReportSummary(report));
      } catch (error) {
        console.error(
          `Failed to show run: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });
}
