/**
 * scout run command - Resolve every region of a geography
 */

import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { loadConfig, getOutputDir } from "../../config/loader.js";
import { loadGeography } from "../../config/geography.js";
import type { ScoutConfig } from "../../config/types.js";
import { createRunContext } from "../../runtime/context.js";
import { createLogger, readRunReport, writeRunReport, type ScoutLogger } from "../../runtime/logger.js";
import { createRateLimiter, type RateLimiter } from "../../limiter/rate-limiter.js";
import { CapabilityGateway, createDefaultCapabilities, type Capabilities } from "../../capabilities/index.js";
import { createOracle } from "../../oracle/oracle.js";
import { WaveExecutor } from "../../orchestrator/wave.js";
import { SearchBudget } from "../../orchestrator/budget.js";
import { EscalationPlanner, initialDirective } from "../../orchestrator/escalation.js";
import {
  createResolutionOrchestrator,
  type ResolutionOrchestrator,
} from "../../orchestrator/runner.js";
import { formatReportSummary, formatRunLog, type RunReport } from "../../orchestrator/core.js";
import { ProgressReporter, createLogObserver } from "../../progress/reporter.js";
import { ProgressServer } from "../../progress/server.js";
import { CsvExporter } from "../../runtime/csv-export.js";

export interface RunCommandOptions {
  geography?: string;
  resume?: string;
  autoStopAfter?: number;
  trace?: boolean;
  json?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export interface Engine {
  orchestrator: ResolutionOrchestrator;
  limiter: RateLimiter;
  reporter: ProgressReporter;
}

/**
 * Wire limiter, gateway, clients, executor and planner into an orchestrator
 */
export function createEngine(
  config: ScoutConfig,
  options: {
    runId: string;
    logger: ScoutLogger;
    checkpoint?: (report: RunReport) => Promise<void>;
    capabilities?: Capabilities;
    /** Where CSV exports go when enabled */
    outputDir?: string;
  },
): Engine {
  const { logger } = options;
  const limiter = createRateLimiter(config.rateLimit);
  const gateway = new CapabilityGateway({
    limiter,
    logger,
    maxThrottleRetries: config.rateLimit.maxThrottleRetries,
  });
  const capabilities = options.capabilities ?? createDefaultCapabilities(config);
  const oracle = createOracle({
    gateway,
    client: capabilities.oracle,
    timeoutMs: config.timeouts.oracleMs,
  });

  const reporter = new ProgressReporter(logger);
  reporter.subscribe(createLogObserver(logger));

  // One budget for the whole run, shared by every wave
  const budget = config.budget.enabled ? new SearchBudget(config.budget) : undefined;
  const exporter =
    config.exports.csv && options.outputDir !== undefined ? new CsvExporter(options.outputDir) : undefined;

  const orchestrator = createResolutionOrchestrator({
    runId: options.runId,
    executor: new WaveExecutor({
      capabilities,
      gateway,
      oracle,
      search: config.search,
      channelPolicy: config.channelPolicy,
      verification: config.verification,
      timeouts: config.timeouts,
      logger,
      budget,
    }),
    planner: new EscalationPlanner({ oracle, logger }),
    logger,
    resolution: config.resolution,
    initialDirective: initialDirective(config.search),
    reporter,
    checkpoint: options.checkpoint,
    budget,
    exporter,
  });

  return { orchestrator, limiter, reporter };
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Resolve every region, locality and category of a geography")
    .option("-g, --geography <file>", "Geography file (defaults to geographyPath in config)")
    .option("--resume <run-id>", "Carry over finished slots from an earlier run")
    .option("--auto-stop-after <ms>", "Request a graceful stop after this long", parsePositiveInt)
    .option("--trace", "Enable trace mode (verbose output and run log)")
    .option("--json", "Output the report as JSON")
    .action(async (opts: RunCommandOptions) => {
      try {
        const config = await loadConfig();

        const geographyPath = opts.geography ?? config.geographyPath;
        if (!geographyPath) {
          console.error("No geography given. Pass --geography <file> or run 'scout init --geography <file>'.");
          process.exit(1);
        }
        const geography = await loadGeography(geographyPath);
        const outputDir = getOutputDir(config);

        let resume: RunReport | undefined;
        if (opts.resume) {
          const previous = await readRunReport(opts.resume, outputDir);
          if (!previous) {
            console.error(`No report found for run: ${opts.resume}`);
            process.exit(1);
          }
          resume = previous;
        }

        const ctx = createRunContext(config, { traceMode: opts.trace });
        const logger = createLogger(ctx.runId, config.logging, {
          verbose: ctx.traceMode,
          quiet: opts.json,
        });

        const reportPath = path.join(outputDir, `${ctx.runId}.json`);
        const { orchestrator, limiter, reporter } = createEngine(config, {
          runId: ctx.runId,
          logger,
          outputDir,
          checkpoint: async (report) => {
            await writeRunReport(report, outputDir);
          },
        });

        logger.info(`Starting run: ${ctx.runId}`, {
          geography: geographyPath,
          regions: geography.regions.length,
          categories: geography.categories.length,
          resumedFrom: opts.resume,
        });

        const progress = config.progress.enabled
          ? new ProgressServer({
              host: config.progress.host,
              port: config.progress.port,
              runId: ctx.runId,
              reporter,
              snapshot: () => orchestrator.getSnapshot(),
              logger,
            })
          : null;
        if (progress) {
          const { host, port } = await progress.start();
          logger.info(`Progress events at ws://${host}:${port}`);
        }

        // First interrupt stops gracefully; a second one cancels waiting requests
        let interrupts = 0;
        const onInterrupt = (): void => {
          interrupts++;
          if (interrupts === 1) {
            ctx.stop("interrupted");
          } else {
            logger.warn("Interrupted again, cancelling pending requests");
            limiter.close();
          }
        };
        process.on("SIGINT", onInterrupt);

        const autoStop = opts.autoStopAfter
          ? setTimeout(() => ctx.stop(`auto-stop after ${opts.autoStopAfter}ms`), opts.autoStopAfter)
          : null;

        let report: RunReport;
        try {
          report = await orchestrator.run(geography, { signal: ctx.signal, resume });
        } finally {
          process.off("SIGINT", onInterrupt);
          if (autoStop) clearTimeout(autoStop);
          limiter.close();
          await progress?.stop();
        }

        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          console.log(`\n${formatReportSummary(report)}`);
          console.log(`\nReport: ${reportPath}`);
          if (report.status === "stopped") {
            console.log(`Resume with: scout run --resume ${report.runId}`);
          }
        }

        const runCtx = orchestrator.getContext();
        if (ctx.traceMode && runCtx && !opts.json) {
          console.log(`\n${formatRunLog(runCtx)}`);
        }

        await logger.flush();
      } catch (error) {
        console.error(`Run failed: ${error instanceof Error ? error.message : String(error)}`);
        if (process.env.DEBUG) {
          console.error(error);
        }
        process.exit(1);
      }
    });
}
