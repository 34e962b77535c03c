/**
 * Logging infrastructure for scout
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { LoggingConfig } from "../config/types.js";
import type { RunId } from "./context.js";
import { parseRunReport, type RunReport } from "../orchestrator/core.js";
import { FatalRunError, isNotFoundError } from "./errors.js";
import { getConfigDir } from "../config/loader.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger instance for a run
 */
export interface ScoutLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  capability: (name: string, destination: string, ok: boolean, duration_ms: number) => void;
  flush: () => Promise<void>;
}

/**
 * Format a log message for console output
 */
function formatConsoleMessage(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  config?: LoggingConfig,
): string {
  const parts: string[] = [];

  if (config?.timestamps ?? true) {
    parts.push(`[${new Date().toISOString()}]`);
  }

  parts.push(`[${level.toUpperCase().padEnd(5)}]`);
  parts.push(message);

  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }

  return parts.join(" ");
}

/**
 * Format a log entry as JSON
 */
function formatJsonLog(
  level: LogLevel,
  message: string,
  runId: RunId,
  data?: Record<string, unknown>,
): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    runId,
    message,
    ...data,
  });
}

function resolveDir(dir: string | undefined, fallback: string): string {
  if (!dir) return path.join(getConfigDir(), fallback);
  return dir.startsWith("~") ? path.join(getConfigDir(), fallback) : dir;
}

/**
 * Create a logger for a run
 */
export function createLogger(
  runId: RunId,
  config: LoggingConfig,
  options?: {
    quiet?: boolean;
    verbose?: boolean;
  },
): ScoutLogger {
  const logBuffer: string[] = [];
  const effectiveLevel: LogLevel = options?.verbose ? "debug" : config.level;
  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[effectiveLevel];

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (!shouldLog(level)) return;

    const formattedLine = config.jsonLogs
      ? formatJsonLog(level, message, runId, data)
      : formatConsoleMessage(level, message, data, config);

    // Buffer for file writing
    logBuffer.push(formattedLine);

    if (!options?.quiet) {
      const output = level === "error" ? console.error : console.log;
      output(formattedLine);
    }
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),

    capability: (name, destination, ok, duration_ms) => {
      log("debug", `Capability: ${name} ${ok ? "ok" : "failed"}`, {
        destination,
        duration_ms,
      });
    },

    flush: async () => {
      if (!config.logDir || logBuffer.length === 0) return;

      const logDir = resolveDir(config.logDir, "logs");
      await fs.mkdir(logDir, { recursive: true });

      const logFile = path.join(logDir, `${runId}.log`);
      await fs.appendFile(logFile, logBuffer.join("\n") + "\n");
      logBuffer.length = 0;
    },
  };
}

/**
 * Write a run report to `<dir>/<runId>.json`
 */
export async function writeRunReport(report: RunReport, dir: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });

  const file = path.join(dir, `${report.runId}.json`);
  await fs.writeFile(file, JSON.stringify(report, null, 2) + "\n", "utf-8");
  return file;
}

/**
 * Read a run report; null when it was never written
 */
export async function readRunReport(runId: RunId, dir: string): Promise<RunReport | null> {
  const file = path.join(dir, `${runId}.json`);

  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new FatalRunError(`Not a run report: ${file}: invalid JSON`);
  }
  return parseRunReport(raw, file);
}

/**
 * List stored run reports, newest first
 */
export async function listRunReports(dir: string): Promise<
  Array<{
    runId: RunId;
    timestamp: Date;
    size: number;
  }>
> {
  try {
    const files = await fs.readdir(dir);
    const reports: Array<{ runId: RunId; timestamp: Date; size: number }> = [];

    for (const file of files) {
      if (!file.endsWith(".json")) continue;

      const runId = file.replace(".json", "");
      const stats = await fs.stat(path.join(dir, file));

      reports.push({
        runId,
        timestamp: stats.mtime,
        size: stats.size,
      });
    }

    return reports.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  } catch (error) {
    if (isNotFoundError(error)) {
      return [];
    }
    throw error;
  }
}
