/**
 * Runtime context for scout runs
 */

import { randomBytes } from "node:crypto";
import type { ScoutConfig } from "../config/types.js";

/**
 * Unique identifier for a run
 */
export type RunId = string;

/**
 * Generate a new run ID
 */
export function generateRunId(): RunId {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString("hex");
  return `run_${timestamp}_${random}`;
}

/**
 * Run context containing state for a single resolution run
 */
export interface RunContext {
  /** Unique run identifier */
  runId: RunId;
  /** Start time of the run */
  startTime: Date;
  /** Full configuration */
  config: ScoutConfig;
  /** Whether the run is in trace mode */
  traceMode: boolean;
  /** Fires when an external stop was requested */
  signal: AbortSignal;
  /** Request a graceful stop */
  stop: (reason?: string) => void;
}

/**
 * Create a new run context
 */
export function createRunContext(
  config: ScoutConfig,
  options?: {
    runId?: RunId;
    traceMode?: boolean;
  },
): RunContext {
  const controller = new AbortController();
  return {
    runId: options?.runId ?? generateRunId(),
    startTime: new Date(),
    config,
    traceMode: options?.traceMode ?? false,
    signal: controller.signal,
    stop: (reason) => {
      if (!controller.signal.aborted) {
        controller.abort(reason ?? "stop requested");
      }
    },
  };
}
