/**
 * Run bookkeeping - counters, the run log and the final report
 */

import { z } from "zod";
import type { RunId } from "../runtime/context.js";
import { FatalRunError } from "../runtime/errors.js";
import type {
  ResolutionState,
  ResumedSlot,
  SlotOutcome,
  SlotState,
  UnitStatus,
} from "./state.js";
import {
  EXHAUSTION_REASONS,
  WAVE_FAILURE_REASONS,
  WAVE_STAGES,
  WAVE_STATUSES,
  type CandidateSummary,
  type ExhaustionReason,
  type PlanResult,
  type WaveFailure,
  type WaveOutcome,
} from "./types.js";

/**
 * Run statistics
 */
export interface RunStats {
  startTime: number;
  waves: number;
  wavesSucceeded: number;
  wavesFailed: number;
  wavesInconclusive: number;
  plannerCalls: number;
  escalations: number;
}

/**
 * Run log entry
 */
export interface RunLogEntry {
  timestamp: number;
  type: "wave" | "escalation" | "resolution" | "stop" | "error";
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Bookkeeping for one orchestrator run
 */
export interface ResolutionContext {
  runId: RunId;
  stats: RunStats;
  log: RunLogEntry[];
}

/** running: a checkpoint written while regions are still open */
export type RunStatus = "running" | "completed" | "stopped";

export interface SlotReport {
  status: SlotOutcome;
  waves: number;
  candidate: CandidateSummary | null;
  failure: {
    reason: ExhaustionReason;
    detail: string;
    lastWave: WaveFailure | null;
  } | null;
  attempts: Array<{ wave: number; angle: string; status: WaveOutcome["status"]; reason: string | null }>;
  /** Carried over from an earlier run */
  resumed: boolean;
}

export interface LocalityReport {
  name: string;
  status: UnitStatus;
  categories: Record<string, SlotReport>;
}

export interface RegionReport {
  name: string;
  status: UnitStatus;
  localities: Record<string, LocalityReport>;
}

export interface RunReport {
  runId: RunId;
  status: RunStatus;
  startedAt: string;
  completedAt: string;
  waveCap: number;
  totals: {
    regions: number;
    regionsResolved: number;
    localities: number;
    localitiesResolved: number;
    slots: number;
    succeeded: number;
    failedExhausted: number;
    unresolved: number;
    waves: number;
  };
  regions: Record<string, RegionReport>;
}

// ============================================================
// Report schema (reports read back from disk)
// ============================================================

const count = z.number().int().min(0);
const unitStatus = z.enum(["pending", "in-progress", "resolved"]);

const CandidateSummarySchema = z.object({
  name: z.string(),
  handle: z.string().nullable(),
  confidence: z.number(),
  totalScore: z.number().nullable(),
  independentSources: count,
  sources: z.array(z.string()),
  subscriberCount: z.number().nullable(),
  lastActivityDate: z.string().nullable(),
  localityScore: z.number().nullable(),
  categoryScore: z.number().nullable(),
});

const WaveFailureSchema = z.object({
  reason: z.enum(WAVE_FAILURE_REASONS),
  stage: z.enum(WAVE_STAGES).nullable(),
  detail: z.string(),
});

const SlotReportSchema = z.object({
  status: z.enum(["unresolved", "succeeded", "failed-exhausted"]),
  waves: count,
  candidate: CandidateSummarySchema.nullable(),
  failure: z
    .object({
      reason: z.enum(EXHAUSTION_REASONS),
      detail: z.string(),
      lastWave: WaveFailureSchema.nullable(),
    })
    .nullable(),
  attempts: z.array(
    z.object({
      wave: z.number().int().min(1),
      angle: z.string(),
      status: z.enum(WAVE_STATUSES),
      reason: z.string().nullable(),
    }),
  ),
  resumed: z.boolean(),
});

export const RunReportSchema = z.object({
  runId: z.string().min(1),
  status: z.enum(["running", "completed", "stopped"]),
  startedAt: z.string(),
  completedAt: z.string(),
  waveCap: z.number().int().min(1),
  totals: z.object({
    regions: count,
    regionsResolved: count,
    localities: count,
    localitiesResolved: count,
    slots: count,
    succeeded: count,
    failedExhausted: count,
    unresolved: count,
    waves: count,
  }),
  regions: z.record(
    z.string(),
    z.object({
      name: z.string(),
      status: unitStatus,
      localities: z.record(
        z.string(),
        z.object({
          name: z.string(),
          status: unitStatus,
          categories: z.record(z.string(), SlotReportSchema),
        }),
      ),
    }),
  ),
});

/**
 * Validate a report read back from disk
 */
export function parseRunReport(value: unknown, source: string): RunReport {
  const result = RunReportSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FatalRunError(`Not a run report: ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Create a new resolution context
 */
export function createResolutionContext(runId: RunId): ResolutionContext {
  return {
    runId,
    stats: {
      startTime: Date.now(),
      waves: 0,
      wavesSucceeded: 0,
      wavesFailed: 0,
      wavesInconclusive: 0,
      plannerCalls: 0,
      escalations: 0,
    },
    log: [],
  };
}

/**
 * Log an entry to the run log
 */
export function logEntry(
  ctx: ResolutionContext,
  type: RunLogEntry["type"],
  message: string,
  data?: Record<string, unknown>,
): void {
  ctx.log.push({
    timestamp: Date.now(),
    type,
    message,
    data,
  });
}

/**
 * Record a finished wave
 */
export function recordWave(ctx: ResolutionContext, slotKey: string, outcome: WaveOutcome): void {
  ctx.stats.waves++;
  if (outcome.status === "succeeded") ctx.stats.wavesSucceeded++;
  else if (outcome.status === "failed") ctx.stats.wavesFailed++;
  else ctx.stats.wavesInconclusive++;

  logEntry(ctx, "wave", `${slotKey} wave ${outcome.wave}: ${outcome.status}`, {
    angle: outcome.directive.angle,
    ...(outcome.failure ? { reason: outcome.failure.reason, stage: outcome.failure.stage } : {}),
    ...(outcome.candidate ? { candidate: outcome.candidate.name } : {}),
  });
}

/**
 * Record a planner decision
 */
export function recordPlan(ctx: ResolutionContext, slotKey: string, result: PlanResult): void {
  ctx.stats.plannerCalls++;
  if (result.kind === "directive") {
    ctx.stats.escalations++;
    logEntry(ctx, "escalation", `${slotKey} escalates to ${result.directive.angle}`, {
      threshold: result.directive.triageThreshold,
      widen: result.directive.widenGeography,
      rationale: result.directive.rationale,
    });
  } else {
    logEntry(ctx, "escalation", `${slotKey} exhausted: ${result.reason}`, {
      rationale: result.rationale,
    });
  }
}

export function slotKey(regionId: string, localityId: string, categoryId: string): string {
  return `${regionId}/${localityId}/${categoryId}`;
}

/**
 * Report view of a slot; shares nothing with the state tree
 */
function reportSlot(slot: SlotState): SlotReport {
  const last = slot.history[slot.history.length - 1];
  return {
    status: slot.outcome,
    waves: slot.waves,
    candidate: slot.candidate ? structuredClone(slot.candidate) : null,
    failure: slot.exhaustion
      ? {
          reason: slot.exhaustion.reason,
          detail: slot.exhaustion.rationale,
          lastWave: last?.failure ? { ...last.failure } : null,
        }
      : null,
    attempts: slot.history.map((outcome) => ({
      wave: outcome.wave,
      angle: outcome.directive.angle,
      status: outcome.status,
      reason: outcome.failure?.reason ?? null,
    })),
    resumed: slot.resumed,
  };
}

/**
 * Build the run report from the state tree
 */
export function buildRunReport(
  ctx: ResolutionContext,
  state: ResolutionState,
  status: RunStatus,
): RunReport {
  const totals: RunReport["totals"] = {
    regions: 0,
    regionsResolved: 0,
    localities: 0,
    localitiesResolved: 0,
    slots: 0,
    succeeded: 0,
    failedExhausted: 0,
    unresolved: 0,
    waves: ctx.stats.waves,
  };
  const regions: Record<string, RegionReport> = {};

  for (const region of state.regions) {
    totals.regions++;
    if (region.status === "resolved") totals.regionsResolved++;

    const localities: Record<string, LocalityReport> = {};
    for (const locality of region.localities) {
      totals.localities++;
      if (locality.status === "resolved") totals.localitiesResolved++;

      const categories: Record<string, SlotReport> = {};
      for (const slot of locality.slots) {
        totals.slots++;
        if (slot.outcome === "succeeded") totals.succeeded++;
        else if (slot.outcome === "failed-exhausted") totals.failedExhausted++;
        else totals.unresolved++;
        categories[slot.categoryId] = reportSlot(slot);
      }

      localities[locality.id] = { name: locality.name, status: locality.status, categories };
    }

    regions[region.id] = { name: region.name, status: region.status, localities };
  }

  return {
    runId: ctx.runId,
    status,
    startedAt: new Date(ctx.stats.startTime).toISOString(),
    completedAt: new Date().toISOString(),
    waveCap: state.waveCap,
    totals,
    regions,
  };
}

/**
 * Terminal slots of an earlier report, keyed by `slotKey`
 */
export function resumeSeeds(report: RunReport): Map<string, ResumedSlot> {
  const seeds = new Map<string, ResumedSlot>();

  for (const [regionId, region] of Object.entries(report.regions)) {
    for (const [localityId, locality] of Object.entries(region.localities)) {
      for (const [categoryId, slot] of Object.entries(locality.categories)) {
        if (slot.status === "unresolved") continue;
        seeds.set(slotKey(regionId, localityId, categoryId), {
          outcome: slot.status,
          waves: slot.waves,
          candidate: slot.candidate,
          exhaustion: slot.failure ? { reason: slot.failure.reason, rationale: slot.failure.detail } : null,
        });
      }
    }
  }

  return seeds;
}

/**
 * Format run log as markdown
 */
export function formatRunLog(ctx: ResolutionContext): string {
  const lines: string[] = [
    `# Run Log: ${ctx.runId}`,
    "",
    `**Started:** ${new Date(ctx.stats.startTime).toISOString()}`,
    `**Duration:** ${Date.now() - ctx.stats.startTime}ms`,
    `**Waves:** ${ctx.stats.waves} (${ctx.stats.wavesSucceeded} succeeded, ${ctx.stats.wavesFailed} failed, ${ctx.stats.wavesInconclusive} stopped)`,
    `**Escalations:** ${ctx.stats.escalations}/${ctx.stats.plannerCalls} planner calls`,
    "",
    "## Log",
    "",
  ];

  for (const entry of ctx.log) {
    const time = new Date(entry.timestamp).toISOString().split("T")[1];
    const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
    lines.push(`- \`${time}\` [${entry.type}] ${entry.message}${dataStr}`);
  }

  return lines.join("\n");
}

/**
 * Plain-text summary of a report, one line per slot
 */
export function formatReportSummary(report: RunReport): string {
  const t = report.totals;
  const lines: string[] = [
    `Run ${report.runId} (${report.status})`,
    `  ${t.succeeded} succeeded, ${t.failedExhausted} exhausted, ${t.unresolved} unresolved of ${t.slots} slots; ${t.waves} waves`,
  ];

  for (const [regionId, region] of Object.entries(report.regions)) {
    lines.push(`${region.name} [${regionId}] ${region.status}`);
    for (const [localityId, locality] of Object.entries(region.localities)) {
      lines.push(`  ${locality.name} [${localityId}] ${locality.status}`);
      for (const [categoryId, slot] of Object.entries(locality.categories)) {
        const detail = slot.candidate
          ? `${slot.candidate.name}${slot.candidate.handle ? ` ${slot.candidate.handle}` : ""}`
          : (slot.failure?.reason ?? "");
        lines.push(
          `    ${categoryId}: ${slot.status}, wave ${slot.waves}/${report.waveCap}${detail ? ` - ${detail}` : ""}`,
        );
      }
    }
  }

  return lines.join("\n");
}
