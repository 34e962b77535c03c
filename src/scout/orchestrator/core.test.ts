/**
 * Tests for run bookkeeping
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createResolutionContext,
  recordWave,
  recordPlan,
  buildRunReport,
  resumeSeeds,
  slotKey,
  logEntry,
  formatRunLog,
  formatReportSummary,
  parseRunReport,
  type ResolutionContext,
} from "./core.js";
import {
  beginWave,
  createResolutionState,
  markExhausted,
  markSucceeded,
  recordOutcome,
  resolveLocality,
  resolveRegion,
  type ResolutionState,
} from "./state.js";
import { initialDirective } from "./escalation.js";
import type { CandidateSummary, WaveFailureReason, WaveOutcome } from "./types.js";
import { buildGeography } from "../config/geography.js";
import { SearchConfigSchema } from "../config/types.js";
import { FatalRunError } from "../runtime/errors.js";

const DIRECTIVE = initialDirective(SearchConfigSchema.parse({}));

const TASTY: CandidateSummary = {
  name: "Tasty",
  handle: "@tasty",
  confidence: 0.8,
  totalScore: 0.75,
  independentSources: 2,
  sources: ["news.example", "blog.example"],
  subscriberCount: 42_000,
  lastActivityDate: "2026-10-10",
  localityScore: 0.9,
  categoryScore: 0.7,
};

function outcome(wave: number, reason: WaveFailureReason | null): WaveOutcome {
  return {
    wave,
    directive: DIRECTIVE,
    status: reason ? "failed" : "succeeded",
    candidate: reason ? null : TASTY,
    failure: reason ? { reason, stage: "triage", detail: `${reason} detail` } : null,
    stoppedAfter: null,
    queries: [],
    stats: {
      queries: 4,
      results: 10,
      selected: 3,
      pagesFetched: 3,
      fragments: 2,
      weakSignals: 0,
      candidates: 1,
      channelsChecked: 1,
      confirmed: reason ? 0 : 1,
    },
    startedAt: "2026-10-19T00:00:00.000Z",
    completedAt: "2026-10-19T00:00:05.000Z",
  };
}

/**
 * North/Millbrook with food succeeded in one wave and drink exhausted after two
 */
function resolvedState(ctx: ResolutionContext): ResolutionState {
  const geography = buildGeography({
    categories: [
      { id: "food", label: "Food" },
      { id: "drink", label: "Drink" },
    ],
    regions: [{ id: "north", name: "North", localities: ["Millbrook"] }],
  });
  const state = createResolutionState(geography, geography.regions, {
    waveCap: 2,
    initialDirective: DIRECTIVE,
  });
  const region = state.regions[0];
  const locality = region.localities[0];
  const [food, drink] = locality.slots;

  beginWave(state, food);
  const first = outcome(1, null);
  recordOutcome(state, food, first);
  recordWave(ctx, slotKey("north", "Millbrook", "food"), first);
  markSucceeded(state, food, TASTY);

  for (const [wave, reason] of [
    [1, "no-candidates"],
    [2, "all-rejected"],
  ] as const) {
    beginWave(state, drink);
    const result = outcome(wave, reason);
    recordOutcome(state, drink, result);
    recordWave(ctx, slotKey("north", "Millbrook", "drink"), result);
  }
  markExhausted(state, drink, "wave-cap", "2 waves without a confirmed candidate");

  resolveLocality(state, locality);
  resolveRegion(state, region);
  return state;
}

describe("orchestrator core", () => {
  let ctx: ResolutionContext;

  beforeEach(() => {
    ctx = createResolutionContext("run_test");
  });

  describe("createResolutionContext", () => {
    it("creates an empty context", () => {
      const fresh = createResolutionContext("run_default");

      expect(fresh.runId).toBe("run_default");
      expect(fresh.stats.waves).toBe(0);
      expect(fresh.log).toEqual([]);
    });
  });

  describe("recordWave", () => {
    it("counts waves by status and logs them", () => {
      recordWave(ctx, "r/l/c", outcome(1, "no-candidates"));
      recordWave(ctx, "r/l/c", outcome(2, null));

      expect(ctx.stats).toMatchObject({ waves: 2, wavesSucceeded: 1, wavesFailed: 1, wavesInconclusive: 0 });
      expect(ctx.log[0]).toMatchObject({
        type: "wave",
        message: "r/l/c wave 1: failed",
        data: { angle: "local-press", reason: "no-candidates", stage: "triage" },
      });
      expect(ctx.log[1].data).toEqual({ angle: "local-press", candidate: "Tasty" });
    });
  });

  describe("recordPlan", () => {
    it("counts escalations separately from planner calls", () => {
      recordPlan(ctx, "r/l/c", {
        kind: "directive",
        directive: { ...DIRECTIVE, angle: "forums", rationale: "try forums" },
      });
      recordPlan(ctx, "r/l/c", { kind: "exhausted", reason: "no-untried-angle", rationale: "done" });

      expect(ctx.stats.plannerCalls).toBe(2);
      expect(ctx.stats.escalations).toBe(1);
      expect(ctx.log.map((e) => e.message)).toEqual([
        "r/l/c escalates to forums",
        "r/l/c exhausted: no-untried-angle",
      ]);
    });
  });

  describe("buildRunReport", () => {
    it("totals slots and keeps per-slot detail", () => {
      const report = buildRunReport(ctx, resolvedState(ctx), "completed");

      expect(report.runId).toBe("run_test");
      expect(report.waveCap).toBe(2);
      expect(report.totals).toEqual({
        regions: 1,
        regionsResolved: 1,
        localities: 1,
        localitiesResolved: 1,
        slots: 2,
        succeeded: 1,
        failedExhausted: 1,
        unresolved: 0,
        waves: 3,
      });

      const drink = report.regions.north.localities.Millbrook.categories.drink;
      expect(drink.failure).toEqual({
        reason: "wave-cap",
        detail: "2 waves without a confirmed candidate",
        lastWave: { reason: "all-rejected", stage: "triage", detail: "all-rejected detail" },
      });
      expect(drink.attempts).toEqual([
        { wave: 1, angle: "local-press", status: "failed", reason: "no-candidates" },
        { wave: 2, angle: "local-press", status: "failed", reason: "all-rejected" },
      ]);
    });
  });

  describe("resumeSeeds", () => {
    it("seeds only terminal slots", () => {
      const report = buildRunReport(ctx, resolvedState(ctx), "completed");
      report.regions.north.localities.Millbrook.categories.extra = {
        status: "unresolved",
        waves: 1,
        candidate: null,
        failure: null,
        attempts: [],
        resumed: false,
      };

      const seeds = resumeSeeds(report);

      expect([...seeds.keys()]).toEqual(["north/Millbrook/food", "north/Millbrook/drink"]);
      expect(seeds.get("north/Millbrook/food")).toEqual({
        outcome: "succeeded",
        waves: 1,
        candidate: TASTY,
        exhaustion: null,
      });
      expect(seeds.get("north/Millbrook/drink")?.exhaustion).toEqual({
        reason: "wave-cap",
        rationale: "2 waves without a confirmed candidate",
      });
    });
  });

  describe("parseRunReport", () => {
    it("accepts a report as written", () => {
      const report = buildRunReport(ctx, resolvedState(ctx), "completed");

      expect(parseRunReport(JSON.parse(JSON.stringify(report)), "run_test.json")).toEqual(report);
    });

    it("rejects a region without its localities", () => {
      const report = buildRunReport(ctx, resolvedState(ctx), "completed");
      const raw = { ...report, regions: { north: { name: "North" } } };

      expect(() => parseRunReport(raw, "run_test.json")).toThrow(FatalRunError);
      expect(() => parseRunReport(raw, "run_test.json")).toThrow(
        "Not a run report: run_test.json: regions.north.status: Required; regions.north.localities: Required",
      );
    });

    it("rejects an unknown slot status", () => {
      const report = buildRunReport(ctx, resolvedState(ctx), "completed");
      const millbrook = report.regions.north.localities.Millbrook;
      const raw = {
        ...report,
        regions: {
          north: {
            ...report.regions.north,
            localities: {
              Millbrook: {
                ...millbrook,
                categories: { ...millbrook.categories, food: { ...millbrook.categories.food, status: "done" } },
              },
            },
          },
        },
      };

      expect(() => parseRunReport(raw, "run_test.json")).toThrow(
        "regions.north.localities.Millbrook.categories.food.status: Invalid enum value",
      );
    });
  });

  describe("formatRunLog", () => {
    it("formats log as markdown", () => {
      logEntry(ctx, "stop", "Run stopped: operator");
      recordWave(ctx, "r/l/c", outcome(1, null));

      const log = formatRunLog(ctx);

      expect(log).toContain("# Run Log: run_test");
      expect(log).toContain("**Waves:** 1 (1 succeeded, 0 failed, 0 stopped)");
      expect(log).toContain("[stop] Run stopped: operator");
      expect(log).toContain('[wave] r/l/c wave 1: succeeded {"angle":"local-press","candidate":"Tasty"}');
    });
  });

  describe("formatReportSummary", () => {
    it("prints one line per slot", () => {
      const report = buildRunReport(ctx, resolvedState(ctx), "completed");

      expect(formatReportSummary(report).split("\n")).toEqual([
        "Run run_test (completed)",
        "  1 succeeded, 1 exhausted, 0 unresolved of 2 slots; 3 waves",
        "North [north] resolved",
        "  Millbrook [Millbrook] resolved",
        "    food: succeeded, wave 1/2 - Tasty @tasty",
        "    drink: failed-exhausted, wave 2/2 - wave-cap",
      ]);
    });
  });
});
