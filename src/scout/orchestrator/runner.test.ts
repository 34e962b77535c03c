/**
 * Tests for the resolution orchestrator
 */

import { describe, it, expect, vi } from "vitest";
import { ResolutionOrchestrator } from "./runner.js";
import { initialDirective } from "./escalation.js";
import { SearchBudget } from "./budget.js";
import type { RunReport } from "./core.js";
import type {
  CandidateSummary,
  PlanResult,
  Planner,
  ResultExporter,
  SearchRecord,
  WaveFailureReason,
  WaveOutcome,
  WaveRequest,
  WaveRunner,
} from "./types.js";
import { buildGeography, type Geography } from "../config/geography.js";
import { BudgetConfigSchema, ResolutionConfigSchema, SearchConfigSchema } from "../config/types.js";
import { ProgressReporter, type ProgressEvent } from "../progress/reporter.js";
import { GeographyError } from "../runtime/errors.js";
import type { ScoutLogger } from "../runtime/logger.js";

// Mock logger
function createMockLogger(): ScoutLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    capability: vi.fn(),
    flush: vi.fn().mockResolvedValue(undefined),
  };
}

type Step =
  | { status: "succeeded"; name: string }
  | { status: "failed"; reason: WaveFailureReason }
  | { status: "inconclusive" }
  | { status: "throw"; message: string };

function candidate(name: string): CandidateSummary {
  return {
    name,
    handle: `@${name.toLowerCase()}`,
    confidence: 0.8,
    totalScore: 0.7,
    independentSources: 2,
    sources: ["news.example", "blog.example"],
    subscriberCount: 40_000,
    lastActivityDate: "2026-10-01",
    localityScore: 0.9,
    categoryScore: 0.8,
  };
}

function toOutcome(request: WaveRequest, step: Exclude<Step, { status: "throw" }>): WaveOutcome {
  return {
    wave: request.wave,
    directive: request.directive,
    status: step.status,
    candidate: step.status === "succeeded" ? candidate(step.name) : null,
    failure:
      step.status === "failed" ? { reason: step.reason, stage: "search", detail: step.reason } : null,
    stoppedAfter: step.status === "inconclusive" ? "search" : null,
    queries: [`${request.locality.name} ${request.category.label} ${request.wave}`],
    stats: {
      queries: 1,
      results: 0,
      selected: 0,
      pagesFetched: 0,
      fragments: 0,
      weakSignals: 0,
      candidates: 0,
      channelsChecked: 0,
      confirmed: step.status === "succeeded" ? 1 : 0,
    },
    startedAt: "2026-10-19T00:00:00.000Z",
    completedAt: "2026-10-19T00:00:01.000Z",
  };
}

/**
 * Executor that plays back scripted steps per "locality/category"
 */
class ScriptedExecutor implements WaveRunner {
  readonly requests: WaveRequest[] = [];
  private readonly scripts: Map<string, Step[]>;
  private readonly fallback: Step;
  onExecute?: (request: WaveRequest) => void | Promise<void>;

  constructor(
    scripts: Record<string, Step[]>,
    fallback: Step = { status: "succeeded", name: "Anyone" },
  ) {
    this.scripts = new Map(Object.entries(scripts));
    this.fallback = fallback;
  }

  get calls(): string[] {
    return this.requests.map((r) => `${r.locality.id}/${r.category.id}#${r.wave}`);
  }

  async execute(request: WaveRequest): Promise<WaveOutcome> {
    this.requests.push(request);
    await this.onExecute?.(request);
    const key = `${request.locality.id}/${request.category.id}`;
    const step = this.scripts.get(key)?.shift() ?? this.fallback;
    if (step.status === "throw") {
      throw new Error(step.message);
    }
    return toOutcome(request, step);
  }
}

function createPlanner(results: PlanResult[]): Planner {
  const queue = [...results];
  return {
    plan: vi.fn(async () => {
      const next = queue.shift();
      if (!next) throw new Error("unexpected planner call");
      return next;
    }),
  };
}

const DIRECTIVE = initialDirective(SearchConfigSchema.parse({}));

function forumsDirective(): PlanResult {
  return {
    kind: "directive",
    directive: { ...DIRECTIVE, angle: "forums", sourceTypes: ["forums"], rationale: "try forums" },
  };
}

function singleSlot(): Geography {
  return buildGeography({
    categories: [{ id: "food", label: "Food" }],
    regions: [{ id: "north", name: "North", localities: ["Millbrook"] }],
  });
}

function twoRegions(): Geography {
  return buildGeography({
    categories: [{ id: "food", label: "Food" }],
    regions: [
      { id: "north", localities: ["a", "b"] },
      { id: "south", localities: ["c"] },
    ],
  });
}

function createOrchestrator(options: {
  executor: WaveRunner;
  planner?: Planner;
  waveCap?: number;
  blockingLocalities?: boolean;
  regionOrder?: string[];
  reporter?: ProgressReporter;
  checkpoint?: (report: RunReport) => Promise<void>;
  logger?: ScoutLogger;
  budget?: SearchBudget;
  exporter?: ResultExporter;
}): ResolutionOrchestrator {
  return new ResolutionOrchestrator({
    executor: options.executor,
    planner: options.planner ?? createPlanner([]),
    logger: options.logger ?? createMockLogger(),
    resolution: ResolutionConfigSchema.parse({
      waveCap: options.waveCap ?? 3,
      blockingLocalities: options.blockingLocalities ?? true,
      regionOrder: options.regionOrder ?? [],
    }),
    initialDirective: DIRECTIVE,
    reporter: options.reporter,
    runId: "run_test",
    checkpoint: options.checkpoint,
    budget: options.budget,
    exporter: options.exporter,
  });
}

describe("ResolutionOrchestrator", () => {
  it("escalates after a failed wave and marks the slot exhausted when the planner gives up", async () => {
    const executor = new ScriptedExecutor({
      "Millbrook/food": [
        { status: "failed", reason: "no-candidates" },
        { status: "failed", reason: "all-rejected" },
      ],
    });
    const planner = createPlanner([
      forumsDirective(),
      { kind: "exhausted", reason: "no-plausible-angle", rationale: "nothing left to try" },
    ]);
    const reporter = new ProgressReporter(createMockLogger());
    const events: ProgressEvent[] = [];
    reporter.subscribe((event) => {
      events.push(event);
    });

    const orchestrator = createOrchestrator({ executor, planner, reporter });
    const report = await orchestrator.run(singleSlot());

    const slot = report.regions.north.localities.Millbrook.categories.food;
    expect(slot.status).toBe("failed-exhausted");
    expect(slot.waves).toBe(2);
    expect(slot.failure).toEqual({
      reason: "no-plausible-angle",
      detail: "nothing left to try",
      lastWave: { reason: "all-rejected", stage: "search", detail: "all-rejected" },
    });
    expect(slot.attempts.map((a) => [a.wave, a.angle, a.reason])).toEqual([
      [1, "local-press", "no-candidates"],
      [2, "forums", "all-rejected"],
    ]);
    expect(executor.requests[1].directive.angle).toBe("forums");
    expect(planner.plan).toHaveBeenCalledTimes(2);

    expect(report.regions.north.localities.Millbrook.status).toBe("resolved");
    expect(report.regions.north.status).toBe("resolved");
    expect(report.status).toBe("completed");
    expect(report.totals).toEqual({
      regions: 1,
      regionsResolved: 1,
      localities: 1,
      localitiesResolved: 1,
      slots: 1,
      succeeded: 0,
      failedExhausted: 1,
      unresolved: 0,
      waves: 2,
    });

    expect(events.map((e) => e.type)).toEqual([
      "wave-started",
      "wave-completed",
      "wave-started",
      "wave-completed",
      "locality-resolved",
      "region-resolved",
      "run-completed",
    ]);
  });

  it("does not consult the planner when the first wave succeeds", async () => {
    const executor = new ScriptedExecutor({
      "Millbrook/food": [{ status: "succeeded", name: "Tasty" }],
    });
    const planner = createPlanner([]);

    const report = await createOrchestrator({ executor, planner }).run(singleSlot());

    const slot = report.regions.north.localities.Millbrook.categories.food;
    expect(slot.status).toBe("succeeded");
    expect(slot.candidate?.handle).toBe("@tasty");
    expect(slot.waves).toBe(1);
    expect(planner.plan).not.toHaveBeenCalled();
  });

  it("stops at the wave cap without asking the planner again", async () => {
    const executor = new ScriptedExecutor({
      "Millbrook/food": [
        { status: "failed", reason: "no-candidates" },
        { status: "failed", reason: "verification-failed" },
      ],
    });
    const planner = createPlanner([forumsDirective()]);

    const report = await createOrchestrator({ executor, planner, waveCap: 2 }).run(singleSlot());

    const slot = report.regions.north.localities.Millbrook.categories.food;
    expect(slot.status).toBe("failed-exhausted");
    expect(slot.failure?.reason).toBe("wave-cap");
    expect(slot.waves).toBe(2);
    expect(planner.plan).toHaveBeenCalledTimes(1);
  });

  it("walks regions in configured order and localities in insertion order", async () => {
    const executor = new ScriptedExecutor({});

    const report = await createOrchestrator({ executor, regionOrder: ["south"] }).run(twoRegions());

    expect(executor.calls).toEqual(["c/food#1", "a/food#1", "b/food#1"]);
    expect(Object.keys(report.regions)).toEqual(["south", "north"]);
    expect(report.totals.succeeded).toBe(3);
  });

  it("holds the next locality until the previous one is resolved", async () => {
    const executor = new ScriptedExecutor({});
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    executor.onExecute = (request) => (request.locality.id === "a" ? gate : undefined);

    const running = createOrchestrator({ executor }).run(twoRegions());
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(executor.calls).toEqual(["a/food#1"]);

    release();
    await running;
    expect(executor.calls).toEqual(["a/food#1", "b/food#1", "c/food#1"]);
  });

  it("runs localities of a region side by side when blocking is off", async () => {
    const executor = new ScriptedExecutor({});
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    executor.onExecute = (request) => (request.locality.id === "a" ? gate : undefined);

    const running = createOrchestrator({ executor, blockingLocalities: false }).run(twoRegions());
    await vi.waitFor(() => expect(executor.calls).toContain("b/food#1"));
    expect(executor.calls).not.toContain("c/food#1");

    release();
    const report = await running;
    expect(report.totals.succeeded).toBe(3);
  });

  it("leaves slots unresolved when stopped mid-wave", async () => {
    const executor = new ScriptedExecutor({
      "a/food": [{ status: "inconclusive" }],
    });
    const orchestrator = createOrchestrator({ executor });
    executor.onExecute = () => orchestrator.stop("operator");

    const report = await orchestrator.run(twoRegions());

    expect(report.status).toBe("stopped");
    expect(executor.calls).toEqual(["a/food#1"]);
    expect(report.regions.north.status).toBe("in-progress");
    expect(report.regions.north.localities.a.status).toBe("in-progress");
    expect(report.regions.north.localities.a.categories.food.status).toBe("unresolved");
    expect(report.regions.north.localities.b.status).toBe("pending");
    expect(report.regions.south.status).toBe("pending");
    expect(report.totals.unresolved).toBe(3);
  });

  it("keeps a slot open when its wave fails after a stop", async () => {
    const executor = new ScriptedExecutor({
      "a/food": [{ status: "failed", reason: "no-candidates" }],
    });
    const planner = createPlanner([forumsDirective()]);
    const orchestrator = createOrchestrator({ executor, planner });
    executor.onExecute = () => orchestrator.stop("operator");

    const report = await orchestrator.run(twoRegions());

    const slot = report.regions.north.localities.a.categories.food;
    expect(slot.status).toBe("unresolved");
    expect(slot.failure).toBeNull();
    expect(slot.attempts).toEqual([{ wave: 1, angle: "local-press", status: "failed", reason: "no-candidates" }]);
    expect(planner.plan).not.toHaveBeenCalled();
    expect(report.status).toBe("stopped");
  });

  it("detaches from the caller's signal once the run is over", async () => {
    const controller = new AbortController();
    const orchestrator = createOrchestrator({ executor: new ScriptedExecutor({}) });

    await orchestrator.run(singleSlot(), { signal: controller.signal });
    controller.abort("late");

    expect(orchestrator.stopped).toBe(false);
  });

  it("stops before the next wave once the search budget is spent", async () => {
    const budget = new SearchBudget(BudgetConfigSchema.parse({ globalBudget: 1 }));
    const executor = new ScriptedExecutor({});
    executor.onExecute = () => budget.report("direct", 0, 1);

    const report = await createOrchestrator({ executor, budget }).run(twoRegions());

    expect(executor.calls).toEqual(["a/food#1"]);
    expect(report.status).toBe("stopped");
    expect(report.regions.north.localities.a.categories.food.status).toBe("succeeded");
    expect(report.regions.north.localities.b.categories.food.status).toBe("unresolved");
  });

  it("starts nothing when the signal is already aborted", async () => {
    const executor = new ScriptedExecutor({});
    const controller = new AbortController();
    controller.abort("shutdown");

    const orchestrator = createOrchestrator({ executor });
    const report = await orchestrator.run(twoRegions(), { signal: controller.signal });

    expect(executor.calls).toEqual([]);
    expect(report.status).toBe("stopped");
    expect(orchestrator.stopped).toBe(true);
  });

  it("carries over terminal slots from an earlier report", async () => {
    const first = new ScriptedExecutor({
      "a/food": [{ status: "succeeded", name: "Alpha" }],
      "b/food": [{ status: "inconclusive" }],
    });
    const stopping = createOrchestrator({ executor: first });
    first.onExecute = (request) => {
      if (request.locality.id === "b") stopping.stop();
    };
    const earlier = await stopping.run(twoRegions());
    expect(earlier.regions.north.localities.b.categories.food.status).toBe("unresolved");

    const second = new ScriptedExecutor({});
    const report = await createOrchestrator({ executor: second }).run(twoRegions(), {
      resume: earlier,
    });

    expect(second.calls).toEqual(["b/food#1", "c/food#1"]);
    const resumed = report.regions.north.localities.a.categories.food;
    expect(resumed.resumed).toBe(true);
    expect(resumed.candidate?.name).toBe("Alpha");
    expect(report.status).toBe("completed");
    expect(report.totals.succeeded).toBe(3);
  });

  it("rejects a malformed geography before any wave", async () => {
    const executor = new ScriptedExecutor({});
    const geography: Geography = {
      categories: [{ id: "food", label: "Food", terms: [] }],
      regions: [
        { id: "north", name: "North", localities: [] },
        { id: "north", name: "North again", localities: [] },
      ],
    };

    await expect(createOrchestrator({ executor }).run(geography)).rejects.toThrow(GeographyError);
    expect(executor.calls).toEqual([]);
  });

  it("rejects a region order naming unknown regions", async () => {
    const executor = new ScriptedExecutor({});
    const orchestrator = createOrchestrator({ executor, regionOrder: ["east"] });

    await expect(orchestrator.run(twoRegions())).rejects.toThrow("Region order names unknown regions");
  });

  it("records a crashing wave as a failed stage", async () => {
    const executor = new ScriptedExecutor({
      "Millbrook/food": [{ status: "throw", message: "boom" }],
    });
    const planner = createPlanner([
      { kind: "exhausted", reason: "no-plausible-angle", rationale: "gave up" },
    ]);
    const logger = createMockLogger();

    const report = await createOrchestrator({ executor, planner, logger }).run(singleSlot());

    const slot = report.regions.north.localities.Millbrook.categories.food;
    expect(slot.failure?.lastWave).toEqual({
      reason: "stage-failed",
      stage: null,
      detail: "wave crashed: boom",
    });
    expect(logger.error).toHaveBeenCalledWith("Wave 1 crashed", {
      locality: "Millbrook",
      category: "food",
      error: "boom",
    });
  });

  it("rotates to the next angle when the planner throws", async () => {
    const executor = new ScriptedExecutor({
      "Millbrook/food": [{ status: "failed", reason: "no-candidates" }],
    });
    const planner: Planner = {
      plan: vi.fn().mockRejectedValue(new Error("planner offline")),
    };

    await createOrchestrator({ executor, planner }).run(singleSlot());

    expect(executor.requests[1].directive.angle).toBe("forums");
    expect(executor.requests[1].directive.triageThreshold).toBe(DIRECTIVE.triageThreshold - 1);
  });

  it("checkpoints after each region and at the end", async () => {
    const statuses: string[] = [];
    const checkpoint = vi.fn(async (report: RunReport) => {
      statuses.push(`${report.status}:${report.totals.regionsResolved}`);
    });

    await createOrchestrator({ executor: new ScriptedExecutor({}), checkpoint }).run(twoRegions());

    expect(statuses).toEqual(["running:1", "running:2", "completed:2"]);
  });

  it("keeps running when a checkpoint fails", async () => {
    const logger = createMockLogger();
    const checkpoint = vi.fn().mockRejectedValue(new Error("disk full"));

    const report = await createOrchestrator({
      executor: new ScriptedExecutor({}),
      checkpoint,
      logger,
    }).run(singleSlot());

    expect(report.status).toBe("completed");
    expect(logger.error).toHaveBeenCalledWith("Failed to save run report", { error: "disk full" });
  });

  it("is not affected by a failing progress observer", async () => {
    const reporter = new ProgressReporter(createMockLogger());
    reporter.subscribe(() => {
      throw new Error("observer broke");
    });

    const report = await createOrchestrator({ executor: new ScriptedExecutor({}), reporter }).run(
      singleSlot(),
    );

    expect(report.totals.succeeded).toBe(1);
    expect(reporter.stats).toEqual({ emitted: 5, observerFailures: 5 });
  });

  it("hands observers copies that cannot change the run", async () => {
    const executor = new ScriptedExecutor({
      "Millbrook/food": [
        { status: "failed", reason: "no-candidates" },
        { status: "succeeded", name: "Tasty" },
      ],
    });
    const reporter = new ProgressReporter(createMockLogger());
    reporter.subscribe((event) => {
      if (event.type === "wave-started") {
        event.directive.angle = "events";
      } else if (event.type === "wave-completed") {
        event.outcome.queries.length = 0;
        if (event.outcome.failure) event.outcome.failure.detail = "rewritten";
      } else if (event.type === "run-completed") {
        const slot = event.report.regions.north.localities.Millbrook.categories.food;
        if (slot.candidate) slot.candidate.name = "Gone";
      }
    });
    const orchestrator = createOrchestrator({
      executor,
      planner: createPlanner([forumsDirective()]),
      reporter,
    });

    const report = await orchestrator.run(singleSlot());

    expect(executor.requests.map((r) => r.directive.angle)).toEqual(["local-press", "forums"]);
    const slot = orchestrator.getSnapshot()?.regions[0].localities[0].slots[0];
    expect(slot?.history.map((o) => o.queries)).toEqual([["Millbrook Food 1"], ["Millbrook Food 2"]]);
    expect(slot?.history[0].failure?.detail).toBe("no-candidates");
    expect(slot?.candidate?.name).toBe("Tasty");
    expect(report.regions.north.localities.Millbrook.categories.food.candidate?.name).toBe("Tasty");
  });

  it("exports what each wave searched and confirmed", async () => {
    const record: SearchRecord = {
      query: "Millbrook food",
      page: 1,
      hit: { url: "https://news.example/a", title: "A", snippet: "", rank: 1 },
      triageScore: 7,
      triageReason: "local",
    };
    const executor = new ScriptedExecutor({
      "Millbrook/food": [{ status: "succeeded", name: "Tasty" }],
    });
    executor.onExecute = (request) => {
      request.journal?.searched([record]);
      request.journal?.confirmed([candidate("Tasty")]);
    };
    const exporter: ResultExporter = { exportWave: vi.fn(async () => {}) };

    await createOrchestrator({ executor, exporter }).run(singleSlot());

    expect(exporter.exportWave).toHaveBeenCalledTimes(1);
    expect(exporter.exportWave).toHaveBeenCalledWith(
      { runId: "run_test", regionId: "north", localityId: "Millbrook", categoryId: "food" },
      { wave: 1, angle: "local-press", searches: [record], confirmed: [candidate("Tasty")] },
    );
  });

  it("keeps running when an export fails", async () => {
    const executor = new ScriptedExecutor({});
    executor.onExecute = (request) => {
      request.journal?.confirmed([candidate("Anyone")]);
    };
    const exporter: ResultExporter = {
      exportWave: vi.fn().mockRejectedValue(new Error("read-only")),
    };
    const logger = createMockLogger();

    const report = await createOrchestrator({ executor, exporter, logger }).run(singleSlot());

    expect(report.status).toBe("completed");
    expect(report.totals.succeeded).toBe(1);
    expect(logger.error).toHaveBeenCalledWith("Failed to export wave results", { error: "read-only" });
  });

  it("skips the export of a wave that recorded nothing", async () => {
    const exporter: ResultExporter = { exportWave: vi.fn(async () => {}) };

    await createOrchestrator({ executor: new ScriptedExecutor({}), exporter }).run(singleSlot());

    expect(exporter.exportWave).not.toHaveBeenCalled();
  });

  it("exposes frozen snapshots of the state tree", async () => {
    const orchestrator = createOrchestrator({ executor: new ScriptedExecutor({}) });
    expect(orchestrator.getSnapshot()).toBeNull();

    await orchestrator.run(singleSlot());
    const snapshot = orchestrator.getSnapshot();

    expect(snapshot?.regions[0].status).toBe("resolved");
    expect(Object.isFrozen(snapshot?.regions[0].localities[0].slots[0])).toBe(true);
  });
});
