/**
 * Resolution Orchestrator - walks regions, localities and category slots
 *
 * Regions run one after another in configured order. Within a region a
 * locality starts only once the previous one is resolved (unless blocking is
 * off). Each category slot runs waves until one succeeds, the planner gives
 * up, or the wave cap is hit. A stop (external, or a spent search budget)
 * leaves open slots unresolved for a resumed run.
 */

import pLimit from "p-limit";
import type { ResolutionConfig } from "../config/types.js";
import {
  assertGeography,
  orderRegions,
  type Category,
  type Geography,
  type LocalityDef,
  type RegionDef,
} from "../config/geography.js";
import type { ProgressReporter } from "../progress/reporter.js";
import { generateRunId, type RunId } from "../runtime/context.js";
import type { ScoutLogger } from "../runtime/logger.js";
import type { SearchBudget } from "./budget.js";
import {
  type ResolutionContext,
  type RunReport,
  buildRunReport,
  createResolutionContext,
  logEntry,
  recordPlan,
  recordWave,
  resumeSeeds,
  slotKey,
} from "./core.js";
import { fallbackDirective } from "./escalation.js";
import {
  type LocalityState,
  type RegionState,
  type ResolutionSnapshot,
  type ResolutionState,
  type ResumedSlot,
  type SlotState,
  beginWave,
  createResolutionState,
  isTerminal,
  markExhausted,
  markInProgress,
  markSucceeded,
  recordOutcome,
  resolveLocality,
  resolveRegion,
  seedSlot,
  setDirective,
  snapshotState,
} from "./state.js";
import type {
  CandidateSummary,
  Directive,
  PlanContext,
  PlanResult,
  Planner,
  ResultExporter,
  SearchRecord,
  SlotLocation,
  WaveExport,
  WaveJournal,
  WaveOutcome,
  WaveRequest,
  WaveRunner,
} from "./types.js";

export interface ResolutionOrchestratorOptions {
  executor: WaveRunner;
  planner: Planner;
  logger: ScoutLogger;
  resolution: ResolutionConfig;
  initialDirective: Directive;
  reporter?: ProgressReporter;
  runId?: RunId;
  /** Receives a report after every region and once more at the end */
  checkpoint?: (report: RunReport) => Promise<void>;
  /** Stops the run once spent; shared with the wave executor */
  budget?: SearchBudget;
  /** Receives each wave's search log and confirmed candidates */
  exporter?: ResultExporter;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Terminal slots of this earlier report are carried over, not re-run */
  resume?: RunReport;
}

/**
 * Ids that place a slot in the tree
 */
interface SlotRef {
  region: RegionState;
  locality: LocalityState;
  localityDef: LocalityDef;
  category: Category;
  slot: SlotState;
  key: string;
}

const EMPTY_STATS = {
  queries: 0,
  results: 0,
  selected: 0,
  pagesFetched: 0,
  fragments: 0,
  weakSignals: 0,
  candidates: 0,
  channelsChecked: 0,
  confirmed: 0,
};

export class ResolutionOrchestrator {
  private readonly options: ResolutionOrchestratorOptions;
  private readonly logger: ScoutLogger;
  private readonly stopController = new AbortController();
  private ctx: ResolutionContext | null = null;
  private state: ResolutionState | null = null;
  readonly runId: RunId;

  constructor(options: ResolutionOrchestratorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.runId = options.runId ?? generateRunId();
  }

  /**
   * Get the current resolution context
   */
  getContext(): ResolutionContext | null {
    return this.ctx;
  }

  /**
   * Deep-frozen copy of the state tree, null before the first run
   */
  getSnapshot(): ResolutionSnapshot | null {
    return this.state ? snapshotState(this.state) : null;
  }

  /**
   * Ask the run to stop: no new wave starts, running waves end at their next stage boundary
   */
  stop(reason = "stop requested"): void {
    if (!this.stopController.signal.aborted) {
      this.logger.info(`Stopping run: ${reason}`);
      this.stopController.abort(reason);
    }
  }

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  async run(geography: Geography, options: RunOptions = {}): Promise<RunReport> {
    const { resolution } = this.options;

    // Throws GeographyError; nothing has started yet
    assertGeography(geography);
    const regions = orderRegions(geography, resolution.regionOrder);

    const external = options.signal;
    const onAbort = (): void => this.stop(String(external?.reason));
    if (external?.aborted) {
      onAbort();
    } else {
      external?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      return await this.runRegions(geography, regions, options);
    } finally {
      external?.removeEventListener("abort", onAbort);
    }
  }

  private async runRegions(
    geography: Geography,
    regions: RegionDef[],
    options: RunOptions,
  ): Promise<RunReport> {
    const { resolution } = this.options;
    const ctx = createResolutionContext(this.runId);
    const state = createResolutionState(geography, regions, {
      waveCap: resolution.waveCap,
      initialDirective: this.options.initialDirective,
    });
    this.ctx = ctx;
    this.state = state;

    const seeds = options.resume ? resumeSeeds(options.resume) : new Map<string, ResumedSlot>();
    this.applySeeds(ctx, state, seeds);

    this.logger.info(`Starting run ${ctx.runId}`, {
      regions: regions.length,
      categories: geography.categories.length,
      waveCap: resolution.waveCap,
      resumed: seeds.size,
    });

    for (const [index, region] of state.regions.entries()) {
      if (this.stopped) break;
      await this.processRegion(ctx, state, region, regions[index], geography.categories);
      if (!this.stopped) {
        await this.saveCheckpoint(buildRunReport(ctx, state, "running"));
      }
    }

    if (this.stopped) {
      logEntry(ctx, "stop", `Run stopped: ${String(this.stopController.signal.reason)}`);
    }
    if (this.options.budget) {
      this.logger.info("Search budget", { ...this.options.budget.summary() });
    }

    const status = state.regions.every((r) => r.status === "resolved") ? "completed" : "stopped";
    const report = buildRunReport(ctx, state, status);
    await this.saveCheckpoint(report);

    this.options.reporter?.emit({
      type: "run-completed",
      runId: ctx.runId,
      report,
      at: new Date().toISOString(),
    });
    return report;
  }

  private applySeeds(
    ctx: ResolutionContext,
    state: ResolutionState,
    seeds: Map<string, ResumedSlot>,
  ): void {
    if (seeds.size === 0) return;

    for (const region of state.regions) {
      for (const locality of region.localities) {
        for (const slot of locality.slots) {
          const seed = seeds.get(slotKey(region.id, locality.id, slot.categoryId));
          if (seed) seedSlot(state, slot, seed);
        }
        if (resolveLocality(state, locality)) {
          logEntry(ctx, "resolution", `${region.id}/${locality.id} carried over as resolved`);
        }
      }
      resolveRegion(state, region);
    }
  }

  private async processRegion(
    ctx: ResolutionContext,
    state: ResolutionState,
    region: RegionState,
    regionDef: RegionDef,
    categories: Category[],
  ): Promise<void> {
    if (region.status === "resolved") return;
    markInProgress(state, region);
    this.logger.info(`Region ${region.name}`, { localities: region.localities.length });

    const work = region.localities.map((locality, index) => ({
      locality,
      localityDef: regionDef.localities[index],
    }));

    if (this.options.resolution.blockingLocalities) {
      for (const { locality, localityDef } of work) {
        if (this.stopped) break;
        await this.processLocality(ctx, state, region, locality, localityDef, categories);
        // Blocking: the next locality waits on this one
        if (locality.status !== "resolved") break;
      }
    } else {
      await Promise.all(
        work.map(({ locality, localityDef }) =>
          this.processLocality(ctx, state, region, locality, localityDef, categories),
        ),
      );
    }

    if (resolveRegion(state, region)) {
      logEntry(ctx, "resolution", `Region ${region.id} resolved`);
      this.options.reporter?.emit({
        type: "region-resolved",
        runId: ctx.runId,
        regionId: region.id,
        at: new Date().toISOString(),
      });
    }
  }

  private async processLocality(
    ctx: ResolutionContext,
    state: ResolutionState,
    region: RegionState,
    locality: LocalityState,
    localityDef: LocalityDef,
    categories: Category[],
  ): Promise<void> {
    if (locality.status === "resolved" || this.stopped) return;
    markInProgress(state, locality);

    const open: SlotRef[] = [];
    for (const [index, slot] of locality.slots.entries()) {
      if (isTerminal(slot)) continue;
      open.push({
        region,
        locality,
        localityDef,
        category: categories[index],
        slot,
        key: slotKey(region.id, locality.id, slot.categoryId),
      });
    }

    const limit = pLimit(this.options.resolution.slotConcurrency);
    await Promise.all(open.map((ref) => limit(() => this.processSlot(ctx, state, ref))));

    if (resolveLocality(state, locality)) {
      logEntry(ctx, "resolution", `${region.id}/${locality.id} resolved`);
      this.options.reporter?.emit({
        type: "locality-resolved",
        runId: ctx.runId,
        regionId: region.id,
        localityId: locality.id,
        at: new Date().toISOString(),
      });
    }
  }

  /**
   * Run waves for one slot until it is terminal or the run stops
   */
  private async processSlot(
    ctx: ResolutionContext,
    state: ResolutionState,
    ref: SlotRef,
  ): Promise<void> {
    const { slot, key } = ref;
    const planContext: PlanContext = {
      locality: ref.localityDef,
      category: ref.category,
      waveCap: state.waveCap,
    };
    const where: SlotLocation = {
      runId: ctx.runId,
      regionId: ref.region.id,
      localityId: ref.locality.id,
      categoryId: slot.categoryId,
    };

    while (!isTerminal(slot)) {
      if (this.stopped || this.budgetSpent()) return;

      const wave = beginWave(state, slot);
      const directive = slot.directive;
      this.options.reporter?.emit({
        type: "wave-started",
        ...where,
        at: new Date().toISOString(),
        wave,
        directive,
      });

      const searches: SearchRecord[] = [];
      let confirmed: CandidateSummary[] = [];
      const journal: WaveJournal | undefined = this.options.exporter
        ? {
            searched: (records) => {
              searches.push(...records);
            },
            confirmed: (candidates) => {
              confirmed = candidates;
            },
          }
        : undefined;

      const outcome = await this.executeWave({
        locality: ref.localityDef,
        category: ref.category,
        directive,
        wave,
        signal: this.stopController.signal,
        journal,
      });

      recordOutcome(state, slot, outcome);
      recordWave(ctx, key, outcome);
      this.options.reporter?.emit({
        type: "wave-completed",
        ...where,
        at: new Date().toISOString(),
        outcome,
      });
      await this.exportWave(ctx, where, { wave, angle: directive.angle, searches, confirmed });

      if (outcome.status === "succeeded" && outcome.candidate) {
        markSucceeded(state, slot, outcome.candidate);
        logEntry(ctx, "resolution", `${key} succeeded: ${outcome.candidate.name}`, {
          wave,
          handle: outcome.candidate.handle,
        });
        return;
      }

      // Stopped mid-wave: the slot stays open for a resumed run, even when the wave failed
      if (outcome.status === "inconclusive" || this.stopped) return;

      if (slot.waves >= state.waveCap) {
        markExhausted(state, slot, "wave-cap", `${slot.waves} waves without a confirmed candidate`);
        logEntry(ctx, "resolution", `${key} exhausted: wave-cap`);
        return;
      }

      const plan = await this.plan(ctx, key, slot.history, planContext);
      recordPlan(ctx, key, plan);
      if (plan.kind === "exhausted") {
        markExhausted(state, slot, plan.reason, plan.rationale);
        return;
      }
      setDirective(state, slot, plan.directive);
    }
  }

  private async executeWave(request: WaveRequest): Promise<WaveOutcome> {
    const startedAt = new Date().toISOString();
    try {
      return await this.options.executor.execute(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Wave ${request.wave} crashed`, {
        locality: request.locality.id,
        category: request.category.id,
        error: message,
      });
      return {
        wave: request.wave,
        directive: request.directive,
        status: "failed",
        candidate: null,
        failure: { reason: "stage-failed", stage: null, detail: `wave crashed: ${message}` },
        stoppedAfter: null,
        queries: [],
        stats: { ...EMPTY_STATS },
        startedAt,
        completedAt: new Date().toISOString(),
      };
    }
  }

  private async plan(
    ctx: ResolutionContext,
    key: string,
    history: readonly WaveOutcome[],
    context: PlanContext,
  ): Promise<PlanResult> {
    try {
      return await this.options.planner.plan(history, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Planner failed for ${key}, rotating angle`, { error: message });
      logEntry(ctx, "error", `${key} planner failed: ${message}`);
      const directive = fallbackDirective(history);
      return directive
        ? { kind: "directive", directive }
        : { kind: "exhausted", reason: "no-untried-angle", rationale: "every angle class was tried" };
    }
  }

  /**
   * Stop the run once the search budget is spent; true when it is
   */
  private budgetSpent(): boolean {
    const reason = this.options.budget?.stopReason ?? null;
    if (reason === null) return false;
    this.stop(`search budget spent (${reason})`);
    return true;
  }

  private async exportWave(
    ctx: ResolutionContext,
    where: SlotLocation,
    wave: WaveExport,
  ): Promise<void> {
    const exporter = this.options.exporter;
    if (!exporter || (wave.searches.length === 0 && wave.confirmed.length === 0)) return;
    try {
      await exporter.exportWave(where, wave);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Failed to export wave results", { error: message });
      logEntry(ctx, "error", `Export of wave ${wave.wave} failed: ${message}`);
    }
  }

  private async saveCheckpoint(report: RunReport): Promise<void> {
    if (!this.options.checkpoint) return;
    try {
      await this.options.checkpoint(report);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Failed to save run report", { error: message });
      if (this.ctx) logEntry(this.ctx, "error", `Report checkpoint failed: ${message}`);
    }
  }
}

/**
 * Create a resolution orchestrator
 */
export function createResolutionOrchestrator(
  options: ResolutionOrchestratorOptions,
): ResolutionOrchestrator {
  return new ResolutionOrchestrator(options);
}
