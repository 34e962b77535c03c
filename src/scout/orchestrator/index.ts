/**
 * Orchestrator module - waves, escalation and the resolution loop
 */

// Shared types
export * from "./types.js";

// Run bookkeeping
export {
  type RunStats,
  type RunLogEntry,
  type ResolutionContext,
  type RunStatus,
  type SlotReport,
  type LocalityReport,
  type RegionReport,
  type RunReport,
  RunReportSchema,
  createResolutionContext,
  parseRunReport,
  logEntry,
  recordWave,
  recordPlan,
  slotKey,
  buildRunReport,
  resumeSeeds,
  formatRunLog,
  formatReportSummary,
} from "./core.js";

// State tree
export {
  type UnitStatus,
  type SlotOutcome,
  type SlotState,
  type LocalityState,
  type RegionState,
  type ResolutionState,
  type ResolutionSnapshot,
  type ResumedSlot,
  StateInvariantError,
  createResolutionState,
  snapshotState,
} from "./state.js";

// Wave executor
export {
  type WaveExecutorOptions,
  WaveExecutor,
  aggregateConfidence,
  checkChannelPolicy,
  pickBest,
  rankCandidates,
  totalScore,
} from "./wave.js";

// Search budget
export {
  type SourceTier,
  type BudgetDecision,
  type TierSummary,
  type BudgetSummary,
  SOURCE_TIERS,
  SearchBudget,
  tierForWave,
} from "./budget.js";

// Escalation planner
export {
  type EscalationPlannerOptions,
  ANGLE_SOURCE_TYPES,
  EscalationPlanner,
  directiveKey,
  fallbackDirective,
  initialDirective,
} from "./escalation.js";

// Resolution orchestrator
export {
  type ResolutionOrchestratorOptions,
  type RunOptions,
  ResolutionOrchestrator,
  createResolutionOrchestrator,
} from "./runner.js";
