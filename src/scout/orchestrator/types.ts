/**
 * Domain types shared by the wave executor, the planner and the orchestrator
 */

import type { ChannelInfo, SearchHit } from "../capabilities/types.js";
import type { Category, LocalityDef } from "../config/geography.js";

// ============================================================
// Directives
// ============================================================

/**
 * Search angle classes, in fallback rotation order
 */
export const ANGLE_CLASSES = [
  "local-press",
  "forums",
  "best-of-lists",
  "social-bios",
  "interviews",
  "events",
  "regional",
  "community",
] as const;

export type AngleClass = (typeof ANGLE_CLASSES)[number];

export function isAngleClass(value: string): value is AngleClass {
  return ANGLE_CLASSES.some((angle) => angle === value);
}

/**
 * Strategy for one wave; each escalation replaces the previous one
 */
export interface Directive {
  angle: AngleClass;
  sourceTypes: string[];
  /** Minimum triage score (0-10) for a result to be fetched */
  triageThreshold: number;
  widenGeography: boolean;
  maxQueries: number;
  /** Queries earlier waves already ran */
  avoidQueries: string[];
  rationale: string;
}

// ============================================================
// Evidence
// ============================================================

export type FragmentOrigin = "extraction" | "followup";

/**
 * One piece of evidence pulled from one source. Never mutated.
 */
export interface Fragment {
  readonly id: string;
  readonly sourceUrl: string;
  readonly sourceDomain: string;
  readonly name: string;
  readonly handle: string | null;
  /** Span of source text tying the name to the locality */
  readonly quote: string;
  readonly tags: { readonly locality: boolean; readonly category: boolean };
  readonly confidence: number;
  readonly wave: number;
  readonly origin: FragmentOrigin;
}

export type CandidateStatus =
  | "unverified"
  | "channel-checked"
  | "adversarially-confirmed"
  | "rejected";

export interface Verdict {
  survives: boolean;
  localityScore: number;
  categoryScore: number;
  concerns: string[];
}

export interface Candidate {
  id: string;
  name: string;
  handle: string | null;
  fragments: Fragment[];
  /** Distinct source domains among the fragments */
  independentSources: number;
  confidence: number;
  status: CandidateStatus;
  rejection: string | null;
  channel: ChannelInfo | null;
  verdict: Verdict | null;
  totalScore: number | null;
}

/**
 * Serializable view of a confirmed candidate, as stored in reports
 */
export interface CandidateSummary {
  name: string;
  handle: string | null;
  confidence: number;
  totalScore: number | null;
  independentSources: number;
  sources: string[];
  subscriberCount: number | null;
  lastActivityDate: string | null;
  localityScore: number | null;
  categoryScore: number | null;
}

// ============================================================
// Waves
// ============================================================

/**
 * Wave stages in the order they run
 */
export const WAVE_STAGES = [
  "queries",
  "search",
  "triage",
  "extraction",
  "assembly",
  "followup",
  "channel-check",
  "verification",
] as const;

export type WaveStage = (typeof WAVE_STAGES)[number];

export const WAVE_FAILURE_REASONS = [
  "no-candidates",
  "all-rejected",
  "verification-failed",
  "network-exhausted",
  "stage-failed",
] as const;

export type WaveFailureReason = (typeof WAVE_FAILURE_REASONS)[number];

export interface WaveFailure {
  reason: WaveFailureReason;
  /** null when the wave broke down outside any stage */
  stage: WaveStage | null;
  detail: string;
}

export interface WaveStats {
  queries: number;
  results: number;
  selected: number;
  pagesFetched: number;
  fragments: number;
  weakSignals: number;
  candidates: number;
  channelsChecked: number;
  confirmed: number;
}

/**
 * succeeded: a candidate survived; failed: see `failure`;
 * inconclusive: stopped between stages, the slot stays unresolved
 */
export const WAVE_STATUSES = ["succeeded", "failed", "inconclusive"] as const;

export type WaveStatus = (typeof WAVE_STATUSES)[number];

export interface WaveOutcome {
  readonly wave: number;
  readonly directive: Directive;
  readonly status: WaveStatus;
  readonly candidate: CandidateSummary | null;
  readonly failure: WaveFailure | null;
  /** Last stage completed before a stop */
  readonly stoppedAfter: WaveStage | null;
  readonly queries: string[];
  readonly stats: WaveStats;
  readonly startedAt: string;
  readonly completedAt: string;
}

/**
 * One search result as returned, with the triage score it later got
 */
export interface SearchRecord {
  query: string;
  page: number;
  hit: SearchHit;
  triageScore: number | null;
  triageReason: string | null;
}

/**
 * Receives what a wave saw, for export; called once per kind at most
 */
export interface WaveJournal {
  searched(records: SearchRecord[]): void;
  /** Every candidate that survived verification, best first */
  confirmed(candidates: CandidateSummary[]): void;
}

export interface WaveRequest {
  locality: LocalityDef;
  category: Category;
  directive: Directive;
  wave: number;
  signal?: AbortSignal;
  journal?: WaveJournal;
}

export interface WaveRunner {
  execute(request: WaveRequest): Promise<WaveOutcome>;
}

export interface SlotLocation {
  runId: string;
  regionId: string;
  localityId: string;
  categoryId: string;
}

export interface WaveExport {
  wave: number;
  angle: AngleClass;
  searches: readonly SearchRecord[];
  confirmed: readonly CandidateSummary[];
}

/**
 * Writes per-slot results somewhere outside the run report
 */
export interface ResultExporter {
  exportWave(slot: SlotLocation, wave: WaveExport): Promise<void>;
}

// ============================================================
// Escalation
// ============================================================

export const EXHAUSTION_REASONS = ["wave-cap", "no-plausible-angle", "no-untried-angle"] as const;

export type ExhaustionReason = (typeof EXHAUSTION_REASONS)[number];

export type PlanResult =
  | { kind: "directive"; directive: Directive }
  | { kind: "exhausted"; reason: ExhaustionReason; rationale: string };

export interface PlanContext {
  locality: LocalityDef;
  category: Category;
  waveCap: number;
}

export interface Planner {
  plan(history: readonly WaveOutcome[], context: PlanContext): Promise<PlanResult>;
}
