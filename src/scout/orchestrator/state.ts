/**
 * Resolution state tree: regions, localities, category slots
 *
 * Owned and mutated only by the orchestrator through the functions below;
 * every change bumps `version`. Everyone else reads deep-frozen snapshots.
 */

import type { Category, Geography, RegionDef } from "../config/geography.js";
import type {
  CandidateSummary,
  Directive,
  ExhaustionReason,
  WaveOutcome,
} from "./types.js";

export type UnitStatus = "pending" | "in-progress" | "resolved";

export type SlotOutcome = "unresolved" | "succeeded" | "failed-exhausted";

export interface SlotState {
  categoryId: string;
  waves: number;
  directive: Directive;
  outcome: SlotOutcome;
  history: WaveOutcome[];
  candidate: CandidateSummary | null;
  exhaustion: { reason: ExhaustionReason; rationale: string } | null;
  /** Terminal result carried over from an earlier run */
  resumed: boolean;
}

export interface LocalityState {
  id: string;
  name: string;
  regionId: string;
  status: UnitStatus;
  slots: SlotState[];
}

export interface RegionState {
  id: string;
  name: string;
  status: UnitStatus;
  localities: LocalityState[];
}

export interface ResolutionState {
  version: number;
  waveCap: number;
  categories: Category[];
  regions: RegionState[];
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ResolutionSnapshot = DeepReadonly<ResolutionState>;

/**
 * Seed for a slot that finished in an earlier run
 */
export interface ResumedSlot {
  outcome: "succeeded" | "failed-exhausted";
  waves: number;
  candidate: CandidateSummary | null;
  exhaustion: { reason: ExhaustionReason; rationale: string } | null;
}

export class StateInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateInvariantError";
  }
}

export function createResolutionState(
  geography: Geography,
  regions: RegionDef[],
  options: { waveCap: number; initialDirective: Directive },
): ResolutionState {
  return {
    version: 0,
    waveCap: options.waveCap,
    categories: geography.categories,
    regions: regions.map((region) => ({
      id: region.id,
      name: region.name,
      status: "pending",
      localities: region.localities.map((locality) => ({
        id: locality.id,
        name: locality.name,
        regionId: region.id,
        status: "pending",
        slots: geography.categories.map((category) => ({
          categoryId: category.id,
          waves: 0,
          directive: options.initialDirective,
          outcome: "unresolved",
          history: [],
          candidate: null,
          exhaustion: null,
          resumed: false,
        })),
      })),
    })),
  };
}

export function isTerminal(slot: SlotState): boolean {
  return slot.outcome !== "unresolved";
}

function touch(state: ResolutionState): void {
  state.version++;
}

function assertOpen(slot: SlotState): void {
  if (isTerminal(slot)) {
    throw new StateInvariantError(`slot ${slot.categoryId} is already ${slot.outcome}`);
  }
}

export function markInProgress(state: ResolutionState, unit: RegionState | LocalityState): void {
  if (unit.status === "pending") {
    unit.status = "in-progress";
    touch(state);
  }
}

export function seedSlot(state: ResolutionState, slot: SlotState, seed: ResumedSlot): void {
  assertOpen(slot);
  slot.outcome = seed.outcome;
  slot.waves = Math.min(seed.waves, state.waveCap);
  slot.candidate = seed.candidate;
  slot.exhaustion = seed.exhaustion;
  slot.resumed = true;
  touch(state);
}

/**
 * Count a new wave; returns its number
 */
export function beginWave(state: ResolutionState, slot: SlotState): number {
  assertOpen(slot);
  if (slot.waves >= state.waveCap) {
    throw new StateInvariantError(`slot ${slot.categoryId} reached the wave cap`);
  }
  slot.waves++;
  touch(state);
  return slot.waves;
}

export function recordOutcome(state: ResolutionState, slot: SlotState, outcome: WaveOutcome): void {
  assertOpen(slot);
  const previous = slot.history[slot.history.length - 1];
  if (outcome.wave !== slot.waves || (previous && previous.wave >= outcome.wave)) {
    throw new StateInvariantError(
      `wave ${outcome.wave} recorded out of order for slot ${slot.categoryId}`,
    );
  }
  slot.history.push(outcome);
  touch(state);
}

export function markSucceeded(
  state: ResolutionState,
  slot: SlotState,
  candidate: CandidateSummary,
): void {
  assertOpen(slot);
  slot.outcome = "succeeded";
  slot.candidate = candidate;
  touch(state);
}

export function markExhausted(
  state: ResolutionState,
  slot: SlotState,
  reason: ExhaustionReason,
  rationale: string,
): void {
  assertOpen(slot);
  slot.outcome = "failed-exhausted";
  slot.exhaustion = { reason, rationale };
  touch(state);
}

export function setDirective(state: ResolutionState, slot: SlotState, directive: Directive): void {
  assertOpen(slot);
  slot.directive = directive;
  touch(state);
}

/**
 * Resolve a locality once every slot is terminal; true only on the transition
 */
export function resolveLocality(state: ResolutionState, locality: LocalityState): boolean {
  if (locality.status === "resolved" || !locality.slots.every(isTerminal)) {
    return false;
  }
  locality.status = "resolved";
  touch(state);
  return true;
}

/**
 * Resolve a region once every locality is resolved; true only on the transition
 */
export function resolveRegion(state: ResolutionState, region: RegionState): boolean {
  if (region.status === "resolved" || !region.localities.every((l) => l.status === "resolved")) {
    return false;
  }
  region.status = "resolved";
  touch(state);
  return true;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Immutable copy of the state for readers
 */
export function snapshotState(state: ResolutionState): ResolutionSnapshot {
  return deepFreeze(structuredClone(state));
}
