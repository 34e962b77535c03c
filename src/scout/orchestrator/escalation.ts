/**
 * Escalation Planner - picks the strategy for a slot's next wave
 *
 * Reads the slot's wave history and never touches orchestration state. The
 * oracle proposes; a proposal that repeats an earlier directive, or no usable
 * proposal at all, falls back to rotating through untried angle classes.
 */

import { isCapabilityError } from "../capabilities/types.js";
import type { SearchConfig } from "../config/types.js";
import type { Oracle } from "../oracle/oracle.js";
import { directiveCall } from "../oracle/prompts.js";
import type { DirectiveResponse } from "../oracle/schemas.js";
import type { ScoutLogger } from "../runtime/logger.js";
import {
  ANGLE_CLASSES,
  isAngleClass,
  type AngleClass,
  type Directive,
  type PlanContext,
  type PlanResult,
  type Planner,
  type WaveOutcome,
} from "./types.js";

const MIN_THRESHOLD = 1;
const MAX_THRESHOLD = 9;

/**
 * Source types each angle targets unless told otherwise
 */
export const ANGLE_SOURCE_TYPES: Record<AngleClass, string[]> = {
  "local-press": ["news", "blogs"],
  forums: ["forums"],
  "best-of-lists": ["listings", "directories"],
  "social-bios": ["social-profiles"],
  interviews: ["podcasts", "interviews"],
  events: ["events"],
  regional: ["news", "listings"],
  community: ["forums", "social-profiles"],
};

/**
 * Directive for a slot's first wave
 */
export function initialDirective(search: SearchConfig): Directive {
  const angle = ANGLE_CLASSES[0];
  return {
    angle,
    sourceTypes: ANGLE_SOURCE_TYPES[angle],
    triageThreshold: search.triageThreshold,
    widenGeography: false,
    maxQueries: search.maxQueries,
    avoidQueries: [],
    rationale: "initial strategy",
  };
}

/**
 * Identity of a directive for repeat detection
 */
export function directiveKey(directive: Directive): string {
  return JSON.stringify([
    directive.angle,
    [...directive.sourceTypes].sort(),
    directive.triageThreshold,
    directive.widenGeography,
  ]);
}

function clampThreshold(value: number): number {
  return Math.min(MAX_THRESHOLD, Math.max(MIN_THRESHOLD, Math.round(value)));
}

function collectQueries(history: readonly WaveOutcome[]): string[] {
  const seen = new Set<string>();
  const queries: string[] = [];
  for (const outcome of history) {
    for (const query of [...outcome.directive.avoidQueries, ...outcome.queries]) {
      if (seen.has(query)) continue;
      seen.add(query);
      queries.push(query);
    }
  }
  return queries;
}

/**
 * Deterministic next directive: the next untried angle after the last one,
 * with threshold and geography adjusted to the last failure. Null when every
 * angle was tried.
 */
export function fallbackDirective(history: readonly WaveOutcome[]): Directive | null {
  const last = history[history.length - 1];
  if (!last) return null;

  const tried = new Set(history.map((outcome) => outcome.directive.angle));
  const start = ANGLE_CLASSES.indexOf(last.directive.angle);
  let angle: AngleClass | null = null;
  for (let step = 1; step <= ANGLE_CLASSES.length; step++) {
    const next = ANGLE_CLASSES[(start + step) % ANGLE_CLASSES.length];
    if (!tried.has(next)) {
      angle = next;
      break;
    }
  }
  if (angle === null) return null;

  const previous = last.directive;
  const reason = last.failure?.reason;
  let triageThreshold = previous.triageThreshold;
  let widenGeography = previous.widenGeography;
  let sourceTypes = ANGLE_SOURCE_TYPES[angle];

  if (reason === "no-candidates") {
    triageThreshold = clampThreshold(triageThreshold - 1);
    // second escalation onwards
    if (history.length >= 2) widenGeography = true;
  } else if (reason === "verification-failed") {
    triageThreshold = clampThreshold(triageThreshold + 1);
  } else if (reason === "all-rejected") {
    sourceTypes = [...new Set([...sourceTypes, "listings", "directories"])];
  }

  return {
    angle,
    sourceTypes,
    triageThreshold,
    widenGeography,
    maxQueries: previous.maxQueries,
    avoidQueries: collectQueries(history),
    rationale: `rotating to ${angle} after ${reason ?? last.status}`,
  };
}

function fromProposal(response: DirectiveResponse, history: readonly WaveOutcome[]): Directive | null {
  const last = history[history.length - 1];
  if (!last || !response.angle || !isAngleClass(response.angle)) return null;

  const sourceTypes =
    response.sourceTypes && response.sourceTypes.length > 0
      ? response.sourceTypes
      : ANGLE_SOURCE_TYPES[response.angle];

  return {
    angle: response.angle,
    sourceTypes,
    triageThreshold: clampThreshold(response.triageThreshold ?? last.directive.triageThreshold),
    widenGeography: response.widenGeography ?? last.directive.widenGeography,
    maxQueries: last.directive.maxQueries,
    avoidQueries: collectQueries(history),
    rationale: response.rationale || `oracle proposed ${response.angle}`,
  };
}

export interface EscalationPlannerOptions {
  oracle: Oracle;
  logger: ScoutLogger;
}

export class EscalationPlanner implements Planner {
  private readonly oracle: Oracle;
  private readonly logger: ScoutLogger;

  constructor(options: EscalationPlannerOptions) {
    this.oracle = options.oracle;
    this.logger = options.logger;
  }

  async plan(history: readonly WaveOutcome[], context: PlanContext): Promise<PlanResult> {
    if (history.length >= context.waveCap) {
      return { kind: "exhausted", reason: "wave-cap", rationale: `${history.length} waves run` };
    }

    const response = await this.oracle.ask(
      directiveCall({
        locality: context.locality,
        category: context.category,
        history,
        waveCap: context.waveCap,
      }),
    );

    let proposal: Directive | null = null;
    if (isCapabilityError(response)) {
      this.logger.warn("Escalation oracle unavailable, rotating angle", {
        locality: context.locality.id,
        category: context.category.id,
        reason: response.error.message,
      });
    } else if (response.exhausted) {
      return {
        kind: "exhausted",
        reason: "no-plausible-angle",
        rationale: response.rationale || "no plausible angle remains",
      };
    } else {
      proposal = fromProposal(response, history);
    }

    const triedKeys = new Set(history.map((outcome) => directiveKey(outcome.directive)));
    if (proposal && !triedKeys.has(directiveKey(proposal))) {
      return { kind: "directive", directive: proposal };
    }

    const fallback = fallbackDirective(history);
    if (!fallback) {
      return {
        kind: "exhausted",
        reason: "no-untried-angle",
        rationale: "every angle class was tried",
      };
    }
    return { kind: "directive", directive: fallback };
  }
}
