/**
 * Search budget - patience and predicted return per source tier
 *
 * Waves search through a tier chosen by wave number. Every search stage
 * reports what it found: a hit recharges the tier's patience, a miss drains
 * it, and a tier at zero patience stops getting optional queries. The whole
 * run stops once the global query budget is spent or every tier ran dry.
 */

import type { BudgetConfig } from "../config/types.js";

export const SOURCE_TIERS = ["direct", "semi-direct", "indirect"] as const;

export type SourceTier = (typeof SOURCE_TIERS)[number];

/** Prior chance (0-100) that a tier's query turns something up */
const TIER_PRIORITY: Record<SourceTier, number> = {
  direct: 90,
  "semi-direct": 60,
  indirect: 40,
};

/** Value of one finding when the caller gives none */
const FIND_VALUE = 10;
/** Per-attempt decay of the success estimate since the last hit */
const DROUGHT_DECAY = 0.05;
/** Observed attempts needed before a low predicted return blocks a tier */
const MIN_ATTEMPTS_FOR_ROI = 5;

interface TierStats {
  priority: number;
  attempts: number;
  hits: number;
  misses: number;
  totalCost: number;
  totalValue: number;
  patience: number;
  exhausted: boolean;
  /** Attempt number of the last hit */
  lastHitAt: number;
}

export interface BudgetDecision {
  execute: boolean;
  roi: number;
  reason: string;
  patience: number;
}

export interface TierSummary extends TierStats {
  tier: SourceTier;
  hitRate: number;
  /** Value found per unit of cost so far */
  returnOnCost: number;
}

export interface BudgetSummary {
  stopReason: string | null;
  queriesSpent: number;
  globalBudget: number;
  found: number;
  tiers: TierSummary[];
}

/**
 * Tier a wave searches through: first waves go direct, later ones further afield
 */
export function tierForWave(wave: number): SourceTier {
  if (wave <= 1) return "direct";
  if (wave === 2) return "semi-direct";
  return "indirect";
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function hitRate(stats: TierStats): number {
  return stats.hits / Math.max(1, stats.attempts);
}

export class SearchBudget {
  private readonly config: BudgetConfig;
  private readonly tiers: Record<SourceTier, TierStats>;
  private queriesSpent = 0;
  private found = 0;
  private stopped: string | null = null;

  constructor(config: BudgetConfig) {
    this.config = config;
    const fresh = (tier: SourceTier): TierStats => ({
      priority: TIER_PRIORITY[tier],
      attempts: 0,
      hits: 0,
      misses: 0,
      totalCost: 0,
      totalValue: 0,
      patience: config.patienceInitial,
      exhausted: false,
      lastHitAt: 0,
    });
    this.tiers = {
      direct: fresh("direct"),
      "semi-direct": fresh("semi-direct"),
      indirect: fresh("indirect"),
    };
  }

  /** Leading queries of a wave that are never skipped */
  get guaranteedQueries(): number {
    return this.config.guaranteedQueries;
  }

  get stopReason(): string | null {
    return this.checkStop();
  }

  /**
   * Estimated chance of success per unit of cost for the next action on a tier
   */
  predictRoi(tier: SourceTier, cost = 1): number {
    const stats = this.tiers[tier];
    if (stats.exhausted) return 0;

    const prior = stats.priority / 100;
    // The prior counts for less as evidence comes in
    const alpha = Math.min(1, stats.attempts / 10);
    const success = (1 - alpha) * prior + alpha * hitRate(stats);
    const drought = stats.attempts - stats.lastHitAt;
    return (success * Math.exp(-DROUGHT_DECAY * drought)) / Math.max(0.01, cost);
  }

  /**
   * Whether one more action on a tier is worth its cost
   */
  evaluate(tier: SourceTier, cost = 1): BudgetDecision {
    const stats = this.tiers[tier];
    if (stats.exhausted) {
      return { execute: false, roi: 0, reason: "source tier exhausted", patience: 0 };
    }

    const stop = this.checkStop();
    if (stop !== null) {
      return { execute: false, roi: 0, reason: stop, patience: stats.patience };
    }

    const roi = round(this.predictRoi(tier, cost), 4);
    if (roi < this.config.minRoi && stats.attempts > MIN_ATTEMPTS_FOR_ROI) {
      return {
        execute: false,
        roi,
        reason: `predicted return ${roi} below ${this.config.minRoi}`,
        patience: stats.patience,
      };
    }
    return { execute: true, roi, reason: "go", patience: stats.patience };
  }

  /**
   * Record the outcome of an action on a tier
   */
  report(tier: SourceTier, found: number, cost: number, value?: number): void {
    const stats = this.tiers[tier];
    stats.attempts++;
    stats.totalCost += cost;
    this.queriesSpent += cost;

    if (found > 0) {
      stats.hits++;
      stats.totalValue += value ?? found * FIND_VALUE;
      stats.patience = Math.min(
        this.config.patienceInitial * 2,
        stats.patience + this.config.patienceRecharge,
      );
      stats.lastHitAt = stats.attempts;
      this.found += found;
      return;
    }

    stats.misses++;
    stats.patience = Math.max(0, stats.patience - this.config.patienceDrain);
    if (stats.patience === 0) {
      stats.exhausted = true;
    }
  }

  shouldStop(): boolean {
    return this.checkStop() !== null;
  }

  summary(): BudgetSummary {
    return {
      stopReason: this.stopped,
      queriesSpent: this.queriesSpent,
      globalBudget: this.config.globalBudget,
      found: this.found,
      tiers: SOURCE_TIERS.map((tier) => {
        const stats = this.tiers[tier];
        return {
          tier,
          ...stats,
          hitRate: round(hitRate(stats), 3),
          returnOnCost: round(stats.totalValue / Math.max(0.01, stats.totalCost), 3),
        };
      }),
    };
  }

  /** Sticky: once a stop reason is found it never clears */
  private checkStop(): string | null {
    if (this.stopped !== null) return this.stopped;

    const { globalBudget } = this.config;
    if (globalBudget > 0 && this.queriesSpent >= globalBudget) {
      this.stopped = `budget-exhausted: ${this.queriesSpent} of ${globalBudget} queries used`;
    } else if (SOURCE_TIERS.every((tier) => this.tiers[tier].exhausted)) {
      this.stopped = "all source tiers exhausted";
    }
    return this.stopped;
  }
}
