/**
 * Wave Executor - one research wave for one (locality, category) slot
 *
 * Stages run in order and short-circuit on their own unrecoverable failure:
 * queries, search, triage, fetch and extract, assembly, follow-up, channel
 * check, adversarial verification. A stop request is honoured between stages,
 * and a stage that fails after a stop was requested leaves the wave inconclusive.
 */

import pLimit from "p-limit";
import {
  CapabilityErrorCode,
  isCapabilityError,
  type Capabilities,
  type CapabilityError,
  type ChannelInfo,
  type FetchedPage,
  type SearchHit,
} from "../capabilities/types.js";
import type { CapabilityGateway } from "../capabilities/gateway.js";
import { channelHandleFromUrl, domainOf, normalizeHandle } from "../capabilities/urls.js";
import type {
  ChannelPolicy,
  SearchConfig,
  TimeoutsConfig,
  VerificationConfig,
} from "../config/types.js";
import type { Oracle } from "../oracle/oracle.js";
import {
  candidatesCall,
  followupsCall,
  fragmentsCall,
  queriesCall,
  scoresCall,
  verdictCall,
} from "../oracle/prompts.js";
import type { FragmentsResponse } from "../oracle/schemas.js";
import type { ScoutLogger } from "../runtime/logger.js";
import { tierForWave, type SearchBudget } from "./budget.js";
import { planQueries } from "./queries.js";
import {
  WAVE_STAGES,
  type Candidate,
  type CandidateSummary,
  type Fragment,
  type SearchRecord,
  type WaveFailure,
  type WaveFailureReason,
  type WaveOutcome,
  type WaveRequest,
  type WaveRunner,
  type WaveStage,
  type WaveStats,
  type WaveStatus,
} from "./types.js";

/** A results page shorter than this ends a query's pagination */
const MIN_HITS_PER_PAGE = 3;
const FOLLOWUP_QUERIES_PER_CANDIDATE = 2;
const FOLLOWUP_CONFIDENCE = 0.5;
const DAY_MS = 86_400_000;
/** Budget value of one confirmed candidate */
const CONFIRMED_VALUE = 20;


export interface WaveExecutorOptions {
  capabilities: Capabilities;
  gateway: CapabilityGateway;
  oracle: Oracle;
  search: SearchConfig;
  channelPolicy: ChannelPolicy;
  verification: VerificationConfig;
  timeouts: TimeoutsConfig;
  logger: ScoutLogger;
  /** Consulted before each optional query and told what each search found */
  budget?: SearchBudget;
  now?: () => Date;
}

type StageResult<T> = { ok: true; value: T } | { ok: false; failure: WaveFailure };

interface WaveState {
  request: WaveRequest;
  startedAt: string;
  queries: string[];
  stats: WaveStats;
  nextFragment: number;
  nextCandidate: number;
  /** Every hit as returned, duplicates included */
  searches: Array<{ query: string; page: number; hit: SearchHit }>;
  triage: Map<string, { score: number; reason: string }>;
}

interface ScoredHit {
  hit: SearchHit;
  score: number;
  order: number;
}

function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

function fail<T>(reason: WaveFailureReason, stage: WaveStage, detail: string): StageResult<T> {
  return { ok: false, failure: { reason, stage, detail } };
}

/**
 * Throttling retries ran out, or the limiter shut down
 */
function isExhausted(error: CapabilityError): boolean {
  return (
    error.error.code === CapabilityErrorCode.NETWORK_EXHAUSTED ||
    error.error.code === CapabilityErrorCode.CANCELLED
  );
}

function emptyStats(): WaveStats {
  return {
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
}

/**
 * Last stage that completed before the given one
 */
function stageBefore(stage: WaveStage | null): WaveStage | null {
  const index = stage === null ? -1 : WAVE_STAGES.indexOf(stage);
  return index > 0 ? WAVE_STAGES[index - 1] : null;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Noisy-or over the strongest fragment of each source domain
 */
export function aggregateConfidence(fragments: readonly Fragment[]): number {
  const best = new Map<string, number>();
  for (const fragment of fragments) {
    best.set(fragment.sourceDomain, Math.max(best.get(fragment.sourceDomain) ?? 0, fragment.confidence));
  }
  let miss = 1;
  for (const confidence of best.values()) {
    miss *= 1 - confidence;
  }
  return round3(1 - miss);
}

function countDomains(fragments: readonly Fragment[]): number {
  return new Set(fragments.map((f) => f.sourceDomain)).size;
}

/**
 * Reason a channel falls outside the policy; null when it qualifies
 */
export function checkChannelPolicy(
  channel: ChannelInfo,
  policy: ChannelPolicy,
  now: Date,
): string | null {
  if (channel.subscriberCount < policy.minSubscribers) {
    return `${channel.subscriberCount} subscribers, below ${policy.minSubscribers}`;
  }
  if (channel.subscriberCount > policy.maxSubscribers) {
    return `${channel.subscriberCount} subscribers, above ${policy.maxSubscribers}`;
  }
  if (channel.lastActivityDate === null) {
    return "no recent activity found";
  }
  const last = Date.parse(channel.lastActivityDate);
  if (Number.isNaN(last)) {
    return `unreadable activity date "${channel.lastActivityDate}"`;
  }
  const idleDays = Math.floor((now.getTime() - last) / DAY_MS);
  if (idleDays > policy.maxInactiveDays) {
    return `inactive for ${idleDays} days`;
  }
  return null;
}

/**
 * Weighted total: locality 0.3, category 0.15, audience in range 0.25,
 * recent activity 0.2, source breadth 0.1
 */
export function totalScore(
  candidate: Candidate,
  policy: ChannelPolicy,
  now: Date,
): number {
  const channel = candidate.channel;
  const verdict = candidate.verdict;
  if (!channel || !verdict) return 0;

  const inRange =
    channel.subscriberCount >= policy.minSubscribers &&
    channel.subscriberCount <= policy.maxSubscribers;
  const last = channel.lastActivityDate === null ? NaN : Date.parse(channel.lastActivityDate);
  const recent = !Number.isNaN(last) && now.getTime() - last <= policy.maxInactiveDays * DAY_MS;

  return round3(
    0.3 * verdict.localityScore +
      0.15 * verdict.categoryScore +
      (inRange ? 0.25 : 0) +
      (recent ? 0.2 : 0) +
      0.1 * Math.min(1, candidate.independentSources / 3),
  );
}

/**
 * Best surviving candidate: total score, then confidence, then independent
 * sources, then name
 */
export function rankCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort(
    (a, b) =>
      (b.totalScore ?? 0) - (a.totalScore ?? 0) ||
      b.confidence - a.confidence ||
      b.independentSources - a.independentSources ||
      a.name.localeCompare(b.name),
  );
}

export function pickBest(candidates: readonly Candidate[]): Candidate | null {
  return rankCandidates(candidates)[0] ?? null;
}

export function summarizeCandidate(candidate: Candidate): CandidateSummary {
  return {
    name: candidate.name,
    handle: candidate.handle,
    confidence: candidate.confidence,
    totalScore: candidate.totalScore,
    independentSources: candidate.independentSources,
    sources: [...new Set(candidate.fragments.map((f) => f.sourceUrl))],
    subscriberCount: candidate.channel?.subscriberCount ?? null,
    lastActivityDate: candidate.channel?.lastActivityDate ?? null,
    localityScore: candidate.verdict?.localityScore ?? null,
    categoryScore: candidate.verdict?.categoryScore ?? null,
  };
}

export class WaveExecutor implements WaveRunner {
  private readonly options: WaveExecutorOptions;
  private readonly now: () => Date;

  constructor(options: WaveExecutorOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async execute(request: WaveRequest): Promise<WaveOutcome> {
    const state: WaveState = {
      request,
      startedAt: this.now().toISOString(),
      queries: [],
      stats: emptyStats(),
      nextFragment: 1,
      nextCandidate: 1,
      searches: [],
      triage: new Map(),
    };

    this.options.logger.debug(`Wave ${request.wave} started`, {
      locality: request.locality.id,
      category: request.category.id,
      angle: request.directive.angle,
    });

    const queries = await this.generateQueries(state);
    if (!queries.ok) return this.failed(state, queries.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "queries");

    const hits = await this.searchAll(state, queries.value);
    if (!hits.ok) return this.failed(state, hits.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "search");

    const selected = await this.triage(state, hits.value);
    if (!selected.ok) return this.failed(state, selected.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "triage");

    const fragments = await this.fetchAndExtract(state, selected.value);
    if (!fragments.ok) return this.failed(state, fragments.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "extraction");

    const candidates = await this.assemble(state, fragments.value);
    if (!candidates.ok) return this.failed(state, candidates.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "assembly");

    const followed = await this.followUp(state, candidates.value);
    if (!followed.ok) return this.failed(state, followed.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "followup");

    const checked = await this.checkChannels(state, followed.value);
    if (!checked.ok) return this.failed(state, checked.failure);
    if (this.stopRequested(state)) return this.inconclusive(state, "channel-check");

    const confirmed = await this.verify(state, checked.value);
    if (!confirmed.ok) return this.failed(state, confirmed.failure);

    const ranked = rankCandidates(confirmed.value);
    const best = ranked[0];
    if (!best) {
      return this.failed(state, {
        reason: "verification-failed",
        stage: "verification",
        detail: "no candidate survived verification",
      });
    }

    this.options.logger.info(`Wave ${request.wave} confirmed ${best.name}`, {
      locality: request.locality.id,
      category: request.category.id,
      handle: best.handle,
      score: best.totalScore,
    });
    this.options.budget?.report(
      tierForWave(request.wave),
      ranked.length,
      0,
      ranked.length * CONFIRMED_VALUE,
    );
    request.journal?.confirmed(ranked.map(summarizeCandidate));
    return this.outcome(state, "succeeded", { candidate: summarizeCandidate(best) });
  }

  // ============================================================
  // Stages
  // ============================================================

  private async generateQueries(state: WaveState): Promise<StageResult<string[]>> {
    const { locality, category, directive, wave } = state.request;
    const response = await this.options.oracle.ask(
      queriesCall({ locality, category, directive, wave }),
    );

    let proposed: string[] = [];
    if (isCapabilityError(response)) {
      if (isExhausted(response)) return fail("network-exhausted", "queries", response.error.message);
      this.options.logger.warn("Query generation fell back to templates", {
        reason: response.error.message,
      });
    } else {
      proposed = response.queries.map((q) => q.query);
    }

    const queries = planQueries(proposed, locality, category, directive);
    state.queries = queries;
    state.stats.queries = queries.length;

    if (queries.length === 0) {
      return fail("stage-failed", "queries", "no queries left after removing ones already run");
    }
    return ok(queries);
  }

  private async searchAll(state: WaveState, queries: string[]): Promise<StageResult<SearchHit[]>> {
    const { search } = this.options.capabilities;
    const budget = this.options.budget;
    const tier = tierForWave(state.request.wave);
    const hits: SearchHit[] = [];
    const seen = new Set<string>();
    let executed = 0;

    for (const [index, query] of queries.entries()) {
      if (budget && index >= budget.guaranteedQueries) {
        const decision = budget.evaluate(tier);
        if (!decision.execute) {
          this.options.logger.debug("Query skipped by search budget", {
            query,
            tier,
            reason: decision.reason,
          });
          continue;
        }
      }
      executed++;

      for (let page = 0; page < this.options.search.pagesPerQuery; page++) {
        const result = await this.options.gateway.call(
          "search",
          search.destination,
          this.options.timeouts.searchMs,
          (signal) => search.search(query, page, signal),
        );

        if (isCapabilityError(result)) {
          if (isExhausted(result)) return fail("network-exhausted", "search", result.error.message);
          this.options.logger.debug("Search ended early", { query, page, reason: result.error.message });
          break;
        }

        for (const hit of result) {
          state.searches.push({ query, page, hit });
          if (seen.has(hit.url)) continue;
          seen.add(hit.url);
          hits.push(hit);
        }

        if (result.length < MIN_HITS_PER_PAGE) break;
      }
    }

    state.stats.results = hits.length;
    budget?.report(
      tier,
      hits.filter((hit) => domainOf(hit.url).endsWith("youtube.com")).length,
      executed,
    );
    if (hits.length === 0) {
      return fail("no-candidates", "search", "search returned no results");
    }
    return ok(hits);
  }

  private async triage(state: WaveState, hits: SearchHit[]): Promise<StageResult<SearchHit[]>> {
    const { locality, category, directive } = state.request;
    const batchSize = this.options.search.triageBatchSize;
    const scored: ScoredHit[] = [];

    for (let start = 0; start < hits.length; start += batchSize) {
      const batch = hits.slice(start, start + batchSize);
      const response = await this.options.oracle.ask(scoresCall({ locality, category, hits: batch }));

      if (isCapabilityError(response)) {
        if (isExhausted(response)) return fail("network-exhausted", "triage", response.error.message);
        this.options.logger.warn("Triage batch skipped", {
          offset: start,
          reason: response.error.message,
        });
        continue;
      }

      const scores = new Map(response.scores.map((s) => [s.url, s]));
      batch.forEach((hit, i) => {
        const entry = scores.get(hit.url);
        if (entry === undefined) return;
        state.triage.set(hit.url, { score: entry.score, reason: entry.reason });
        if (entry.score >= directive.triageThreshold) {
          scored.push({ hit, score: entry.score, order: start + i });
        }
      });
    }

    const selected = scored
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, this.options.search.maxPagesToFetch)
      .map((s) => s.hit);

    state.stats.selected = selected.length;
    if (selected.length === 0) {
      return fail(
        "no-candidates",
        "triage",
        `no result reached triage threshold ${directive.triageThreshold}`,
      );
    }
    return ok(selected);
  }

  private async fetchAndExtract(
    state: WaveState,
    selected: SearchHit[],
  ): Promise<StageResult<Fragment[]>> {
    const { locality, category, wave } = state.request;
    const { pageFetch } = this.options.capabilities;
    const exhausted: CapabilityError[] = [];
    const limit = pLimit(this.options.search.fetchConcurrency);

    const fetchOne = async (
      hit: SearchHit,
    ): Promise<{ page: FetchedPage; creators: FragmentsResponse["creators"] } | null> => {
      if (exhausted.length > 0) return null;

      const page = await this.options.gateway.call(
        "fetch",
        pageFetch.destinationFor(hit.url),
        this.options.timeouts.fetchMs,
        (signal) => pageFetch.fetch(hit.url, signal),
      );
      if (isCapabilityError(page)) {
        if (isExhausted(page)) exhausted.push(page);
        this.options.logger.debug("Page skipped", { url: hit.url, reason: page.error.message });
        return null;
      }
      state.stats.pagesFetched++;

      const extracted = await this.options.oracle.ask(fragmentsCall({ locality, category, page }));
      if (isCapabilityError(extracted)) {
        if (isExhausted(extracted)) exhausted.push(extracted);
        this.options.logger.warn("Extraction failed", {
          url: page.url,
          reason: extracted.error.message,
        });
        return null;
      }
      if (!extracted.relevant) return null;
      return { page, creators: extracted.creators };
    };

    const perPage = await Promise.all(selected.map((hit) => limit(() => fetchOne(hit))));

    if (exhausted.length > 0) {
      return fail("network-exhausted", "extraction", exhausted[0].error.message);
    }

    const fragments: Fragment[] = [];
    for (const entry of perPage) {
      if (!entry) continue;
      for (const creator of entry.creators) {
        const quote = creator.localityQuote.trim() || creator.categoryQuote.trim();
        if (quote.length === 0) continue;
        fragments.push({
          id: `f${state.nextFragment++}`,
          sourceUrl: entry.page.url,
          sourceDomain: domainOf(entry.page.url),
          name: creator.name.trim(),
          handle: normalizeHandle(creator.handle) ?? channelHandleFromUrl(creator.channelUrl),
          quote,
          tags: {
            locality: creator.localityQuote.trim().length > 0,
            category: creator.categoryQuote.trim().length > 0,
          },
          confidence: creator.confidence,
          wave,
          origin: "extraction",
        });
      }
    }

    state.stats.fragments = fragments.length;
    if (fragments.length === 0) {
      return fail(
        "no-candidates",
        "extraction",
        `no fragments extracted from ${state.stats.pagesFetched} pages`,
      );
    }
    return ok(fragments);
  }

  private async assemble(state: WaveState, fragments: Fragment[]): Promise<StageResult<Candidate[]>> {
    const { locality, category } = state.request;
    const response = await this.options.oracle.ask(candidatesCall({ locality, category, fragments }));

    if (isCapabilityError(response)) {
      if (isExhausted(response)) return fail("network-exhausted", "assembly", response.error.message);
      return fail("stage-failed", "assembly", response.error.message);
    }

    const byId = new Map(fragments.map((f) => [f.id, f]));
    const candidates: Candidate[] = [];

    for (const group of response.candidates) {
      const members = [...new Set(group.fragmentIds)]
        .map((id) => byId.get(id))
        .filter((f): f is Fragment => f !== undefined);
      if (members.length === 0) continue;

      const independentSources = countDomains(members);
      if (independentSources < 2) {
        state.stats.weakSignals++;
        continue;
      }

      candidates.push({
        id: `c${state.nextCandidate++}`,
        name: group.name.trim(),
        handle: normalizeHandle(group.handle) ?? members.find((f) => f.handle !== null)?.handle ?? null,
        fragments: members,
        independentSources,
        confidence: aggregateConfidence(members),
        status: "unverified",
        rejection: null,
        channel: null,
        verdict: null,
        totalScore: null,
      });
    }

    state.stats.candidates = candidates.length;
    if (candidates.length === 0) {
      return fail(
        "no-candidates",
        "assembly",
        `no candidate corroborated by two independent sources (${state.stats.weakSignals} weak signals)`,
      );
    }
    return ok(candidates);
  }

  private async followUp(state: WaveState, candidates: Candidate[]): Promise<StageResult<Candidate[]>> {
    const targets = candidates
      .filter((c) => c.handle === null)
      .slice(0, this.options.search.maxFollowups);
    if (targets.length === 0) return ok(candidates);

    const { locality, category, wave } = state.request;
    const { search } = this.options.capabilities;

    const response = await this.options.oracle.ask(
      followupsCall({ locality, category, candidates: targets }),
    );
    let proposals: Array<{ candidate: string; query: string }> = [];
    if (isCapabilityError(response)) {
      if (isExhausted(response)) return fail("network-exhausted", "followup", response.error.message);
      this.options.logger.warn("Follow-up planning fell back to name searches", {
        reason: response.error.message,
      });
    } else {
      proposals = response.queries;
    }

    for (const target of targets) {
      const wanted = target.name.toLowerCase();
      const proposed = proposals
        .filter((p) => p.candidate.trim().toLowerCase() === wanted)
        .map((p) => p.query)
        .slice(0, FOLLOWUP_QUERIES_PER_CANDIDATE);
      const queries = proposed.length > 0 ? proposed : [`"${target.name}" channel`];

      for (const query of queries) {
        const result = await this.options.gateway.call(
          "search",
          search.destination,
          this.options.timeouts.searchMs,
          (signal) => search.search(query, 0, signal),
        );
        if (isCapabilityError(result)) {
          if (isExhausted(result)) return fail("network-exhausted", "followup", result.error.message);
          continue;
        }

        const found = result
          .map((hit) => ({ hit, handle: channelHandleFromUrl(hit.url) }))
          .find((entry) => entry.handle !== null);
        if (!found || found.handle === null) continue;

        const fragment: Fragment = {
          id: `f${state.nextFragment++}`,
          sourceUrl: found.hit.url,
          sourceDomain: domainOf(found.hit.url),
          name: target.name,
          handle: found.handle,
          quote: found.hit.snippet,
          tags: {
            locality: found.hit.snippet.toLowerCase().includes(locality.name.toLowerCase()),
            category: false,
          },
          confidence: FOLLOWUP_CONFIDENCE,
          wave,
          origin: "followup",
        };
        target.fragments.push(fragment);
        target.handle = found.handle;
        target.independentSources = countDomains(target.fragments);
        target.confidence = aggregateConfidence(target.fragments);
        state.stats.fragments++;
        break;
      }
    }

    return ok(candidates);
  }

  private async checkChannels(
    state: WaveState,
    candidates: Candidate[],
  ): Promise<StageResult<Candidate[]>> {
    const { channelCheck } = this.options.capabilities;
    const now = this.now();
    const passed: Candidate[] = [];

    for (const candidate of candidates) {
      const handle = candidate.handle;
      if (handle === null) {
        reject(candidate, "no channel found");
        continue;
      }

      const result = await this.options.gateway.call(
        "channel",
        channelCheck.destination,
        this.options.timeouts.channelMs,
        (signal) => channelCheck.check(handle, signal),
      );

      if (isCapabilityError(result)) {
        if (isExhausted(result)) return fail("network-exhausted", "channel-check", result.error.message);
        reject(
          candidate,
          result.error.code === CapabilityErrorCode.NOT_FOUND
            ? `channel ${handle} not found`
            : `channel check failed: ${result.error.message}`,
        );
        continue;
      }

      const violation = checkChannelPolicy(result, this.options.channelPolicy, now);
      if (violation) {
        reject(candidate, violation);
        continue;
      }

      candidate.channel = result;
      candidate.status = "channel-checked";
      passed.push(candidate);
    }

    state.stats.channelsChecked = passed.length;
    if (passed.length === 0) {
      return fail("all-rejected", "channel-check", describeRejections(candidates));
    }
    return ok(passed);
  }

  private async verify(state: WaveState, candidates: Candidate[]): Promise<StageResult<Candidate[]>> {
    const { locality, category } = state.request;
    const { minLocalityScore, minCategoryScore } = this.options.verification;
    const now = this.now();
    const survivors: Candidate[] = [];

    for (const candidate of candidates) {
      const channel = candidate.channel;
      if (!channel) continue;

      const response = await this.options.oracle.ask(
        verdictCall({ locality, category, candidate, channel }),
      );
      if (isCapabilityError(response)) {
        if (isExhausted(response)) {
          return fail("network-exhausted", "verification", response.error.message);
        }
        reject(candidate, `verdict unavailable: ${response.error.message}`);
        continue;
      }

      candidate.verdict = {
        survives: response.survives,
        localityScore: response.localityScore,
        categoryScore: response.categoryScore,
        concerns: response.concerns,
      };

      if (!response.survives) {
        reject(candidate, `challenged: ${response.concerns.join("; ") || "no reason given"}`);
      } else if (response.localityScore < minLocalityScore) {
        reject(candidate, `locality score ${response.localityScore} below ${minLocalityScore}`);
      } else if (response.categoryScore < minCategoryScore) {
        reject(candidate, `category score ${response.categoryScore} below ${minCategoryScore}`);
      } else {
        candidate.status = "adversarially-confirmed";
        candidate.totalScore = totalScore(candidate, this.options.channelPolicy, now);
        survivors.push(candidate);
      }
    }

    state.stats.confirmed = survivors.length;
    if (survivors.length === 0) {
      return fail("verification-failed", "verification", describeRejections(candidates));
    }
    return ok(survivors);
  }

  // ============================================================
  // Outcomes
  // ============================================================

  private stopRequested(state: WaveState): boolean {
    return state.request.signal?.aborted ?? false;
  }

  private failed(state: WaveState, failure: WaveFailure): WaveOutcome {
    // A stop that lands while a stage runs wins over that stage's failure
    if (this.stopRequested(state)) {
      return this.inconclusive(state, stageBefore(failure.stage));
    }
    this.options.logger.info(`Wave ${state.request.wave} failed: ${failure.reason}`, {
      locality: state.request.locality.id,
      category: state.request.category.id,
      stage: failure.stage,
      detail: failure.detail,
    });
    return this.outcome(state, "failed", { failure });
  }

  private inconclusive(state: WaveState, stoppedAfter: WaveStage | null): WaveOutcome {
    this.options.logger.info(`Wave ${state.request.wave} stopped after ${stoppedAfter ?? "start"}`, {
      locality: state.request.locality.id,
      category: state.request.category.id,
    });
    return this.outcome(state, "inconclusive", { stoppedAfter });
  }

  private outcome(
    state: WaveState,
    status: WaveStatus,
    fields: { candidate?: CandidateSummary; failure?: WaveFailure; stoppedAfter?: WaveStage | null },
  ): WaveOutcome {
    const journal = state.request.journal;
    if (journal && state.searches.length > 0) {
      journal.searched(
        state.searches.map(({ query, page, hit }): SearchRecord => {
          const triage = state.triage.get(hit.url);
          return {
            query,
            page,
            hit,
            triageScore: triage?.score ?? null,
            triageReason: triage?.reason ?? null,
          };
        }),
      );
    }
    return {
      wave: state.request.wave,
      directive: state.request.directive,
      status,
      candidate: fields.candidate ?? null,
      failure: fields.failure ?? null,
      stoppedAfter: fields.stoppedAfter ?? null,
      queries: [...state.queries],
      stats: { ...state.stats },
      startedAt: state.startedAt,
      completedAt: this.now().toISOString(),
    };
  }
}

function reject(candidate: Candidate, reason: string): void {
  candidate.status = "rejected";
  candidate.rejection = reason;
}

function describeRejections(candidates: readonly Candidate[]): string {
  const rejected = candidates.filter((c) => c.status === "rejected");
  return rejected.map((c) => `${c.name}: ${c.rejection ?? "rejected"}`).join("; ");
}
