/**
 * Oracle request builders, one per kind
 */

import type { FetchedPage, SearchHit, ChannelInfo } from "../capabilities/types.js";
import type { Category, LocalityDef } from "../config/geography.js";
import type { Candidate, Directive, Fragment, WaveOutcome } from "../orchestrator/types.js";
import { ANGLE_CLASSES } from "../orchestrator/types.js";
import type { OracleCall } from "./oracle.js";
import {
  CandidatesResponseSchema,
  DirectiveResponseSchema,
  FollowupsResponseSchema,
  FragmentsResponseSchema,
  QueriesResponseSchema,
  ScoresResponseSchema,
  VerdictResponseSchema,
  type CandidatesResponse,
  type DirectiveResponse,
  type FollowupsResponse,
  type FragmentsResponse,
  type QueriesResponse,
  type ScoresResponse,
  type VerdictResponse,
} from "./schemas.js";

const SYSTEM = "You are a careful research assistant. Answer with a single JSON object and nothing else.";

/** Page text sent for extraction is cut to this many characters */
export const MAX_PAGE_TEXT = 12_000;

interface Target {
  locality: LocalityDef;
  category: Category;
}

function describeTarget({ locality, category }: Target): string {
  const terms = category.terms.length > 0 ? ` (terms: ${category.terms.join(", ")})` : "";
  return `Locality: ${locality.name}, ${locality.regionName}\nCategory: ${category.label}${terms}`;
}

export function queriesCall(
  input: Target & { directive: Directive; wave: number },
): OracleCall<QueriesResponse> {
  const { directive } = input;
  const avoid =
    directive.avoidQueries.length > 0
      ? `\nEarlier waves already ran these queries; propose different ones:\n${JSON.stringify(directive.avoidQueries)}`
      : "";

  return {
    kind: "queries",
    schema: QueriesResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `Design web search queries that surface video creators based in a specific place.
${describeTarget(input)}
Wave: ${input.wave}
Angle: ${directive.angle}
Source types: ${directive.sourceTypes.join(", ") || "any"}
Geography: ${directive.widenGeography ? "include the surrounding area" : "the locality itself"}
Give up to ${directive.maxQueries} queries.${avoid}

JSON: {"queries":[{"angle":"...","query":"..."}]}`,
    },
  };
}

export function scoresCall(input: Target & { hits: SearchHit[] }): OracleCall<ScoresResponse> {
  const listing = input.hits
    .map((hit, i) => `${i + 1}. ${hit.title}\n   ${hit.url}\n   ${hit.snippet}`)
    .join("\n");

  return {
    kind: "scores",
    schema: ScoresResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `Score each search result 0-10 for how likely it names video creators from this place and category.
${describeTarget(input)}

Results:
${listing}

JSON: {"scores":[{"url":"...","score":7,"reason":"..."}]}`,
    },
  };
}

export function fragmentsCall(input: Target & { page: FetchedPage }): OracleCall<FragmentsResponse> {
  const { page } = input;
  return {
    kind: "fragments",
    schema: FragmentsResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `Extract every video creator this page names. Quote the page exactly; do not guess.
${describeTarget(input)}
URL: ${page.url}
Title: ${page.title}
Channel links on the page: ${page.discoveredUrls.join(", ") || "none"}

Page text:
${page.text.slice(0, MAX_PAGE_TEXT)}

JSON: {"relevant":true,"creators":[{"name":"...","handle":"@...","channelUrl":"...","localityQuote":"exact quote","categoryQuote":"exact quote","confidence":0.8}]}`,
    },
  };
}

export function candidatesCall(
  input: Target & { fragments: Fragment[] },
): OracleCall<CandidatesResponse> {
  const listing = input.fragments
    .map(
      (f) =>
        `[${f.id}] ${f.name}${f.handle ? ` (${f.handle})` : ""} from ${f.sourceDomain}: "${f.quote}"`,
    )
    .join("\n");

  return {
    kind: "candidates",
    schema: CandidatesResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `Group the fragments that refer to the same creator. Be skeptical of single-source claims.
${describeTarget(input)}

Fragments:
${listing}

JSON: {"candidates":[{"name":"...","handle":"@...","fragmentIds":["f1","f2"]}]}`,
    },
  };
}

export function followupsCall(
  input: Target & { candidates: Candidate[] },
): OracleCall<FollowupsResponse> {
  const listing = input.candidates
    .map((c) => `- ${c.name} (sources: ${c.fragments.map((f) => f.sourceDomain).join(", ")})`)
    .join("\n");

  return {
    kind: "followups",
    schema: FollowupsResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `These creators have no known channel yet. Propose one or two searches each that would find their channel page.
${describeTarget(input)}

Creators:
${listing}

JSON: {"queries":[{"candidate":"name","query":"..."}]}`,
    },
  };
}

export function verdictCall(
  input: Target & { candidate: Candidate; channel: ChannelInfo },
): OracleCall<VerdictResponse> {
  const { candidate, channel } = input;
  const evidence = candidate.fragments
    .map((f) => `- ${f.sourceUrl}: "${f.quote}"`)
    .join("\n");

  return {
    kind: "verdict",
    schema: VerdictResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `Challenge the claim that "${candidate.name}" (${channel.handle}) is based in ${input.locality.name} and makes ${input.category.label} content.
Consider a different person with the same name, a move away, a visit rather than residence, and a channel description that contradicts the claim.

Evidence:
${evidence}

Channel: ${channel.name}, ${channel.subscriberCount} subscribers
Description: ${channel.description.slice(0, 500)}

JSON: {"survives":true,"localityScore":0.8,"categoryScore":0.7,"concerns":["..."],"reasoning":"..."}`,
    },
  };
}

export function directiveCall(
  input: Target & { history: readonly WaveOutcome[]; waveCap: number },
): OracleCall<DirectiveResponse> {
  const waves = input.history
    .map((outcome) => {
      const s = outcome.stats;
      const why = outcome.failure ? `${outcome.failure.reason} (${outcome.failure.detail})` : outcome.status;
      return `Wave ${outcome.wave}: angle ${outcome.directive.angle}, threshold ${outcome.directive.triageThreshold}, widen ${outcome.directive.widenGeography} -> ${why}; ${s.results} results, ${s.pagesFetched} pages, ${s.candidates} candidates, ${s.confirmed} confirmed`;
    })
    .join("\n");

  return {
    kind: "directive",
    schema: DirectiveResponseSchema,
    request: {
      system: SYSTEM,
      prompt: `Research waves failed to find a verified creator. Choose a materially different strategy for wave ${input.history.length + 1} of ${input.waveCap}, or declare that no plausible angle remains.
${describeTarget(input)}

History:
${waves}

Angles: ${ANGLE_CLASSES.join(", ")}

JSON: {"exhausted":false,"rationale":"...","angle":"forums","sourceTypes":["forums"],"triageThreshold":4,"widenGeography":false}`,
    },
  };
}
