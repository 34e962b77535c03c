/**
 * Tests for the escalation planner
 */

import { describe, it, expect, vi } from "vitest";
import {
  EscalationPlanner,
  directiveKey,
  fallbackDirective,
  initialDirective,
} from "./escalation.js";
import {
  ANGLE_CLASSES,
  type Directive,
  type PlanContext,
  type WaveFailureReason,
  type WaveOutcome,
} from "./types.js";
import { CapabilityErrorCode, createCapabilityError } from "../capabilities/types.js";
import type { Oracle } from "../oracle/oracle.js";
import { SearchConfigSchema } from "../config/types.js";
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

const INITIAL = initialDirective(SearchConfigSchema.parse({}));

const CONTEXT: PlanContext = {
  locality: { id: "millbrook", name: "Millbrook", regionId: "north", regionName: "North Valley" },
  category: { id: "food", label: "Food", terms: [] },
  waveCap: 5,
};

function failed(wave: number, directive: Directive, reason: WaveFailureReason): WaveOutcome {
  return {
    wave,
    directive,
    status: "failed",
    candidate: null,
    failure: { reason, stage: "triage", detail: reason },
    stoppedAfter: null,
    queries: [`query ${wave}a`, `query ${wave}b`],
    stats: {
      queries: 2,
      results: 8,
      selected: 0,
      pagesFetched: 0,
      fragments: 0,
      weakSignals: 0,
      candidates: 0,
      channelsChecked: 0,
      confirmed: 0,
    },
    startedAt: "2026-10-19T00:00:00.000Z",
    completedAt: "2026-10-19T00:00:03.000Z",
  };
}

function createOracle(answer: unknown): Oracle & { ask: ReturnType<typeof vi.fn> } {
  return { ask: vi.fn().mockResolvedValue(answer) };
}

describe("initialDirective", () => {
  it("starts with local press at the configured threshold", () => {
    expect(INITIAL).toEqual({
      angle: "local-press",
      sourceTypes: ["news", "blogs"],
      triageThreshold: 4,
      widenGeography: false,
      maxQueries: 8,
      avoidQueries: [],
      rationale: "initial strategy",
    });
  });
});

describe("directiveKey", () => {
  it("ignores source type order, rationale and query lists", () => {
    const a = { ...INITIAL, sourceTypes: ["blogs", "news"], rationale: "x", avoidQueries: ["q"] };

    expect(directiveKey(a)).toBe(directiveKey(INITIAL));
    expect(directiveKey({ ...INITIAL, triageThreshold: 5 })).not.toBe(directiveKey(INITIAL));
  });
});

describe("fallbackDirective", () => {
  it("lowers the threshold after no candidates", () => {
    const next = fallbackDirective([failed(1, INITIAL, "no-candidates")]);

    expect(next).toMatchObject({
      angle: "forums",
      sourceTypes: ["forums"],
      triageThreshold: 3,
      widenGeography: false,
      maxQueries: 8,
      avoidQueries: ["query 1a", "query 1b"],
      rationale: "rotating to forums after no-candidates",
    });
  });

  it("widens the geography from the second escalation on", () => {
    const forums = { ...INITIAL, angle: "forums" as const, triageThreshold: 3 };
    const next = fallbackDirective([
      failed(1, INITIAL, "no-candidates"),
      failed(2, forums, "no-candidates"),
    ]);

    expect(next).toMatchObject({ angle: "best-of-lists", triageThreshold: 2, widenGeography: true });
  });

  it("raises the threshold after failed verification", () => {
    expect(fallbackDirective([failed(1, INITIAL, "verification-failed")])?.triageThreshold).toBe(5);
  });

  it("adds listings after every candidate was rejected", () => {
    expect(fallbackDirective([failed(1, INITIAL, "all-rejected")])?.sourceTypes).toEqual([
      "forums",
      "listings",
      "directories",
    ]);
  });

  it("keeps the threshold inside 1-9", () => {
    const low = { ...INITIAL, triageThreshold: 1 };
    expect(fallbackDirective([failed(1, low, "no-candidates")])?.triageThreshold).toBe(1);
  });

  it("gives up once every angle was tried", () => {
    const history = ANGLE_CLASSES.map((angle, i) => failed(i + 1, { ...INITIAL, angle }, "no-candidates"));

    expect(fallbackDirective(history)).toBeNull();
    expect(fallbackDirective([])).toBeNull();
  });
});

describe("EscalationPlanner", () => {
  it("reports the wave cap without asking the oracle", async () => {
    const oracle = createOracle({});
    const planner = new EscalationPlanner({ oracle, logger: createMockLogger() });

    const result = await planner.plan([failed(1, INITIAL, "no-candidates")], { ...CONTEXT, waveCap: 1 });

    expect(result).toEqual({ kind: "exhausted", reason: "wave-cap", rationale: "1 waves run" });
    expect(oracle.ask).not.toHaveBeenCalled();
  });

  it("passes on an oracle that sees no plausible angle", async () => {
    const oracle = createOracle({ exhausted: true, rationale: "tiny village, nobody online" });
    const planner = new EscalationPlanner({ oracle, logger: createMockLogger() });

    const result = await planner.plan([failed(1, INITIAL, "no-candidates")], CONTEXT);

    expect(result).toEqual({
      kind: "exhausted",
      reason: "no-plausible-angle",
      rationale: "tiny village, nobody online",
    });
    expect(oracle.ask.mock.calls[0][0].kind).toBe("directive");
  });

  it("adopts a new proposal", async () => {
    const oracle = createOracle({
      exhausted: false,
      rationale: "people post about food trucks on forums",
      angle: "community",
      triageThreshold: 3,
      widenGeography: true,
    });
    const planner = new EscalationPlanner({ oracle, logger: createMockLogger() });

    const result = await planner.plan([failed(1, INITIAL, "no-candidates")], CONTEXT);

    expect(result).toEqual({
      kind: "directive",
      directive: {
        angle: "community",
        sourceTypes: ["forums", "social-profiles"],
        triageThreshold: 3,
        widenGeography: true,
        maxQueries: 8,
        avoidQueries: ["query 1a", "query 1b"],
        rationale: "people post about food trucks on forums",
      },
    });
  });

  it("rotates when the proposal repeats an earlier directive", async () => {
    const oracle = createOracle({
      exhausted: false,
      rationale: "try again",
      angle: "local-press",
      sourceTypes: ["blogs", "news"],
      triageThreshold: 4,
      widenGeography: false,
    });
    const planner = new EscalationPlanner({ oracle, logger: createMockLogger() });

    const result = await planner.plan([failed(1, INITIAL, "verification-failed")], CONTEXT);

    expect(result.kind === "directive" && result.directive.angle).toBe("forums");
  });

  it("rotates when the proposal names an unknown angle", async () => {
    const oracle = createOracle({ exhausted: false, rationale: "", angle: "telepathy" });
    const planner = new EscalationPlanner({ oracle, logger: createMockLogger() });

    const result = await planner.plan([failed(1, INITIAL, "all-rejected")], CONTEXT);

    expect(result.kind === "directive" && result.directive.angle).toBe("forums");
  });

  it("rotates and warns when the oracle is unavailable", async () => {
    const logger = createMockLogger();
    const oracle = createOracle(createCapabilityError(CapabilityErrorCode.TIMEOUT, "oracle.directive timed out"));
    const planner = new EscalationPlanner({ oracle, logger });

    const result = await planner.plan([failed(1, INITIAL, "no-candidates")], CONTEXT);

    expect(result.kind === "directive" && result.directive.angle).toBe("forums");
    expect(logger.warn).toHaveBeenCalledWith("Escalation oracle unavailable, rotating angle", {
      locality: "millbrook",
      category: "food",
      reason: "oracle.directive timed out",
    });
  });

  it("is exhausted when no untried angle remains", async () => {
    const oracle = createOracle(createCapabilityError(CapabilityErrorCode.MALFORMED_RESPONSE, "bad json"));
    const planner = new EscalationPlanner({ oracle, logger: createMockLogger() });
    const history = ANGLE_CLASSES.map((angle, i) => failed(i + 1, { ...INITIAL, angle }, "no-candidates"));

    const result = await planner.plan(history, { ...CONTEXT, waveCap: 10 });

    expect(result).toEqual({
      kind: "exhausted",
      reason: "no-untried-angle",
      rationale: "every angle class was tried",
    });
  });
});
