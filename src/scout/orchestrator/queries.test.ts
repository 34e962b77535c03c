/**
 * Tests for query planning
 */

import { describe, it, expect } from "vitest";
import { dedupQueries, fallbackQueries, isNearDuplicate, planQueries } from "./queries.js";
import { initialDirective } from "./escalation.js";
import type { Directive } from "./types.js";
import type { Category, LocalityDef } from "../config/geography.js";
import { SearchConfigSchema } from "../config/types.js";

const LOCALITY: LocalityDef = {
  id: "millbrook",
  name: "Millbrook",
  regionId: "north",
  regionName: "North Valley",
};

const CATEGORY: Category = { id: "food", label: "Food", terms: ["food", "cooking", "baking"] };

function directive(overrides: Partial<Directive> = {}): Directive {
  return { ...initialDirective(SearchConfigSchema.parse({})), ...overrides };
}

describe("isNearDuplicate", () => {
  it("ignores case and spacing", () => {
    expect(isNearDuplicate("Millbrook food youtuber", "millbrook   FOOD youtuber")).toBe(true);
  });

  it("keeps queries that share at most 70% of their words", () => {
    // 3 shared of 5 distinct words
    expect(isNearDuplicate("a b c d", "a b c e")).toBe(false);
  });
});

describe("dedupQueries", () => {
  it("keeps the first of near-duplicates and drops blanks", () => {
    expect(
      dedupQueries(["Millbrook food youtuber", "millbrook food youtuber", "  ", "Millbrook bakery vlog"]),
    ).toEqual(["Millbrook food youtuber", "Millbrook bakery vlog"]);
  });
});

describe("fallbackQueries", () => {
  it("starts with the directive's own angle", () => {
    const queries = fallbackQueries(LOCALITY, CATEGORY, directive({ angle: "forums" }));

    expect(queries[0]).toBe('site:reddit.com "Millbrook" youtube cooking');
    expect(queries).toHaveLength(16);
  });

  it("widens the place when asked", () => {
    const queries = fallbackQueries(LOCALITY, CATEGORY, directive({ widenGeography: true }));

    expect(queries[0]).toBe('"greater Millbrook" OR "Millbrook area" youtuber food');
  });

  it("falls back to the category label without terms", () => {
    const queries = fallbackQueries(LOCALITY, { id: "music", label: "Music", terms: [] }, directive());

    expect(queries[0]).toBe('"Millbrook" youtuber Music');
  });
});

describe("planQueries", () => {
  it("keeps enough oracle queries as they are", () => {
    const proposed = [
      "Millbrook bakery vlog",
      "Millbrook street food tour",
      "North Valley home cooking channel",
      "Millbrook farmers market recipes",
    ];

    expect(planQueries(proposed, LOCALITY, CATEGORY, directive())).toEqual(proposed);
  });

  it("tops up a short list from the templates", () => {
    const queries = planQueries(["Millbrook bakery vlog"], LOCALITY, CATEGORY, directive({ maxQueries: 3 }));

    expect(queries).toEqual([
      "Millbrook bakery vlog",
      '"Millbrook" youtuber food',
      '"Millbrook" "content creator" baking interview',
    ]);
  });

  it("drops queries earlier waves already ran", () => {
    const queries = planQueries(
      ["Millbrook Food Youtuber", "Millbrook bakery vlog"],
      LOCALITY,
      CATEGORY,
      directive({ maxQueries: 2, avoidQueries: ["millbrook food youtuber"] }),
    );

    expect(queries).toEqual(["Millbrook bakery vlog", '"Millbrook" youtuber food']);
  });

  it("never returns more than maxQueries", () => {
    const proposed = ["one alpha", "two beta", "three gamma", "four delta", "five epsilon"];

    expect(planQueries(proposed, LOCALITY, CATEGORY, directive({ maxQueries: 2 }))).toEqual([
      "one alpha",
      "two beta",
    ]);
  });
});
