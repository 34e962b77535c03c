/**
 * Search query planning: near-duplicate removal and angle templates
 */

import type { Category, LocalityDef } from "../config/geography.js";
import { ANGLE_CLASSES, type AngleClass, type Directive } from "./types.js";

/** Fewer oracle queries than this get topped up from the templates */
export const MIN_QUERIES = 4;

/** Word overlap above which two queries count as the same */
const DUPLICATE_OVERLAP = 0.7;

/**
 * Templates per angle. Placeholders: {place} {region} {t1} {t2} {t3}
 */
const ANGLE_TEMPLATES: Record<AngleClass, string[]> = {
  "local-press": [
    "{place} youtuber {t1}",
    '{place} "content creator" {t3} interview',
    "{place} local {t1} creator OR influencer",
  ],
  forums: [
    "site:reddit.com {place} youtube {t2}",
    "{place} {t1} recommendation OR underrated youtube",
  ],
  "best-of-lists": [
    '"youtubers from {region}" {t1} OR {t2}',
    '"best {t1} youtubers" "{region}" OR {place}',
  ],
  "social-bios": [
    "site:twitter.com OR site:instagram.com {place} {t1} youtube",
    "{place} {t2} tiktok youtube creator",
  ],
  interviews: [
    "{place} {t2} podcast OR interview youtuber",
    '"{region}" {t3} youtuber collab OR feature',
  ],
  events: ["{place} {t2} meetup OR convention OR festival"],
  regional: [
    '"{region}" youtube channel {t1}',
    '"{region}" underrated {t1} youtube small channel',
  ],
  community: [
    '{place} "{t2}" "my channel" OR "subscribe"',
    "{place} {t1} youtube channel subscribers",
  ],
};

function normalize(query: string): string {
  return query.toLowerCase().replace(/\s+/g, " ").trim();
}

function words(query: string): Set<string> {
  return new Set(normalize(query).split(" ").filter((w) => w.length > 0));
}

/**
 * True when more than 70% of the two queries' words are shared
 */
export function isNearDuplicate(a: string, b: string): boolean {
  const left = words(a);
  const right = words(b);
  let shared = 0;
  for (const word of left) {
    if (right.has(word)) shared++;
  }
  const union = left.size + right.size - shared;
  return shared / Math.max(union, 1) > DUPLICATE_OVERLAP;
}

/**
 * Drop queries too close to an earlier one, keeping first occurrences
 */
export function dedupQueries(queries: string[]): string[] {
  const unique: string[] = [];
  for (const query of queries) {
    if (normalize(query).length === 0) continue;
    if (unique.some((kept) => isNearDuplicate(kept, query))) continue;
    unique.push(query);
  }
  return unique;
}

/**
 * Template queries for a directive: its own angle first, then the others
 */
export function fallbackQueries(
  locality: LocalityDef,
  category: Category,
  directive: Directive,
): string[] {
  const terms = category.terms.length > 0 ? category.terms : [category.label];
  const t1 = terms[0];
  const t2 = terms[1] ?? t1;
  const t3 = terms[2] ?? t1;
  const place = directive.widenGeography
    ? `"greater ${locality.name}" OR "${locality.name} area"`
    : `"${locality.name}"`;

  const angles = [directive.angle, ...ANGLE_CLASSES.filter((a) => a !== directive.angle)];
  return angles.flatMap((angle) =>
    ANGLE_TEMPLATES[angle].map((template) =>
      template
        .replaceAll("{place}", place)
        .replaceAll("{region}", locality.regionName)
        .replaceAll("{t1}", t1)
        .replaceAll("{t2}", t2)
        .replaceAll("{t3}", t3),
    ),
  );
}

/**
 * Final query list for a wave
 *
 * Oracle proposals are deduplicated and stripped of queries earlier waves
 * ran; fewer than MIN_QUERIES are topped up from the templates. At most
 * `directive.maxQueries` are returned.
 */
export function planQueries(
  proposed: string[],
  locality: LocalityDef,
  category: Category,
  directive: Directive,
): string[] {
  const avoid = new Set(directive.avoidQueries.map(normalize));
  const queries = dedupQueries(proposed).filter((q) => !avoid.has(normalize(q)));

  if (queries.length < MIN_QUERIES) {
    for (const candidate of fallbackQueries(locality, category, directive)) {
      if (queries.length >= directive.maxQueries) break;
      if (avoid.has(normalize(candidate))) continue;
      if (queries.some((kept) => isNearDuplicate(kept, candidate))) continue;
      queries.push(candidate);
    }
  }

  return queries.slice(0, directive.maxQueries);
}
