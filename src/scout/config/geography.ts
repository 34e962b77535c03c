/**
 * Geography: regions, their localities, and the categories every locality needs
 */

import fs from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { GeographyError } from "../runtime/errors.js";

export const CategorySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  /** Search vocabulary used when the oracle gives too few queries */
  terms: z.array(z.string().min(1)).default([]),
});

export type Category = z.infer<typeof CategorySchema>;

const LocalityEntrySchema = z.union([
  z.string().min(1),
  z.object({ id: z.string().min(1), name: z.string().min(1).optional() }),
]);

const RegionEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  localities: z.array(LocalityEntrySchema),
});

export const GeographyFileSchema = z.object({
  categories: z.array(CategorySchema),
  regions: z.array(RegionEntrySchema),
});

export type GeographyFile = z.infer<typeof GeographyFileSchema>;

export interface LocalityDef {
  id: string;
  name: string;
  regionId: string;
  regionName: string;
}

export interface RegionDef {
  id: string;
  name: string;
  localities: LocalityDef[];
}

/**
 * Validated geography, in insertion order
 */
export interface Geography {
  categories: Category[];
  regions: RegionDef[];
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

/**
 * Validate and normalize a parsed geography document
 */
export function buildGeography(input: unknown): Geography {
  const parsed = GeographyFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new GeographyError(
      "Malformed geography",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  const file = parsed.data;
  const regions: RegionDef[] = file.regions.map((region) => {
    const regionName = region.name ?? region.id;
    return {
      id: region.id,
      name: regionName,
      localities: region.localities.map((entry) =>
        typeof entry === "string"
          ? { id: entry, name: entry, regionId: region.id, regionName }
          : { id: entry.id, name: entry.name ?? entry.id, regionId: region.id, regionName },
      ),
    };
  });

  const geography: Geography = { categories: file.categories, regions };
  assertGeography(geography);
  return geography;
}

/**
 * Structural problems that make a geography unusable; empty when it is fine
 */
export function geographyIssues(geography: Geography): string[] {
  const issues: string[] = [];

  if (geography.categories.length === 0) {
    issues.push("at least one category is required");
  }
  if (geography.regions.length === 0) {
    issues.push("at least one region is required");
  }

  for (const id of findDuplicates(geography.categories.map((c) => c.id))) {
    issues.push(`duplicate category id "${id}"`);
  }
  for (const id of findDuplicates(geography.regions.map((r) => r.id))) {
    issues.push(`duplicate region id "${id}"`);
  }

  for (const region of geography.regions) {
    if (region.localities.length === 0) {
      issues.push(`region "${region.id}" has no localities`);
    }
    for (const id of findDuplicates(region.localities.map((l) => l.id))) {
      issues.push(`duplicate locality id "${id}" in region "${region.id}"`);
    }
  }

  return issues;
}

/**
 * Throw GeographyError when the geography is malformed
 */
export function assertGeography(geography: Geography): void {
  const issues = geographyIssues(geography);
  if (issues.length > 0) {
    throw new GeographyError("Malformed geography", issues);
  }
}

/**
 * Load a geography from a YAML (or JSON) file
 */
export async function loadGeography(filePath: string): Promise<Geography> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new GeographyError(
      `Cannot read geography ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new GeographyError(
      `Cannot parse geography ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return buildGeography(raw);
}

/**
 * Order regions: ids named in `regionOrder` first, in that order, then the
 * rest in insertion order.
 */
export function orderRegions(geography: Geography, regionOrder: string[]): RegionDef[] {
  if (regionOrder.length === 0) {
    return [...geography.regions];
  }

  const byId = new Map(geography.regions.map((r) => [r.id, r]));
  const unknown = regionOrder.filter((id) => !byId.has(id));
  if (unknown.length > 0) {
    throw new GeographyError(
      "Region order names unknown regions",
      unknown.map((id) => `"${id}"`),
    );
  }
  const dupes = findDuplicates(regionOrder);
  if (dupes.length > 0) {
    throw new GeographyError(
      "Region order repeats regions",
      dupes.map((id) => `"${id}"`),
    );
  }

  const named = new Set(regionOrder);
  const ordered: RegionDef[] = [];
  for (const id of regionOrder) {
    const region = byId.get(id);
    if (region) ordered.push(region);
  }
  for (const region of geography.regions) {
    if (!named.has(region.id)) ordered.push(region);
  }
  return ordered;
}
