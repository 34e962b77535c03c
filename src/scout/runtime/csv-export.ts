/**
 * CSV export of what each wave searched and confirmed
 *
 * Layout: `<dir>/<runId>/<region>/<locality>/search_<category>.csv` gets one
 * row per search result, appended wave after wave; `verified_<category>.csv`
 * holds the confirmed candidates of the latest successful wave, best first.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { channelUrlFromHandle, domainOf } from "../capabilities/urls.js";
import type { ResultExporter, SlotLocation, WaveExport } from "../orchestrator/types.js";
import { isNotFoundError } from "./errors.js";

export const SEARCH_COLUMNS = [
  "wave",
  "angle",
  "query",
  "page",
  "url",
  "title",
  "snippet",
  "domain",
  "triage_score",
  "triage_reason",
] as const;

export const VERIFIED_COLUMNS = [
  "rank",
  "name",
  "handle",
  "channel_url",
  "subscribers",
  "locality_score",
  "category_score",
  "total_score",
  "confidence",
  "independent_sources",
  "last_activity",
  "sources",
] as const;

const SNIPPET_LIMIT = 300;

type Cell = string | number | null;

export function csvCell(value: Cell): string {
  if (value === null) return "";
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function csvLine(values: readonly Cell[]): string {
  return values.map(csvCell).join(",") + "\n";
}

/**
 * File and directory name from a free-form label
 */
export function safeName(value: string): string {
  const cleaned = value.replace(/[^\w\s-]/g, "").trim().replace(/\s+/g, "_");
  return cleaned.length > 0 ? cleaned : "_";
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

export class CsvExporter implements ResultExporter {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  slotDir(slot: SlotLocation): string {
    return path.join(this.dir, slot.runId, safeName(slot.regionId), safeName(slot.localityId));
  }

  async exportWave(slot: SlotLocation, wave: WaveExport): Promise<void> {
    const dir = this.slotDir(slot);
    await fs.mkdir(dir, { recursive: true });
    const category = safeName(slot.categoryId);

    if (wave.searches.length > 0) {
      const file = path.join(dir, `search_${category}.csv`);
      const rows = wave.searches.map((record) =>
        csvLine([
          wave.wave,
          wave.angle,
          record.query,
          record.page,
          record.hit.url,
          record.hit.title,
          record.hit.snippet.slice(0, SNIPPET_LIMIT),
          domainOf(record.hit.url),
          record.triageScore,
          record.triageReason,
        ]),
      );
      const header = (await fileExists(file)) ? "" : csvLine(SEARCH_COLUMNS);
      await fs.appendFile(file, header + rows.join(""), "utf-8");
    }

    if (wave.confirmed.length > 0) {
      const file = path.join(dir, `verified_${category}.csv`);
      const rows = wave.confirmed.map((candidate, index) =>
        csvLine([
          index + 1,
          candidate.name,
          candidate.handle,
          candidate.handle ? channelUrlFromHandle(candidate.handle) : null,
          candidate.subscriberCount,
          candidate.localityScore,
          candidate.categoryScore,
          candidate.totalScore,
          candidate.confidence,
          candidate.independentSources,
          candidate.lastActivityDate,
          candidate.sources.join(" "),
        ]),
      );
      await fs.writeFile(file, csvLine(VERIFIED_COLUMNS) + rows.join(""), "utf-8");
    }
  }
}
