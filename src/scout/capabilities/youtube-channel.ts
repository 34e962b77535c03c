/**
 * Channel check client reading public channel pages
 */

import { channelUrlFromHandle, normalizeHandle } from "./urls.js";
import { decodeEntities, metaContent } from "./html.js";
import { pickUserAgent, requestText } from "./http.js";
import {
  CapabilityErrorCode,
  createCapabilityError,
  isCapabilityError,
  type CapabilityResult,
  type ChannelCheckClient,
  type ChannelInfo,
} from "./types.js";

export const CHANNEL_DESTINATION = "www.youtube.com";

const DAY_MS = 24 * 60 * 60 * 1000;

const CHANNEL_MARKERS = ['"channelMetadataRenderer"', 'property="og:title"', '"channelId"'];

const SUBSCRIBER_PATTERNS = [
  /"subscriberCountText":\s*\{[^}]*"simpleText":\s*"([^"]+)"/,
  /"subscriberCountText":\s*"([^"]+)"/,
  /"content":\s*"([\d.,]+\s*[KMB]?) subscribers"/i,
];

const PUBLISHED_PATTERNS = [
  /"publishedTimeText":\s*\{[^}]*"simpleText":\s*"([^"]+)"/,
  /"publishedTimeText":\s*"([^"]+)"/,
];

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

const UNIT_DAYS: Record<string, number> = {
  second: 0,
  minute: 0,
  hour: 0,
  day: 1,
  week: 7,
  month: 30,
  year: 365,
};

/**
 * "12.3K subscribers" -> 12300; 0 when unreadable
 */
export function parseSubscriberCount(text: string): number {
  const match = /([\d.,]+)\s*([KMB])?/i.exec(text.replace(/subscribers?/i, ""));
  if (!match) return 0;
  const value = Number.parseFloat(match[1].replace(/,/g, ""));
  if (!Number.isFinite(value)) return 0;
  const multiplier = SUFFIX_MULTIPLIERS[(match[2] ?? "").toUpperCase()] ?? 1;
  return Math.round(value * multiplier);
}

/**
 * "3 weeks ago" relative to `now`, as an ISO date; null when unreadable
 */
export function relativeTimeToDate(text: string, now: Date): string | null {
  const match = /(\d+)\s*(second|minute|hour|day|week|month|year)s?\s+ago/i.exec(text);
  if (!match) return null;
  const days = Number.parseInt(match[1], 10) * (UNIT_DAYS[match[2].toLowerCase()] ?? 0);
  return new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10);
}

function firstMatch(html: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(html);
    if (match) return decodeEntities(match[1]).trim();
  }
  return null;
}

export interface YouTubeChannelOptions {
  now?: () => Date;
}

export class YouTubeChannelClient implements ChannelCheckClient {
  readonly destination = CHANNEL_DESTINATION;
  private readonly now: () => Date;

  constructor(options: YouTubeChannelOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async check(handle: string, signal?: AbortSignal): Promise<CapabilityResult<ChannelInfo>> {
    const normalized = normalizeHandle(handle);
    if (!normalized) {
      return createCapabilityError(CapabilityErrorCode.NOT_FOUND, `channel: invalid handle ${handle}`);
    }

    const url = channelUrlFromHandle(normalized);
    const headers = {
      "User-Agent": pickUserAgent(),
      Accept: "text/html",
      "Accept-Language": "en-US,en;q=0.9",
    };

    const about = await requestText("channel", url, { signal, headers });
    if (isCapabilityError(about)) return about;
    if (about.status === 404) {
      return createCapabilityError(CapabilityErrorCode.NOT_FOUND, `channel: ${normalized} not found`);
    }
    if (about.status !== 200) {
      return createCapabilityError(CapabilityErrorCode.UNAVAILABLE, `channel: HTTP ${about.status}`, {
        handle: normalized,
      });
    }
    if (!CHANNEL_MARKERS.some((marker) => about.body.includes(marker))) {
      return createCapabilityError(CapabilityErrorCode.NOT_FOUND, `channel: ${normalized} has no channel page`);
    }

    const subscribers = firstMatch(about.body, SUBSCRIBER_PATTERNS);
    const info: ChannelInfo = {
      handle: normalized,
      name: metaContent(about.body, "og:title") ?? normalized,
      subscriberCount: subscribers ? parseSubscriberCount(subscribers) : 0,
      lastActivityDate: null,
      description: (metaContent(about.body, "og:description") ?? "").slice(0, 300),
    };

    // The latest upload only shows on the videos tab
    const videos = await requestText("channel", `${url}/videos`, { signal, headers });
    if (isCapabilityError(videos)) {
      return videos.error.code === CapabilityErrorCode.RATE_LIMITED ? videos : info;
    }
    if (videos.status === 200) {
      const published = firstMatch(videos.body, PUBLISHED_PATTERNS);
      info.lastActivityDate = published ? relativeTimeToDate(published, this.now()) : null;
    }

    return info;
  }
}
