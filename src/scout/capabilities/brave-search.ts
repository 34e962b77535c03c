/**
 * Search client backed by the Brave results page
 */

import { domainOf } from "./urls.js";
import { extractAnchors, stripTags } from "./html.js";
import { excerpt, pickUserAgent, requestText } from "./http.js";
import {
  CapabilityErrorCode,
  createCapabilityError,
  isCapabilityError,
  type CapabilityResult,
  type SearchClient,
  type SearchHit,
} from "./types.js";

export const BRAVE_SEARCH_HOST = "search.brave.com";

/** Results per page as Brave paginates them */
const PAGE_OFFSET = 20;

const SKIP_DOMAINS = new Set([
  "search.brave.com",
  "brave.com",
  "googleapis.com",
  "gstatic.com",
  "google.com",
  "bing.com",
  "microsoft.com",
]);

const SNIPPET_PATTERN =
  /(?:class="[^"]*(?:description|snippet|body|text)[^"]*"[^>]*>|<p\b[^>]*>)([\s\S]*?)(?:<\/|<br)/i;

/**
 * Organic results from a results page, ranked from 1
 */
export function parseBraveResults(html: string): SearchHit[] {
  const hits: SearchHit[] = [];
  const seen = new Set<string>();

  for (const anchor of extractAnchors(html)) {
    const { href, text } = anchor;
    if (seen.has(href) || text.length < 5 || href.includes("/search?")) continue;
    if (SKIP_DOMAINS.has(domainOf(href))) continue;
    seen.add(href);

    const following = html.slice(anchor.end, anchor.end + 1000);
    const match = SNIPPET_PATTERN.exec(following);
    const snippet = match ? stripTags(match[1]) : stripTags(following.slice(0, 300));

    hits.push({
      url: href,
      title: text.slice(0, 200),
      snippet: snippet.slice(0, 500),
      rank: hits.length + 1,
    });
  }

  return hits;
}

export class BraveSearchClient implements SearchClient {
  readonly destination = BRAVE_SEARCH_HOST;

  async search(query: string, page: number, signal?: AbortSignal): Promise<CapabilityResult<SearchHit[]>> {
    const url = `https://${BRAVE_SEARCH_HOST}/search?q=${encodeURIComponent(query)}&offset=${page * PAGE_OFFSET}`;
    const response = await requestText("search", url, {
      signal,
      headers: {
        "User-Agent": pickUserAgent(),
        Accept: "text/html",
        "Accept-Language": "en-US,en;q=0.9",
        Referer: `https://${BRAVE_SEARCH_HOST}/`,
      },
    });
    if (isCapabilityError(response)) return response;

    if (response.status !== 200) {
      return createCapabilityError(
        CapabilityErrorCode.UNAVAILABLE,
        `search: HTTP ${response.status}`,
        { query, page, excerpt: excerpt(response.body) },
      );
    }

    return parseBraveResults(response.body);
  }
}
