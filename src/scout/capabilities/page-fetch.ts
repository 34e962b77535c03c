/**
 * Page fetch client: HTML to readable text plus discovered links
 */

import { domainOf, extractChannelUrls } from "./urls.js";
import { extractAnchors, htmlToText, pageTitle } from "./html.js";
import { pickUserAgent, requestText } from "./http.js";
import {
  CapabilityErrorCode,
  createCapabilityError,
  isCapabilityError,
  type CapabilityResult,
  type FetchedPage,
  type PageFetchClient,
} from "./types.js";

export interface HttpPageFetchOptions {
  /** Text beyond this is dropped before extraction */
  maxTextChars?: number;
  maxDiscoveredUrls?: number;
}

const DEFAULT_MAX_TEXT_CHARS = 50_000;
const DEFAULT_MAX_DISCOVERED = 200;

/**
 * Turn a fetched document into a page; channel links come first
 */
export function parsePage(
  url: string,
  html: string,
  options: Required<HttpPageFetchOptions>,
): FetchedPage {
  const discovered = extractChannelUrls(html);
  const seen = new Set(discovered);
  for (const anchor of extractAnchors(html)) {
    if (discovered.length >= options.maxDiscoveredUrls) break;
    if (seen.has(anchor.href)) continue;
    seen.add(anchor.href);
    discovered.push(anchor.href);
  }

  return {
    url,
    title: pageTitle(html),
    text: htmlToText(html).slice(0, options.maxTextChars),
    discoveredUrls: discovered.slice(0, options.maxDiscoveredUrls),
  };
}

export class HttpPageFetchClient implements PageFetchClient {
  private readonly options: Required<HttpPageFetchOptions>;

  constructor(options: HttpPageFetchOptions = {}) {
    this.options = {
      maxTextChars: options.maxTextChars ?? DEFAULT_MAX_TEXT_CHARS,
      maxDiscoveredUrls: options.maxDiscoveredUrls ?? DEFAULT_MAX_DISCOVERED,
    };
  }

  destinationFor(url: string): string {
    return domainOf(url);
  }

  async fetch(url: string, signal?: AbortSignal): Promise<CapabilityResult<FetchedPage>> {
    const response = await requestText("fetch", url, {
      signal,
      headers: {
        "User-Agent": pickUserAgent(),
        Accept: "text/html,application/xhtml+xml,text/plain;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
    });
    if (isCapabilityError(response)) {
      return response.error.code === CapabilityErrorCode.RATE_LIMITED
        ? response
        : createCapabilityError(CapabilityErrorCode.FETCH_ERROR, response.error.message, { url });
    }

    if (response.status < 200 || response.status >= 300) {
      return createCapabilityError(CapabilityErrorCode.FETCH_ERROR, `fetch: HTTP ${response.status}`, {
        url,
        status: response.status,
      });
    }

    const type = response.contentType.toLowerCase();
    if (type && !type.includes("html") && !type.startsWith("text/")) {
      return createCapabilityError(CapabilityErrorCode.FETCH_ERROR, `fetch: unsupported content type ${type}`, {
        url,
      });
    }

    return parsePage(response.url, response.body, this.options);
  }
}
