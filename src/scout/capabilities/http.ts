/**
 * Shared HTTP plumbing for the concrete capability clients
 */

import {
  CapabilityErrorCode,
  createCapabilityError,
  type CapabilityResult,
} from "./types.js";

export const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:130.0) Gecko/20100101 Firefox/130.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_6) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.6 Safari/605.1.15",
];

export function pickUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

export interface HttpText {
  status: number;
  /** Final URL after redirects */
  url: string;
  contentType: string;
  body: string;
}

/**
 * Perform a request and read the body as text.
 * HTTP 429 becomes RATE_LIMITED; network failures become UNAVAILABLE.
 * Every other status is returned for the caller to interpret.
 */
export async function requestText(
  label: string,
  url: string,
  init: RequestInit,
): Promise<CapabilityResult<HttpText>> {
  let response: Response;
  try {
    response = await fetch(url, { redirect: "follow", ...init });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createCapabilityError(CapabilityErrorCode.UNAVAILABLE, `${label}: ${message}`, { url });
  }

  if (response.status === 429) {
    return createCapabilityError(CapabilityErrorCode.RATE_LIMITED, `${label}: HTTP 429`, {
      url,
      retryAfter: response.headers.get("retry-after"),
    });
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return createCapabilityError(CapabilityErrorCode.UNAVAILABLE, `${label}: ${message}`, { url });
  }

  return {
    status: response.status,
    url: response.url || url,
    contentType: response.headers.get("content-type") ?? "",
    body,
  };
}

export function excerpt(text: string, max = 200): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}
