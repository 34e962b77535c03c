/**
 * Capability contracts: search, page fetch, channel check, oracle
 */

/**
 * Standard error codes
 */
export enum CapabilityErrorCode {
  /** Downstream throttling (HTTP 429); retried after cooldown */
  RATE_LIMITED = "RATE_LIMITED",
  UNAVAILABLE = "UNAVAILABLE",
  FETCH_ERROR = "FETCH_ERROR",
  NOT_FOUND = "NOT_FOUND",
  MALFORMED_RESPONSE = "MALFORMED_RESPONSE",
  TIMEOUT = "TIMEOUT",
  /** Throttling retries ran out */
  NETWORK_EXHAUSTED = "NETWORK_EXHAUSTED",
  /** The limiter refused a permit (shutdown or abort) */
  CANCELLED = "CANCELLED",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Structured capability error
 */
export interface CapabilityError {
  error: {
    code: CapabilityErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Capability result type - either success or error
 */
export type CapabilityResult<T> = T | CapabilityError;

/**
 * Check if result is an error
 */
export function isCapabilityError<T>(result: CapabilityResult<T>): result is CapabilityError {
  if (typeof result !== "object" || result === null || !("error" in result)) {
    return false;
  }
  const inner: unknown = result.error;
  return typeof inner === "object" && inner !== null && "code" in inner;
}

/**
 * Create a capability error
 */
export function createCapabilityError(
  code: CapabilityErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CapabilityError {
  return {
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
  };
}

// ============================================================
// Search
// ============================================================

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
  /** 1-based position on its results page */
  rank: number;
}

export interface SearchClient {
  /** Limiter key for this client's traffic */
  readonly destination: string;
  search(query: string, page: number, signal?: AbortSignal): Promise<CapabilityResult<SearchHit[]>>;
}

// ============================================================
// Page fetch
// ============================================================

export interface FetchedPage {
  url: string;
  title: string;
  text: string;
  /** Links found on the page, channel links first */
  discoveredUrls: string[];
}

export interface PageFetchClient {
  /** Limiter key for a given URL, usually its host */
  destinationFor(url: string): string;
  fetch(url: string, signal?: AbortSignal): Promise<CapabilityResult<FetchedPage>>;
}

// ============================================================
// Channel check
// ============================================================

export interface ChannelInfo {
  handle: string;
  name: string;
  subscriberCount: number;
  /** ISO date of the most recent upload or post; null when unknown */
  lastActivityDate: string | null;
  description: string;
}

export interface ChannelCheckClient {
  readonly destination: string;
  check(handle: string, signal?: AbortSignal): Promise<CapabilityResult<ChannelInfo>>;
}

// ============================================================
// Oracle
// ============================================================

export interface OracleRequest {
  system: string;
  prompt: string;
}

export interface OracleClient {
  readonly destination: string;
  /** Raw model text; schema validation happens in oracle/ */
  complete(request: OracleRequest, signal?: AbortSignal): Promise<CapabilityResult<string>>;
}

/**
 * The four capabilities a wave needs
 */
export interface Capabilities {
  search: SearchClient;
  pageFetch: PageFetchClient;
  channelCheck: ChannelCheckClient;
  oracle: OracleClient;
}
