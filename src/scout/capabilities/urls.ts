/**
 * URL helpers: source domains and channel handles
 *
 * A handle is the channel's path on the video host: "@name",
 * "channel/<id>", "c/<name>" or "user/<name>".
 */

const CHANNEL_HOST = "www.youtube.com";
const CHANNEL_HOST_PATTERN = /(^|\.)youtube\.com$/i;
const CHANNEL_URL_PATTERN =
  /(?:https?:)?\/\/(?:www\.|m\.)?youtube\.com\/(?:@[\w.-]+|channel\/[\w-]+|c\/[\w.-]+|user\/[\w.-]+)/gi;

function parseUrl(raw: string): URL | null {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw)
    ? raw
    : `https://${raw.replace(/^\/\//, "")}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

/**
 * Host of a URL without a leading "www."; the input itself when unparseable
 */
export function domainOf(url: string): string {
  const parsed = parseUrl(url.trim());
  if (!parsed) return url;
  return parsed.hostname.toLowerCase().replace(/^www\./, "");
}

/**
 * Channel handle from a channel URL; null for anything else (videos, other hosts)
 */
export function channelHandleFromUrl(url: string | null | undefined): string | null {
  if (!url) return null;
  const parsed = parseUrl(url.trim());
  if (!parsed || !CHANNEL_HOST_PATTERN.test(parsed.hostname)) return null;

  const [first, second] = parsed.pathname.split("/").filter((s) => s.length > 0);
  if (!first) return null;
  if (first.startsWith("@") && first.length > 1) return first;
  if ((first === "channel" || first === "c" || first === "user") && second) {
    return `${first}/${second}`;
  }
  return null;
}

/**
 * Normalize a handle as written by a person or a model
 */
export function normalizeHandle(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const value = raw.trim();
  if (value.length === 0) return null;

  if (value.includes("youtube.com")) {
    return channelHandleFromUrl(value);
  }
  if (/^(channel|c|user)\/[\w.-]+$/.test(value)) {
    return value;
  }
  const bare = value.startsWith("@") ? value.slice(1) : value;
  return /^[\w.-]{3,}$/.test(bare) ? `@${bare}` : null;
}

export function channelUrlFromHandle(handle: string): string {
  return `https://${CHANNEL_HOST}/${handle}`;
}

/**
 * Canonical channel URLs mentioned in a block of text or HTML, in order
 */
export function extractChannelUrls(text: string): string[] {
  const urls: string[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(CHANNEL_URL_PATTERN)) {
    const handle = channelHandleFromUrl(match[0]);
    if (!handle) continue;
    const key = handle.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    urls.push(channelUrlFromHandle(handle));
  }

  return urls;
}
