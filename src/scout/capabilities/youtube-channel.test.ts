/**
 * Tests for the channel check client
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { YouTubeChannelClient, parseSubscriberCount, relativeTimeToDate } from "./youtube-channel.js";
import { CapabilityErrorCode, isCapabilityError } from "./types.js";

const NOW = new Date("2026-10-19T12:00:00.000Z");

const ABOUT_PAGE = `<html><head>
<meta property="og:title" content="Jo Bakes &amp; Co">
<meta property="og:description" content="Baking in Millbrook">
</head><body><script>var ytInitialData = {"subscriberCountText":{"simpleText":"45.2K subscribers"}};</script></body></html>`;

const VIDEOS_PAGE = `<script>var ytInitialData = {"publishedTimeText":{"simpleText":"2 weeks ago"}};</script>`;

function stubChannelPages(about: Response) {
  const fetchMock = vi.fn(async (input: string | URL | Request) =>
    String(input).endsWith("/videos") ? new Response(VIDEOS_PAGE, { status: 200 }) : about,
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseSubscriberCount", () => {
  it("reads abbreviated and grouped counts", () => {
    expect(parseSubscriberCount("45.2K subscribers")).toBe(45_200);
    expect(parseSubscriberCount("1.5M")).toBe(1_500_000);
    expect(parseSubscriberCount("1,234 subscribers")).toBe(1_234);
    expect(parseSubscriberCount("no subscribers")).toBe(0);
  });
});

describe("relativeTimeToDate", () => {
  it("turns relative times into dates", () => {
    expect(relativeTimeToDate("Streamed 3 days ago", NOW)).toBe("2026-10-16");
    expect(relativeTimeToDate("5 hours ago", NOW)).toBe("2026-10-19");
    expect(relativeTimeToDate("1 month ago", NOW)).toBe("2026-09-19");
    expect(relativeTimeToDate("yesterday", NOW)).toBeNull();
  });
});

describe("YouTubeChannelClient", () => {
  it("reads channel metadata and the latest upload", async () => {
    const fetchMock = stubChannelPages(new Response(ABOUT_PAGE, { status: 200 }));

    const info = await new YouTubeChannelClient({ now: () => NOW }).check("JoBakes");

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      "https://www.youtube.com/@JoBakes",
      "https://www.youtube.com/@JoBakes/videos",
    ]);
    expect(info).toEqual({
      handle: "@JoBakes",
      name: "Jo Bakes & Co",
      subscriberCount: 45_200,
      lastActivityDate: "2026-10-05",
      description: "Baking in Millbrook",
    });
  });

  it("reports missing channels as not found", async () => {
    stubChannelPages(new Response("not here", { status: 404 }));
    const missing = await new YouTubeChannelClient().check("@gone");

    stubChannelPages(new Response("<html>consent wall</html>", { status: 200 }));
    const unrecognised = await new YouTubeChannelClient().check("@gone");

    expect(isCapabilityError(missing) && missing.error).toEqual({
      code: CapabilityErrorCode.NOT_FOUND,
      message: "channel: @gone not found",
    });
    expect(isCapabilityError(unrecognised) && unrecognised.error.code).toBe(CapabilityErrorCode.NOT_FOUND);
  });

  it("rejects handles it cannot read", async () => {
    const result = await new YouTubeChannelClient().check("@");

    expect(isCapabilityError(result) && result.error.message).toBe("channel: invalid handle @");
  });
});
