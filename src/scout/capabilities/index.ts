/**
 * Capability clients
 */

import type { ScoutConfig } from "../config/types.js";
import { BraveSearchClient } from "./brave-search.js";
import { OpenAICompatibleOracleClient } from "./openai-oracle.js";
import { HttpPageFetchClient } from "./page-fetch.js";
import { YouTubeChannelClient } from "./youtube-channel.js";
import type { Capabilities } from "./types.js";

export * from "./types.js";
export { CapabilityGateway, type GatewayOptions, type CapabilityOperation } from "./gateway.js";
export { BraveSearchClient, parseBraveResults } from "./brave-search.js";
export { HttpPageFetchClient, parsePage } from "./page-fetch.js";
export { YouTubeChannelClient, parseSubscriberCount, relativeTimeToDate } from "./youtube-channel.js";
export { OpenAICompatibleOracleClient } from "./openai-oracle.js";
export {
  channelHandleFromUrl,
  channelUrlFromHandle,
  domainOf,
  extractChannelUrls,
  normalizeHandle,
} from "./urls.js";

/**
 * The HTTP-backed clients a real run uses
 */
export function createDefaultCapabilities(config: ScoutConfig): Capabilities {
  return {
    search: new BraveSearchClient(),
    pageFetch: new HttpPageFetchClient(),
    channelCheck: new YouTubeChannelClient(),
    oracle: new OpenAICompatibleOracleClient(config.oracle),
  };
}
