/**
 * Oracle client for OpenAI-compatible chat completion endpoints
 */

import { z } from "zod";
import type { OracleConfig } from "../config/types.js";
import { excerpt, requestText } from "./http.js";
import {
  CapabilityErrorCode,
  createCapabilityError,
  isCapabilityError,
  type CapabilityResult,
  type OracleClient,
  type OracleRequest,
} from "./types.js";

export const ORACLE_DESTINATION = "oracle";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export class OpenAICompatibleOracleClient implements OracleClient {
  readonly destination = ORACLE_DESTINATION;
  private readonly config: OracleConfig;
  private readonly url: string;

  constructor(config: OracleConfig) {
    this.config = config;
    this.url = `${config.endpoint.replace(/\/+$/, "")}/v1/chat/completions`;
  }

  async complete(request: OracleRequest, signal?: AbortSignal): Promise<CapabilityResult<string>> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await requestText("oracle", this.url, {
      method: "POST",
      signal,
      headers,
      body: JSON.stringify({
        model: this.config.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      }),
    });
    if (isCapabilityError(response)) return response;

    if (response.status < 200 || response.status >= 300) {
      return createCapabilityError(CapabilityErrorCode.UNAVAILABLE, `oracle: HTTP ${response.status}`, {
        excerpt: excerpt(response.body),
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch {
      return createCapabilityError(CapabilityErrorCode.MALFORMED_RESPONSE, "oracle: response is not JSON", {
        excerpt: excerpt(response.body),
      });
    }

    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      return createCapabilityError(
        CapabilityErrorCode.MALFORMED_RESPONSE,
        "oracle: unexpected completion shape",
        { issues: parsed.error.issues.map((issue) => issue.message) },
      );
    }

    return parsed.data.choices[0].message.content ?? "";
  }
}
