/**
 * Typed oracle requests
 *
 * A call pairs a prompt with the schema its answer must satisfy. Output that
 * holds no JSON, or JSON of the wrong shape, comes back as
 * MALFORMED_RESPONSE.
 */

import type { z } from "zod";
import type { CapabilityGateway } from "../capabilities/gateway.js";
import {
  CapabilityErrorCode,
  createCapabilityError,
  isCapabilityError,
  type CapabilityResult,
  type OracleClient,
  type OracleRequest,
} from "../capabilities/types.js";
import { extractJson } from "./json-extract.js";

export type OracleKind =
  | "queries"
  | "scores"
  | "fragments"
  | "candidates"
  | "followups"
  | "verdict"
  | "directive";

export interface OracleCall<T> {
  kind: OracleKind;
  request: OracleRequest;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface Oracle {
  ask<T>(call: OracleCall<T>): Promise<CapabilityResult<T>>;
}

export interface OracleOptions {
  gateway: CapabilityGateway;
  client: OracleClient;
  timeoutMs: number;
}

/**
 * Send one request and validate the answer against its schema
 */
export async function askOracle<T>(
  options: OracleOptions,
  call: OracleCall<T>,
): Promise<CapabilityResult<T>> {
  const { gateway, client, timeoutMs } = options;
  const raw = await gateway.call(`oracle.${call.kind}`, client.destination, timeoutMs, (signal) =>
    client.complete(call.request, signal),
  );
  if (isCapabilityError(raw)) {
    return raw;
  }

  const json = extractJson(raw);
  if (json === null) {
    return createCapabilityError(
      CapabilityErrorCode.MALFORMED_RESPONSE,
      `oracle ${call.kind}: no JSON object in response`,
      { excerpt: raw.slice(0, 200) },
    );
  }

  const parsed = call.schema.safeParse(json);
  if (!parsed.success) {
    return createCapabilityError(
      CapabilityErrorCode.MALFORMED_RESPONSE,
      `oracle ${call.kind}: response does not match schema`,
      { issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`) },
    );
  }

  return parsed.data;
}

export function createOracle(options: OracleOptions): Oracle {
  return {
    ask<T>(call: OracleCall<T>) {
      return askOracle(options, call);
    },
  };
}
