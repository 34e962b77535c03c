/**
 * Capability gateway: every outbound call goes through here
 *
 * Takes a permit from the limiter, applies the per-call timeout, reports
 * throttling back to the limiter and retries throttled calls up to the
 * configured limit.
 */

import type { RateLimiter, Permit } from "../limiter/rate-limiter.js";
import type { ScoutLogger } from "../runtime/logger.js";
import {
  CapabilityErrorCode,
  createCapabilityError,
  isCapabilityError,
  type CapabilityResult,
} from "./types.js";

export interface GatewayOptions {
  limiter: RateLimiter;
  logger: ScoutLogger;
  /** Throttled attempts retried before the call counts as exhausted */
  maxThrottleRetries: number;
}

/**
 * The operation a gateway call performs once it holds a permit
 */
export type CapabilityOperation<T> = (signal: AbortSignal) => Promise<CapabilityResult<T>>;

export class CapabilityGateway {
  private readonly limiter: RateLimiter;
  private readonly logger: ScoutLogger;
  private readonly maxThrottleRetries: number;

  constructor(options: GatewayOptions) {
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.maxThrottleRetries = options.maxThrottleRetries;
  }

  /**
   * Perform `operation` against `destination` under the limiter
   */
  async call<T>(
    name: string,
    destination: string,
    timeoutMs: number,
    operation: CapabilityOperation<T>,
  ): Promise<CapabilityResult<T>> {
    for (let attempt = 1; ; attempt++) {
      let permit: Permit;
      try {
        permit = await this.limiter.acquire(destination);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return createCapabilityError(CapabilityErrorCode.CANCELLED, `${name}: ${message}`, {
          destination,
        });
      }

      const startTime = Date.now();
      let result: CapabilityResult<T>;
      try {
        result = await this.invoke(name, timeoutMs, operation);
        if (isThrottled(result)) {
          permit.throttle();
        }
      } finally {
        permit.release();
      }

      this.logger.capability(name, destination, !isCapabilityError(result), Date.now() - startTime);

      if (!isThrottled(result)) {
        return result;
      }

      if (attempt > this.maxThrottleRetries) {
        this.logger.warn(`${name} still throttled, giving up`, { destination, attempts: attempt });
        return createCapabilityError(
          CapabilityErrorCode.NETWORK_EXHAUSTED,
          `${name} throttled by ${destination} after ${attempt} attempts`,
          { destination, attempts: attempt },
        );
      }

      this.logger.warn(`${name} throttled, retrying after cooldown`, {
        destination,
        attempt,
        cooldown_ms: this.limiter.cooldownRemaining(destination),
      });
    }
  }

  private async invoke<T>(
    name: string,
    timeoutMs: number,
    operation: CapabilityOperation<T>,
  ): Promise<CapabilityResult<T>> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    // never rejects
    const pending = Promise.resolve()
      .then(() => operation(controller.signal))
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        return createCapabilityError(
          CapabilityErrorCode.INTERNAL_ERROR,
          `${name} failed: ${message}`,
        );
      });

    try {
      return await Promise.race([
        pending,
        new Promise<CapabilityResult<T>>((resolve) => {
          timer = setTimeout(() => {
            controller.abort();
            resolve(
              createCapabilityError(
                CapabilityErrorCode.TIMEOUT,
                `${name} timed out after ${timeoutMs}ms`,
              ),
            );
          }, timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function isThrottled<T>(result: CapabilityResult<T>): boolean {
  return isCapabilityError(result) && result.error.code === CapabilityErrorCode.RATE_LIMITED;
}
