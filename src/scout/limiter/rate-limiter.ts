/**
 * Rate Limiter - process-wide pacing for outbound network actions
 *
 * One permit per destination at a time. Between two permits to the same
 * destination at least its spacing elapses; between any two paced permits
 * process-wide at least a jittered global gap elapses. A throttled destination
 * is closed for the cooldown; other destinations are unaffected.
 */

import type { RateLimitConfig } from "../config/types.js";

export class RateLimiterClosedError extends Error {
  constructor() {
    super("Rate limiter is closed");
    this.name = "RateLimiterClosedError";
  }
}

export class AcquireAbortedError extends Error {
  constructor(destination: string) {
    super(`Acquisition for ${destination} was aborted`);
    this.name = "AcquireAbortedError";
  }
}

export type RateLimiterOptions = Pick<
  RateLimitConfig,
  "globalMinMs" | "globalMaxMs" | "perDestinationMs" | "cooldownMs"
> &
  Partial<Pick<RateLimitConfig, "destinationSpacingMs" | "unpacedDestinations">> & {
    /** Clock in ms; defaults to Date.now */
    now?: () => number;
    /** Jitter source in [0, 1); defaults to Math.random */
    random?: () => number;
  };

/**
 * Scoped right to perform one action against a destination
 */
export interface Permit {
  readonly destination: string;
  readonly grantedAt: number;
  /** Report a throttling response; closes the destination for the cooldown */
  throttle(): void;
  /** Idempotent */
  release(): void;
}

interface Waiter {
  grant: () => void;
  fail: (error: Error) => void;
}

interface DestinationState {
  held: boolean;
  waiters: Waiter[];
  lastGrantAt: number | null;
  cooldownUntil: number;
}

interface Sleeper {
  cancel: (error: Error) => void;
}

export class RateLimiter {
  private readonly options: RateLimiterOptions;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly destinations = new Map<string, DestinationState>();
  private readonly sleepers = new Set<Sleeper>();
  private readonly unpaced: Set<string>;
  private lastGlobalSlot: number | null = null;
  private nextGlobalGap: number;
  private closed = false;
  private permitsGranted = 0;

  constructor(options: RateLimiterOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now());
    this.random = options.random ?? Math.random;
    this.unpaced = new Set(options.unpacedDestinations ?? []);
    this.nextGlobalGap = this.drawGlobalGap();
  }

  /**
   * Wait for a permit to act against `destination`
   */
  async acquire(destination: string, signal?: AbortSignal): Promise<Permit> {
    if (this.closed) {
      throw new RateLimiterClosedError();
    }
    if (signal?.aborted) {
      throw new AcquireAbortedError(destination);
    }

    const state = this.stateFor(destination);
    await this.lock(state, destination, signal);

    try {
      for (;;) {
        if (this.closed) {
          throw new RateLimiterClosedError();
        }
        if (signal?.aborted) {
          throw new AcquireAbortedError(destination);
        }

        const now = this.now();
        const spacingUntil =
          state.lastGrantAt === null ? 0 : state.lastGrantAt + this.spacingFor(destination);
        const readyAt = Math.max(spacingUntil, state.cooldownUntil);

        if (readyAt > now) {
          await this.sleep(readyAt - now, destination, signal);
          continue;
        }

        if (!this.unpaced.has(destination)) {
          const slot = this.reserveGlobalSlot(now);
          if (slot > now) {
            await this.sleep(slot - now, destination, signal);
          }
          // a throttle may have landed while we waited for the global slot
          if (state.cooldownUntil > this.now()) {
            continue;
          }
        }

        const grantedAt = this.now();
        state.lastGrantAt = grantedAt;
        this.permitsGranted++;
        return this.createPermit(destination, state, grantedAt);
      }
    } catch (error) {
      this.unlock(state);
      throw error;
    }
  }

  /**
   * Run `fn` under a permit; the permit is released on every exit path
   */
  async withPermit<T>(
    destination: string,
    fn: (permit: Permit) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const permit = await this.acquire(destination, signal);
    try {
      return await fn(permit);
    } finally {
      permit.release();
    }
  }

  /**
   * Mark a destination as cooling down
   */
  throttle(destination: string): void {
    const state = this.stateFor(destination);
    state.cooldownUntil = Math.max(state.cooldownUntil, this.now() + this.options.cooldownMs);
  }

  /**
   * Remaining cooldown for a destination (ms)
   */
  cooldownRemaining(destination: string): number {
    const state = this.destinations.get(destination);
    if (!state) return 0;
    return Math.max(0, state.cooldownUntil - this.now());
  }

  get totalPermits(): number {
    return this.permitsGranted;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Fail every pending and future acquisition
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sleeper of [...this.sleepers]) {
      sleeper.cancel(new RateLimiterClosedError());
    }
    for (const state of this.destinations.values()) {
      const waiters = state.waiters.splice(0);
      for (const waiter of waiters) {
        waiter.fail(new RateLimiterClosedError());
      }
    }
  }

  private createPermit(destination: string, state: DestinationState, grantedAt: number): Permit {
    let released = false;
    return {
      destination,
      grantedAt,
      throttle: () => this.throttle(destination),
      release: () => {
        if (released) return;
        released = true;
        this.unlock(state);
      },
    };
  }

  private stateFor(destination: string): DestinationState {
    let state = this.destinations.get(destination);
    if (!state) {
      state = { held: false, waiters: [], lastGrantAt: null, cooldownUntil: 0 };
      this.destinations.set(destination, state);
    }
    return state;
  }

  private spacingFor(destination: string): number {
    const override = this.options.destinationSpacingMs?.[destination];
    return override ?? this.options.perDestinationMs;
  }

  private drawGlobalGap(): number {
    const min = this.options.globalMinMs;
    const max = Math.max(min, this.options.globalMaxMs);
    return min + this.random() * (max - min);
  }

  /**
   * Claim the next global slot; returns the time it opens
   */
  private reserveGlobalSlot(now: number): number {
    const slot =
      this.lastGlobalSlot === null ? now : Math.max(now, this.lastGlobalSlot + this.nextGlobalGap);
    this.lastGlobalSlot = slot;
    this.nextGlobalGap = this.drawGlobalGap();
    return slot;
  }

  private lock(state: DestinationState, destination: string, signal?: AbortSignal): Promise<void> {
    if (!state.held) {
      state.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = state.waiters.indexOf(waiter);
        if (index !== -1) state.waiters.splice(index, 1);
        waiter.fail(new AcquireAbortedError(destination));
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        fail: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      state.waiters.push(waiter);
    });
  }

  private unlock(state: DestinationState): void {
    const next = state.waiters.shift();
    if (next) {
      // hand the lock over without releasing it
      next.grant();
    } else {
      state.held = false;
    }
  }

  private sleep(ms: number, destination: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.sleepers.delete(sleeper);
      };
      const sleeper: Sleeper = {
        cancel: (error) => {
          cleanup();
          reject(error);
        },
      };
      const onAbort = (): void => sleeper.cancel(new AcquireAbortedError(destination));
      const timer = setTimeout(() => {
        cleanup();
        resolve();
      }, ms);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.sleepers.add(sleeper);
    });
  }
}

/**
 * Create the process-wide limiter from configuration
 */
export function createRateLimiter(config: RateLimitConfig): RateLimiter {
  return new RateLimiter({
    globalMinMs: config.globalMinMs,
    globalMaxMs: config.globalMaxMs,
    perDestinationMs: config.perDestinationMs,
    cooldownMs: config.cooldownMs,
    destinationSpacingMs: config.destinationSpacingMs,
    unpacedDestinations: config.unpacedDestinations,
  });
}
