/**
 * Progress Reporter - one-way, best-effort event fan-out
 *
 * Observers never affect the run: a throwing or rejecting observer is logged
 * and the event still reaches everyone else. Each observer gets its own copy
 * of the event.
 */

import type { RunReport } from "../orchestrator/core.js";
import type { Directive, WaveOutcome } from "../orchestrator/types.js";
import type { ScoutLogger } from "../runtime/logger.js";

interface SlotRef {
  runId: string;
  regionId: string;
  localityId: string;
  categoryId: string;
  at: string;
}

export type ProgressEvent =
  | (SlotRef & { type: "wave-started"; wave: number; directive: Directive })
  | (SlotRef & { type: "wave-completed"; outcome: WaveOutcome })
  | { type: "locality-resolved"; runId: string; regionId: string; localityId: string; at: string }
  | { type: "region-resolved"; runId: string; regionId: string; at: string }
  | { type: "run-completed"; runId: string; report: RunReport; at: string };

export type ProgressEventType = ProgressEvent["type"];

export type ProgressObserver = (event: ProgressEvent) => void | Promise<void>;

export class ProgressReporter {
  private readonly observers = new Set<ProgressObserver>();
  private readonly logger: ScoutLogger;
  private emitted = 0;
  private failures = 0;

  constructor(logger: ScoutLogger) {
    this.logger = logger;
  }

  /**
   * Register an observer; returns the function that removes it
   */
  subscribe(observer: ProgressObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  emit(event: ProgressEvent): void {
    this.emitted++;
    for (const observer of [...this.observers]) {
      try {
        const result = observer(structuredClone(event));
        if (result instanceof Promise) {
          void result.catch((error: unknown) => this.observerFailed(event, error));
        }
      } catch (error) {
        this.observerFailed(event, error);
      }
    }
  }

  get stats(): { emitted: number; observerFailures: number } {
    return { emitted: this.emitted, observerFailures: this.failures };
  }

  private observerFailed(event: ProgressEvent, error: unknown): void {
    this.failures++;
    this.logger.warn(`Progress observer failed on ${event.type}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Mirror progress events into the run log
 */
export function createLogObserver(logger: ScoutLogger): ProgressObserver {
  return (event) => {
    switch (event.type) {
      case "wave-started":
        logger.info(
          `${event.localityId}/${event.categoryId}: wave ${event.wave} (${event.directive.angle})`,
        );
        break;
      case "wave-completed": {
        const { outcome } = event;
        const detail =
          outcome.candidate?.name ?? outcome.failure?.reason ?? outcome.stoppedAfter ?? "";
        logger.info(
          `${event.localityId}/${event.categoryId}: wave ${outcome.wave} ${outcome.status}${detail ? ` (${detail})` : ""}`,
        );
        break;
      }
      case "locality-resolved":
        logger.info(`Locality ${event.localityId} resolved`, { region: event.regionId });
        break;
      case "region-resolved":
        logger.info(`Region ${event.regionId} resolved`);
        break;
      case "run-completed":
        logger.info(`Run ${event.report.status}`, event.report.totals);
        break;
    }
  };
}
