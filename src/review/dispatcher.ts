import type { Orchestrator } from "./orchestrator.js";
import type { Outcome, RawEvent } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "dispatcher" });

/** Where the webhook layer hands events; it never waits for the outcome. */
export interface EventSink {
  submit(raw: RawEvent): void;
}

/**
 * Runs each event as its own unit of work so the webhook can be
 * acknowledged right away. Units on the same thread race freely; the state
 * store settles who gets to comment.
 */
export class EventDispatcher implements EventSink {
  private readonly inFlight = new Set<Promise<Outcome | null>>();

  constructor(private readonly orchestrator: Orchestrator) {}

  submit(raw: RawEvent): void {
    const unit = this.orchestrator.handle(raw).catch((err: unknown) => {
      log.error({ err, deliveryId: raw.deliveryId }, "Unhandled error in unit of work");
      return null;
    });
    this.inFlight.add(unit);
    void unit.finally(() => this.inFlight.delete(unit));
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolves once every submitted unit has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      log.info({ pending: this.inFlight.size }, "Waiting for in-flight work");
      await Promise.all(this.inFlight);
    }
  }
}
