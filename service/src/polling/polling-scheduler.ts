import { EventEmitter } from "node:events";
import type { ResourceKind } from "@refdata/shared";
import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { TickOutcome } from "./resource-poller.js";

const log = createLogger("polling-scheduler");

export type Pollable = {
  readonly kind: ResourceKind;
  tick(): Promise<TickOutcome>;
};

export type PollingSchedulerOptions = {
  /** Tick each poller as soon as it is scheduled instead of after one interval. */
  pollOnStart?: boolean;
};

type ScheduledPoller = {
  poller: Pollable;
  intervalMs: number;
  timer: ReturnType<typeof setTimeout> | null;
  running: Promise<void> | null;
};

/**
 * Drives each poller on its own fixed cadence. The next tick is armed only
 * after the current one settles; a deferred tick is retried once the rate
 * limiter's wait has passed.
 *
 * Events: `tick` (kind, outcome).
 */
export class PollingScheduler extends EventEmitter {
  private scheduled = new Map<ResourceKind, ScheduledPoller>();
  private pollOnStart: boolean;

  constructor(options: PollingSchedulerOptions = {}) {
    super();
    this.pollOnStart = options.pollOnStart ?? true;
  }

  schedule(poller: Pollable, intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Invalid poll interval for ${poller.kind}: ${intervalMs}`);
    }
    if (this.scheduled.has(poller.kind)) {
      throw new Error(`Poller already scheduled: ${poller.kind}`);
    }

    const entry: ScheduledPoller = { poller, intervalMs, timer: null, running: null };
    this.scheduled.set(poller.kind, entry);
    this.scheduleNext(entry, this.pollOnStart ? 0 : intervalMs);
  }

  unschedule(kind: ResourceKind): void {
    const entry = this.scheduled.get(kind);
    if (entry?.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    this.scheduled.delete(kind);
  }

  stopAll(): void {
    for (const entry of this.scheduled.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
    }
    this.scheduled.clear();
  }

  isScheduled(kind: ResourceKind): boolean {
    return this.scheduled.has(kind);
  }

  /** Stop all timers and wait for ticks already running to settle. */
  async drain(): Promise<void> {
    const running = [...this.scheduled.values()].flatMap((e) => (e.running ? [e.running] : []));
    this.stopAll();
    await Promise.all(running);
  }

  private scheduleNext(entry: ScheduledPoller, delay: number): void {
    entry.timer = setTimeout(() => {
      entry.timer = null;
      entry.running = this.run(entry).finally(() => {
        entry.running = null;
      });
    }, delay);

    // Don't block process exit
    if (typeof entry.timer === "object" && "unref" in entry.timer) {
      entry.timer.unref();
    }
  }

  private async run(entry: ScheduledPoller): Promise<void> {
    const { kind } = entry.poller;
    // May have been unscheduled while the timer was pending
    if (this.scheduled.get(kind) !== entry) return;

    let outcome: TickOutcome | null = null;
    try {
      outcome = await entry.poller.tick();
      this.emit("tick", kind, outcome);
    } catch (err) {
      log.error("Tick failed", { kind, error: errorMessage(err) });
    }

    if (this.scheduled.get(kind) === entry) {
      const delay = outcome?.status === "deferred" ? outcome.retryAfterMs : entry.intervalMs;
      this.scheduleNext(entry, delay);
    }
  }
}
