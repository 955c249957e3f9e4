import { EventEmitter } from "node:events";
import {
  isSuccess,
  type FetchErrorKind,
  type LogEntry,
  type PollerHealth,
  type PollerState,
  type ResourceKind,
  type ResourceSnapshot,
  type SuccessSnapshot,
} from "@refdata/shared";
import { ExchangeError, LogWriteError, errorMessage } from "../errors.js";
import type { ResourceFetcher } from "../exchange/types.js";
import type { RateLimiter } from "../rate-limit/rate-limiter.js";
import type { SnapshotLog } from "../storage/snapshot-log.js";
import type { StateStore } from "../storage/state-store.js";
import { createLogger, type Logger } from "../utils/logger.js";

export type TickOutcome =
  | { status: "applied"; sequence: number; durable: boolean }
  | { status: "stale"; sequence: number }
  | { status: "failed"; sequence: number; errorKind: FetchErrorKind | "log-write" }
  | { status: "deferred"; retryAfterMs: number }
  | { status: "skipped" };

export type ResourcePollerOptions<K extends ResourceKind> = {
  kind: K;
  fetch: ResourceFetcher<K>;
  limiter: RateLimiter;
  bucket: string;
  weight: number;
  log: SnapshotLog;
  store: StateStore;
  /** Publish a success to the store even when its log append failed. */
  publishOnLogFailure?: boolean;
  onApplied?: (snapshot: SuccessSnapshot<K>) => void;
  now?: () => number;
};

/**
 * Polls one resource kind. Each attempt takes a sequence number, is appended
 * to the log, and only then is published to the store. At most one attempt
 * is in flight; a tick that arrives meanwhile is skipped.
 *
 * Events: `durability-gap` (LogWriteError).
 */
export class ResourcePoller<K extends ResourceKind> extends EventEmitter {
  readonly kind: K;

  private readonly options: ResourcePollerOptions<K>;
  private readonly now: () => number;
  private readonly log: Logger;
  private _state: PollerState = "idle";
  private sequence = 0;
  private inFlight: Promise<TickOutcome> | null = null;
  private attempts = 0;
  private failCount = 0;
  private lastSuccessAt: number | undefined;
  private lastFailureAt: number | undefined;
  private lastError: string | undefined;
  private _durabilityGaps = 0;

  constructor(options: ResourcePollerOptions<K>) {
    super();
    this.kind = options.kind;
    this.options = options;
    this.now = options.now ?? Date.now;
    this.log = createLogger(`poller:${options.kind}`);
  }

  get state(): PollerState {
    return this._state;
  }

  get durabilityGaps(): number {
    return this._durabilityGaps;
  }

  get lastSequence(): number {
    return this.sequence;
  }

  /** Resume numbering after the last logged attempt so sequences are never reused. */
  async init(): Promise<void> {
    const logged = await this.options.log.lastSequence(this.kind);
    this.sequence = Math.max(this.sequence, logged);
  }

  tick(): Promise<TickOutcome> {
    if (this.inFlight) {
      this.log.debug("Attempt already in flight, skipping tick");
      return Promise.resolve({ status: "skipped" });
    }

    const attempt = this.attempt().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = attempt;
    return attempt;
  }

  /** Resolves once no attempt is in flight. */
  async whenIdle(): Promise<void> {
    if (this.inFlight) await this.inFlight;
  }

  health(): PollerHealth {
    return {
      kind: this.kind,
      state: this._state,
      attempts: this.attempts,
      failCount: this.failCount,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError,
    };
  }

  private async attempt(): Promise<TickOutcome> {
    const { bucket, weight } = this.options;

    this._state = "waiting";
    const gate = this.options.limiter.tryAcquire(bucket, weight);
    if (!gate.granted) {
      const level = gate.reason === "over-capacity" ? "warn" : "debug";
      this.log[level]("Rate limit budget exhausted, deferring", {
        bucket,
        weight,
        retryAfterMs: gate.retryAfterMs,
        reason: gate.reason,
      });
      return { status: "deferred", retryAfterMs: gate.retryAfterMs };
    }

    this._state = "fetching";
    const snapshot = await this.fetchSnapshot();
    this.attempts++;

    this._state = isSuccess(snapshot) ? "applying" : "failed";
    const entry: LogEntry<K> = { ...snapshot, writtenAt: this.now() };

    try {
      await this.options.log.append(entry);
    } catch (err) {
      return this.onLogFailure(snapshot, err);
    }

    if (!isSuccess(snapshot)) {
      this.recordFailure(snapshot.outcome.message);
      this._state = "idle";
      return { status: "failed", sequence: snapshot.sequence, errorKind: snapshot.outcome.errorKind };
    }

    const outcome = this.publish(snapshot, true);
    this._state = "idle";
    return outcome;
  }

  private async fetchSnapshot(): Promise<ResourceSnapshot<K>> {
    try {
      const payload = await this.options.fetch();
      return {
        kind: this.kind,
        sequence: this.nextSequence(),
        fetchedAt: this.now(),
        outcome: { status: "success" },
        payload,
      };
    } catch (err) {
      const errorKind: FetchErrorKind = err instanceof ExchangeError ? err.kind : "unknown";
      const message = errorMessage(err);
      const data = { errorKind, error: message };
      if (errorKind === "unknown") {
        this.log.error("Fetch failed with an unexpected error", data);
      } else {
        this.log.warn("Fetch failed", data);
      }
      return {
        kind: this.kind,
        sequence: this.nextSequence(),
        fetchedAt: this.now(),
        outcome: { status: "failure", errorKind, message },
        payload: null,
      };
    }
  }

  private publish(snapshot: SuccessSnapshot<K>, durable: boolean): TickOutcome {
    const result = this.options.store.update(snapshot);
    if (result !== "applied") {
      return { status: "stale", sequence: snapshot.sequence };
    }

    this.failCount = 0;
    this.lastSuccessAt = snapshot.fetchedAt;

    if (this.options.onApplied) {
      try {
        this.options.onApplied(snapshot);
      } catch (err) {
        this.log.error("onApplied hook failed", { sequence: snapshot.sequence, error: errorMessage(err) });
      }
    }

    this.log.debug("Snapshot applied", { sequence: snapshot.sequence, durable });
    return { status: "applied", sequence: snapshot.sequence, durable };
  }

  private onLogFailure(snapshot: ResourceSnapshot<K>, err: unknown): TickOutcome {
    const error =
      err instanceof LogWriteError
        ? err
        : new LogWriteError(this.kind, snapshot.sequence, errorMessage(err), err);

    this._durabilityGaps++;
    this.log.error("Durability gap: attempt was not logged", {
      sequence: snapshot.sequence,
      outcome: snapshot.outcome.status,
      error: error.message,
    });
    this.emit("durability-gap", error);

    if (isSuccess(snapshot) && this.options.publishOnLogFailure) {
      const outcome = this.publish(snapshot, false);
      this._state = "idle";
      return outcome;
    }

    this.recordFailure(error.message);
    this._state = "idle";
    return { status: "failed", sequence: snapshot.sequence, errorKind: "log-write" };
  }

  private recordFailure(message: string): void {
    this.failCount++;
    this.lastFailureAt = this.now();
    this.lastError = message;
  }

  private nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }
}
