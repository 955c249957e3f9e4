import {
  RESOURCE_KINDS,
  isSuccess,
  type ResourceKind,
  type ResourceSnapshot,
  type SuccessSnapshot,
} from "@refdata/shared";
import { createLogger } from "../utils/logger.js";
import type { SnapshotLog } from "./snapshot-log.js";

const log = createLogger("state-store");

export type UpdateResult = "applied" | "stale" | "ignored";

type Slots = { [K in ResourceKind]?: SuccessSnapshot<K> };

export type StoreStats = Record<ResourceKind, { sequence: number | null; conflicts: number }>;

/**
 * Latest successful snapshot per resource kind. A slot is swapped whole, and
 * only for a strictly greater sequence number; stored snapshots are frozen so
 * readers can hold on to them while the poller moves on.
 */
export class StateStore {
  private slots: Slots = {};
  private conflicts = new Map<ResourceKind, number>();

  update<K extends ResourceKind>(snapshot: ResourceSnapshot<K>): UpdateResult {
    if (!isSuccess(snapshot)) return "ignored";

    const current: SuccessSnapshot<K> | undefined = this.slots[snapshot.kind];
    if (current && current.sequence >= snapshot.sequence) {
      this.conflicts.set(snapshot.kind, (this.conflicts.get(snapshot.kind) ?? 0) + 1);
      log.debug("Discarded stale snapshot", {
        kind: snapshot.kind,
        sequence: snapshot.sequence,
        current: current.sequence,
      });
      return "stale";
    }

    deepFreeze(snapshot);
    this.slots[snapshot.kind] = snapshot;
    return "applied";
  }

  /** `undefined` until the kind has been polled successfully. */
  read<K extends ResourceKind>(kind: K): SuccessSnapshot<K> | undefined {
    return this.slots[kind];
  }

  conflictCount(kind: ResourceKind): number {
    return this.conflicts.get(kind) ?? 0;
  }

  stats(): StoreStats {
    const slot = (kind: ResourceKind) => ({
      sequence: this.slots[kind]?.sequence ?? null,
      conflicts: this.conflictCount(kind),
    });
    return {
      exchangeInfo: slot("exchangeInfo"),
      accountInfo: slot("accountInfo"),
      systemStatus: slot("systemStatus"),
    };
  }

  /** Rebuild the cache from the last successful entry of each kind. */
  async warmStart(source: SnapshotLog): Promise<ResourceKind[]> {
    const restored: ResourceKind[] = [];
    for (const kind of RESOURCE_KINDS) {
      if (await this.restore(source, kind)) restored.push(kind);
    }
    if (restored.length > 0) {
      log.info("Warm-started state from log", { kinds: restored });
    }
    return restored;
  }

  private async restore<K extends ResourceKind>(source: SnapshotLog, kind: K): Promise<boolean> {
    const entry = await source.latestSuccess(kind);
    if (!entry) return false;
    const snapshot: SuccessSnapshot<K> = {
      kind: entry.kind,
      sequence: entry.sequence,
      fetchedAt: entry.fetchedAt,
      outcome: entry.outcome,
      payload: entry.payload,
    };
    return this.update(snapshot) === "applied";
  }
}

function deepFreeze(value: unknown): void {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}
