import type { LogEntry, ResourceKind, SuccessSnapshot } from "@refdata/shared";

export type LogReadOptions = {
  /** Only entries with a sequence greater than this. */
  afterSequence?: number;
  limit?: number;
};

export type SuccessLogEntry<K extends ResourceKind = ResourceKind> = SuccessSnapshot<K> & {
  writtenAt: number;
};

/**
 * Append-only record of every poll attempt, partitioned by resource kind.
 * `append` resolves only once the entry is durable and rejects with
 * `LogWriteError`; entries of one kind are kept in strictly increasing
 * sequence order and are never rewritten.
 */
export interface SnapshotLog {
  append<K extends ResourceKind>(entry: LogEntry<K>): Promise<void>;
  read<K extends ResourceKind>(kind: K, options?: LogReadOptions): Promise<LogEntry<K>[]>;
  /** 0 when nothing has been logged for the kind. */
  lastSequence(kind: ResourceKind): Promise<number>;
  latestSuccess<K extends ResourceKind>(kind: K): Promise<SuccessLogEntry<K> | undefined>;
  close(): Promise<void>;
}
