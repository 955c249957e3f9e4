import Database from "better-sqlite3";
import { isSuccess, parseLogEntry, type LogEntry, type ResourceKind } from "@refdata/shared";
import { LogWriteError, errorMessage } from "../errors.js";
import type { LogReadOptions, SnapshotLog, SuccessLogEntry } from "./snapshot-log.js";

type InsertParams = [
  kind: string,
  sequence: number,
  fetchedAt: number,
  writtenAt: number,
  status: string,
  errorKind: string | null,
  errorMessage: string | null,
  payload: string | null,
];

type LogRow = {
  kind: string;
  sequence: number;
  fetched_at: number;
  written_at: number;
  status: string;
  error_kind: string | null;
  error_message: string | null;
  payload: string | null;
};

export function openSnapshotDb(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("synchronous = FULL");
  return db;
}

export class SqliteSnapshotLog implements SnapshotLog {
  private db: Database.Database;
  private insertStmt: Database.Statement<InsertParams>;
  private maxSeqStmt: Database.Statement<[string], { max: number | null }>;
  private latestSuccessStmt: Database.Statement<[string], LogRow>;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshot_log (
        kind TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        fetched_at INTEGER NOT NULL,
        written_at INTEGER NOT NULL,
        status TEXT NOT NULL CHECK(status IN ('success','failure')),
        error_kind TEXT,
        error_message TEXT,
        payload TEXT,
        PRIMARY KEY (kind, sequence)
      ) WITHOUT ROWID;
      CREATE INDEX IF NOT EXISTS idx_snapshot_log_fetched ON snapshot_log(kind, fetched_at);
      CREATE TRIGGER IF NOT EXISTS snapshot_log_no_update BEFORE UPDATE ON snapshot_log
        BEGIN SELECT RAISE(ABORT, 'snapshot_log is append-only'); END;
      CREATE TRIGGER IF NOT EXISTS snapshot_log_no_delete BEFORE DELETE ON snapshot_log
        BEGIN SELECT RAISE(ABORT, 'snapshot_log is append-only'); END;
    `);

    this.insertStmt = this.db.prepare<InsertParams>(
      `INSERT INTO snapshot_log
         (kind, sequence, fetched_at, written_at, status, error_kind, error_message, payload)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.maxSeqStmt = this.db.prepare<[string], { max: number | null }>(
      "SELECT MAX(sequence) AS max FROM snapshot_log WHERE kind = ?",
    );
    this.latestSuccessStmt = this.db.prepare<[string], LogRow>(
      `SELECT * FROM snapshot_log WHERE kind = ? AND status = 'success'
       ORDER BY sequence DESC LIMIT 1`,
    );
  }

  async append<K extends ResourceKind>(entry: LogEntry<K>): Promise<void> {
    const write = this.db.transaction(() => {
      const last = this.maxSeqStmt.get(entry.kind)?.max ?? 0;
      if (entry.sequence <= last) {
        throw new LogWriteError(
          entry.kind,
          entry.sequence,
          `sequence must be greater than ${last}`,
        );
      }
      const failure = entry.outcome.status === "failure" ? entry.outcome : null;
      this.insertStmt.run(
        entry.kind,
        entry.sequence,
        entry.fetchedAt,
        entry.writtenAt,
        entry.outcome.status,
        failure?.errorKind ?? null,
        failure?.message ?? null,
        entry.payload === null ? null : JSON.stringify(entry.payload),
      );
    });

    try {
      write();
    } catch (err) {
      if (err instanceof LogWriteError) throw err;
      throw new LogWriteError(entry.kind, entry.sequence, errorMessage(err), err);
    }
  }

  async read<K extends ResourceKind>(kind: K, options: LogReadOptions = {}): Promise<LogEntry<K>[]> {
    let sql = "SELECT * FROM snapshot_log WHERE kind = ? AND sequence > ? ORDER BY sequence";
    const params: (string | number)[] = [kind, options.afterSequence ?? 0];
    if (options.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(options.limit);
    }

    const rows = this.db.prepare<(string | number)[], LogRow>(sql).all(...params);
    return rows.map((row) => parseLogEntry(kind, fromRow(row)));
  }

  async lastSequence(kind: ResourceKind): Promise<number> {
    return this.maxSeqStmt.get(kind)?.max ?? 0;
  }

  async latestSuccess<K extends ResourceKind>(kind: K): Promise<SuccessLogEntry<K> | undefined> {
    const row = this.latestSuccessStmt.get(kind);
    if (!row) return undefined;
    const entry = parseLogEntry(kind, fromRow(row));
    return isSuccess(entry) ? entry : undefined;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}

function fromRow(row: LogRow): Record<string, unknown> {
  return {
    kind: row.kind,
    sequence: row.sequence,
    fetchedAt: row.fetched_at,
    writtenAt: row.written_at,
    outcome:
      row.status === "success"
        ? { status: "success" }
        : { status: "failure", errorKind: row.error_kind, message: row.error_message },
    payload: row.payload === null ? null : JSON.parse(row.payload),
  };
}
