import * as fs from "node:fs";
import * as path from "node:path";
import type { FileHandle } from "node:fs/promises";
import { isSuccess, parseLogEntry, type LogEntry, type ResourceKind } from "@refdata/shared";
import { LogWriteError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { LogReadOptions, SnapshotLog, SuccessLogEntry } from "./snapshot-log.js";

const log = createLogger("jsonl-snapshot-log");

/**
 * One append-only `<kind>.jsonl` file per resource kind. Each record is a
 * single JSON line, written and `datasync`ed before `append` resolves. Appends
 * for a kind run one at a time through a promise chain.
 */
export type JsonlSnapshotLogOptions = {
  open?: (filePath: string) => Promise<FileHandle>;
};

export class JsonlSnapshotLog implements SnapshotLog {
  private baseDir: string;
  private open: (filePath: string) => Promise<FileHandle>;
  private handles = new Map<ResourceKind, FileHandle>();
  private chains = new Map<ResourceKind, Promise<void>>();
  private lastSeq = new Map<ResourceKind, number>();
  private closed = false;

  constructor(baseDir: string, options: JsonlSnapshotLogOptions = {}) {
    this.baseDir = baseDir;
    this.open = options.open ?? ((filePath) => fs.promises.open(filePath, "a+"));
    fs.mkdirSync(this.baseDir, { recursive: true });
  }

  append<K extends ResourceKind>(entry: LogEntry<K>): Promise<void> {
    const previous = this.chains.get(entry.kind) ?? Promise.resolve();
    const next = previous.then(() => this.write(entry));
    // The chain only orders writes; each caller observes its own result through `next`.
    this.chains.set(
      entry.kind,
      next.then(
        () => undefined,
        () => undefined,
      ),
    );
    return next;
  }

  async read<K extends ResourceKind>(kind: K, options: LogReadOptions = {}): Promise<LogEntry<K>[]> {
    const after = options.afterSequence ?? 0;
    const entries = (await this.readAll(kind)).filter((e) => e.sequence > after);
    return options.limit !== undefined ? entries.slice(0, options.limit) : entries;
  }

  async lastSequence(kind: ResourceKind): Promise<number> {
    const cached = this.lastSeq.get(kind);
    if (cached !== undefined) return cached;

    const entries = await this.readAll(kind);
    const last = entries.length > 0 ? entries[entries.length - 1]?.sequence ?? 0 : 0;
    this.lastSeq.set(kind, last);
    return last;
  }

  async latestSuccess<K extends ResourceKind>(kind: K): Promise<SuccessLogEntry<K> | undefined> {
    const entries = await this.readAll(kind);
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry && isSuccess(entry)) return entry;
    }
    return undefined;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all(this.chains.values());
    for (const handle of this.handles.values()) {
      await handle.close();
    }
    this.handles.clear();
  }

  getPath(kind: ResourceKind): string {
    return path.join(this.baseDir, `${kind}.jsonl`);
  }

  private async write<K extends ResourceKind>(entry: LogEntry<K>): Promise<void> {
    if (this.closed) {
      throw new LogWriteError(entry.kind, entry.sequence, "log is closed");
    }

    try {
      const last = await this.lastSequence(entry.kind);
      if (entry.sequence <= last) {
        throw new LogWriteError(entry.kind, entry.sequence, `sequence must be greater than ${last}`);
      }

      const handle = await this.handle(entry.kind);
      await handle.write(JSON.stringify(entry) + "\n");
      await handle.datasync();
      this.lastSeq.set(entry.kind, entry.sequence);
    } catch (err) {
      if (err instanceof LogWriteError) throw err;
      // A failed write may leave part of a record behind; reopening terminates it.
      await this.discardHandle(entry.kind);
      throw new LogWriteError(entry.kind, entry.sequence, errorMessage(err), err);
    }
  }

  private async discardHandle(kind: ResourceKind): Promise<void> {
    const handle = this.handles.get(kind);
    if (!handle) return;
    this.handles.delete(kind);
    try {
      await handle.close();
    } catch (err) {
      log.warn("Failed to close log file after a write error", { kind, error: errorMessage(err) });
    }
  }

  private async handle(kind: ResourceKind): Promise<FileHandle> {
    const existing = this.handles.get(kind);
    if (existing) return existing;

    const filePath = this.getPath(kind);
    const handle = await this.open(filePath);
    const { size } = await handle.stat();

    // Terminate a record torn by a crash so the next one starts on its own line.
    if (size > 0) {
      const tail = Buffer.alloc(1);
      await handle.read(tail, 0, 1, size - 1);
      if (tail.toString("utf-8") !== "\n") {
        log.warn("Terminating torn record at end of log file", { kind, file: filePath });
        await handle.write("\n");
        await handle.datasync();
      }
    }

    this.handles.set(kind, handle);
    return handle;
  }

  private async readAll<K extends ResourceKind>(kind: K): Promise<LogEntry<K>[]> {
    const filePath = this.getPath(kind);
    if (!fs.existsSync(filePath)) return [];

    const content = await fs.promises.readFile(filePath, "utf-8");
    const entries: LogEntry<K>[] = [];
    const lines = content.split("\n");

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        // An append that never completed; it was never acknowledged.
        log.warn("Skipping torn record", { kind, line: i + 1 });
        continue;
      }
      entries.push(parseLogEntry(kind, raw));
    }

    return entries;
  }
}
