import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, vi, afterEach } from "vitest";
import { parseConfig } from "@refdata/shared";
import { ExchangeError } from "../../errors.js";
import { Pipeline } from "../../pipeline.js";
import { SqliteSnapshotLog, openSnapshotDb } from "../../storage/sqlite-snapshot-log.js";
import type { SnapshotLog } from "../../storage/snapshot-log.js";
import { accountProfile, exchangeInfo, ScriptedExchangeClient, systemStatus } from "../fixtures.js";

const NOW = 1_700_000_000_000;

function build(options: { raw?: unknown; log?: SnapshotLog; hasCredentials?: boolean } = {}) {
  const client = new ScriptedExchangeClient();
  const log = options.log ?? new SqliteSnapshotLog(openSnapshotDb(":memory:"));
  const pipeline = new Pipeline({
    config: parseConfig(options.raw ?? { poller: { pollOnStart: false } }),
    client,
    log,
    hasCredentials: options.hasCredentials ?? false,
    now: () => NOW,
  });
  return { client, log, pipeline };
}

describe("Pipeline: poll, log, publish, serve", () => {
  const running: Pipeline[] = [];

  afterEach(async () => {
    for (const p of running.splice(0)) {
      if (p.isRunning) await p.stop();
    }
    vi.useRealTimers();
  });

  async function started(pipeline: Pipeline): Promise<Pipeline> {
    await pipeline.start();
    running.push(pipeline);
    return pipeline;
  }

  it("logs normal, maintenance, normal in order and serves the last one", async () => {
    const { client, log, pipeline } = build();
    client.enqueue("systemStatus", systemStatus("normal"), systemStatus("maintenance"), systemStatus("normal"));
    await started(pipeline);

    for (let i = 0; i < 3; i++) await pipeline.refresh("systemStatus");

    const logged = await log.read("systemStatus");
    expect(logged.map((e) => [e.sequence, e.payload?.status])).toEqual([
      [1, "normal"],
      [2, "maintenance"],
      [3, "normal"],
    ]);
    expect(pipeline.data.systemStatus()).toEqual({
      status: "ok",
      sequence: 3,
      fetchedAt: NOW,
      data: { status: "normal", message: "normal" },
    });
  });

  it("keeps serving the last good snapshot after a transport failure", async () => {
    const { client, log, pipeline } = build();
    client.enqueue("systemStatus", systemStatus("maintenance"), new ExchangeError("network", "ECONNRESET"));
    await started(pipeline);

    await pipeline.refresh("systemStatus");
    const outcome = await pipeline.refresh("systemStatus");

    expect(outcome).toEqual({ status: "failed", sequence: 2, errorKind: "network" });
    expect(pipeline.data.query("systemStatus")).toMatchObject({ status: "ok", sequence: 1 });
    const [, failed] = await log.read("systemStatus");
    expect(failed?.outcome).toEqual({ status: "failure", errorKind: "network", message: "ECONNRESET" });
  });

  it("adopts the exchange's rate limits once exchangeInfo is applied", async () => {
    const { client, pipeline } = build();
    const info = exchangeInfo({ rateLimits: [{ bucket: "REQUEST_WEIGHT", intervalMs: 60_000, limit: 40 }] });
    client.enqueue("exchangeInfo", info, info, info);
    await started(pipeline);

    await pipeline.refresh("exchangeInfo");
    expect(pipeline.limiter.usage().filter((u) => u.bucket === "REQUEST_WEIGHT")).toEqual([
      { bucket: "REQUEST_WEIGHT", intervalMs: 60_000, limit: 40, used: 20 },
    ]);

    expect(await pipeline.refresh("exchangeInfo")).toEqual({ status: "applied", sequence: 2, durable: true });
    expect(await pipeline.refresh("exchangeInfo")).toEqual({ status: "deferred", retryAfterMs: 60_000 });
    expect(client.calls.exchangeInfo).toBe(2);
  });

  it("warm-starts from the log and continues its numbering after a restart", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "refdata-pipeline-"));
    const file = path.join(dir, "refdata.db");
    try {
      const first = build({ log: new SqliteSnapshotLog(openSnapshotDb(file)) });
      first.client.enqueue("systemStatus", systemStatus("maintenance"), new ExchangeError("timeout", "slow"));
      await first.pipeline.start();
      await first.pipeline.refresh("systemStatus");
      await first.pipeline.refresh("systemStatus");
      await first.pipeline.stop();

      const second = build({ log: new SqliteSnapshotLog(openSnapshotDb(file)) });
      second.client.enqueue("systemStatus", systemStatus("normal"));
      await started(second.pipeline);

      expect(second.pipeline.data.systemStatus()).toMatchObject({
        status: "ok",
        sequence: 1,
        data: { status: "maintenance" },
      });
      expect(await second.pipeline.refresh("systemStatus")).toEqual({
        status: "applied",
        sequence: 3,
        durable: true,
      });
      await second.pipeline.stop();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("polls accountInfo only with credentials", async () => {
    const without = await started(build().pipeline);
    expect(without.health().map((h) => h.kind)).toEqual(["exchangeInfo", "systemStatus"]);
    expect(without.refresh("accountInfo")).toBeUndefined();

    const { client, pipeline } = build({ hasCredentials: true });
    client.enqueue("accountInfo", accountProfile());
    await started(pipeline);

    expect(pipeline.health().map((h) => h.kind)).toEqual(["exchangeInfo", "accountInfo", "systemStatus"]);
    await pipeline.refresh("accountInfo");
    expect(pipeline.data.accountInfo()).toMatchObject({ status: "ok", sequence: 1 });
  });

  it("leaves out a poller disabled in config", async () => {
    const { pipeline } = build({
      raw: { poller: { pollOnStart: false }, resources: { exchangeInfo: { enabled: false } } },
    });
    await started(pipeline);

    expect(pipeline.health().map((h) => h.kind)).toEqual(["systemStatus"]);
  });

  it("refuses a manual refresh before start", () => {
    const { pipeline } = build();
    expect(() => pipeline.refresh("systemStatus")).toThrow("Pipeline is not running");
  });

  it("counts durability gaps in the service status", async () => {
    const log = new SqliteSnapshotLog(openSnapshotDb(":memory:"));
    const { client, pipeline } = build({ log });
    client.enqueue("systemStatus", systemStatus("normal"), systemStatus("normal"));
    await started(pipeline);

    await pipeline.refresh("systemStatus");
    const appendSpy = vi.spyOn(log, "append").mockRejectedValueOnce(new Error("disk full"));
    expect(await pipeline.refresh("systemStatus")).toEqual({
      status: "failed",
      sequence: 2,
      errorKind: "log-write",
    });
    appendSpy.mockRestore();

    const status = pipeline.status();
    expect(status.durabilityGaps).toBe(1);
    expect(status.startedAt).toBe(NOW);
    expect(status.store.systemStatus).toEqual({ sequence: 1, conflicts: 0 });
    expect(status.pollers.find((p) => p.kind === "systemStatus")?.lastError).toBe(
      "Log append failed for systemStatus#2: disk full",
    );
  });

  it("drives every poller from the scheduler", async () => {
    vi.useFakeTimers();
    const { client, log, pipeline } = build({
      raw: { resources: { systemStatus: { intervalMs: 1000 } } },
    });
    client.enqueue("exchangeInfo", exchangeInfo());
    client.enqueue("systemStatus", systemStatus("normal"), systemStatus("maintenance"), systemStatus("normal"));
    await started(pipeline);

    await vi.advanceTimersByTimeAsync(1);
    await vi.advanceTimersByTimeAsync(2000);

    expect((await log.read("systemStatus")).map((e) => e.sequence)).toEqual([1, 2, 3]);
    expect(pipeline.data.listSymbols()).toMatchObject({ status: "ok", data: ["BTCUSDT"] });
    expect(client.calls.exchangeInfo).toBe(1);

    await pipeline.stop();
  });
});
