import { describe, it, expect } from "vitest";
import { entry, exchangeInfo, failure, success, systemStatus } from "../../__tests__/fixtures.js";
import { SqliteSnapshotLog, openSnapshotDb } from "../sqlite-snapshot-log.js";
import { StateStore } from "../state-store.js";

describe("StateStore", () => {
  it("is empty until a kind is applied", () => {
    const store = new StateStore();
    expect(store.read("systemStatus")).toBeUndefined();
  });

  it("applies a success with a greater sequence", () => {
    const store = new StateStore();
    expect(store.update(success("systemStatus", 1, systemStatus("normal")))).toBe("applied");
    expect(store.update(success("systemStatus", 2, systemStatus("maintenance")))).toBe("applied");

    expect(store.read("systemStatus")?.sequence).toBe(2);
    expect(store.read("systemStatus")?.payload.status).toBe("maintenance");
  });

  it("ignores failure snapshots", () => {
    const store = new StateStore();
    store.update(success("systemStatus", 1, systemStatus()));

    expect(store.update(failure("systemStatus", 2))).toBe("ignored");
    expect(store.read("systemStatus")?.sequence).toBe(1);
  });

  it("discards an older or equal sequence and counts the conflict", () => {
    const store = new StateStore();
    store.update(success("systemStatus", 5, systemStatus("maintenance")));

    expect(store.update(success("systemStatus", 3, systemStatus("normal")))).toBe("stale");
    expect(store.update(success("systemStatus", 5, systemStatus("normal")))).toBe("stale");

    expect(store.read("systemStatus")?.payload.status).toBe("maintenance");
    expect(store.conflictCount("systemStatus")).toBe(2);
    expect(store.conflictCount("exchangeInfo")).toBe(0);
  });

  it("keeps the highest sequence whatever order updates arrive in", () => {
    const orders = [
      [1, 2, 3, 4, 5],
      [5, 4, 3, 2, 1],
      [3, 1, 5, 2, 4],
      [2, 5, 1, 4, 3],
    ];
    for (const order of orders) {
      const store = new StateStore();
      for (const seq of order) {
        store.update(success("systemStatus", seq, { status: "normal", message: `seq ${seq}` }));
      }
      expect(store.read("systemStatus")?.sequence).toBe(5);
      expect(store.read("systemStatus")?.payload.message).toBe("seq 5");
    }
  });

  it("keeps slots of different kinds apart", () => {
    const store = new StateStore();
    store.update(success("systemStatus", 9, systemStatus()));
    expect(store.update(success("exchangeInfo", 1, exchangeInfo()))).toBe("applied");

    expect(store.stats()).toEqual({
      exchangeInfo: { sequence: 1, conflicts: 0 },
      accountInfo: { sequence: null, conflicts: 0 },
      systemStatus: { sequence: 9, conflicts: 0 },
    });
  });

  it("freezes stored snapshots so readers see a stable value", () => {
    const store = new StateStore();
    store.update(success("exchangeInfo", 1, exchangeInfo()));

    const held = store.read("exchangeInfo");
    expect(Object.isFrozen(held)).toBe(true);
    expect(Object.isFrozen(held?.payload.symbols[0])).toBe(true);

    store.update(success("exchangeInfo", 2, exchangeInfo({ symbols: [] })));
    expect(held?.payload.symbols).toHaveLength(1);
    expect(store.read("exchangeInfo")?.payload.symbols).toHaveLength(0);
  });

  it("warm-starts from the latest logged success of each kind", async () => {
    const log = new SqliteSnapshotLog(openSnapshotDb(":memory:"));
    await log.append(entry(success("systemStatus", 1, systemStatus("normal"))));
    await log.append(entry(success("systemStatus", 2, systemStatus("maintenance"))));
    await log.append(entry(failure("systemStatus", 3)));
    await log.append(entry(failure("exchangeInfo", 1)));

    const store = new StateStore();
    const restored = await store.warmStart(log);

    expect(restored).toEqual(["systemStatus"]);
    expect(store.read("systemStatus")).toEqual(success("systemStatus", 2, systemStatus("maintenance")));
    expect(store.read("exchangeInfo")).toBeUndefined();
    await log.close();
  });
});
