import { describe, it, expect } from "vitest";
import { accountProfile, BTCUSDT, exchangeInfo, success, systemStatus } from "../../__tests__/fixtures.js";
import { StateStore } from "../../storage/state-store.js";
import { DataService } from "../data-service.js";

function serviceWith(store = new StateStore()) {
  return { store, data: new DataService(store) };
}

describe("DataService", () => {
  it("reports not_polled before the first success", () => {
    const { data } = serviceWith();

    expect(data.query("exchangeInfo")).toEqual({ status: "not_polled", kind: "exchangeInfo" });
    expect(data.rateLimits()).toEqual({ status: "not_polled" });
    expect(data.symbol("BTCUSDT")).toEqual({ status: "not_polled" });
    expect(data.systemStatus()).toEqual({ status: "not_polled" });
    expect(data.accountInfo()).toEqual({ status: "not_polled" });
  });

  it("returns the stored snapshot with its sequence", () => {
    const { store, data } = serviceWith();
    store.update(success("systemStatus", 4, systemStatus("maintenance"), 1234));

    expect(data.query("systemStatus")).toEqual({
      status: "ok",
      kind: "systemStatus",
      sequence: 4,
      fetchedAt: 1234,
      payload: { status: "maintenance", message: "system_maintenance" },
    });
    expect(data.systemStatus()).toEqual({
      status: "ok",
      sequence: 4,
      fetchedAt: 1234,
      data: { status: "maintenance", message: "system_maintenance" },
    });
  });

  it("projects exchangeInfo into rate limits and symbols", () => {
    const { store, data } = serviceWith();
    const eth = { ...BTCUSDT, symbol: "ETHUSDT", baseAsset: "ETH" };
    store.update(success("exchangeInfo", 2, exchangeInfo({ symbols: [BTCUSDT, eth] }), 500));

    expect(data.rateLimits()).toEqual({
      status: "ok",
      sequence: 2,
      fetchedAt: 500,
      data: [{ bucket: "REQUEST_WEIGHT", intervalMs: 60_000, limit: 6000 }],
    });
    expect(data.listSymbols()).toEqual({ status: "ok", sequence: 2, fetchedAt: 500, data: ["BTCUSDT", "ETHUSDT"] });
  });

  it("looks up a symbol case-insensitively", () => {
    const { store, data } = serviceWith();
    store.update(success("exchangeInfo", 1, exchangeInfo()));

    const found = data.symbol("btcusdt");
    expect(found.status).toBe("ok");
    if (found.status === "ok") {
      expect(found.data.tickSize).toBe("0.00010000");
      expect(found.data.lotSize).toBe("0.00100000");
    }
    expect(data.symbol("DOGEUSDT")).toEqual({ status: "not_found" });
  });

  it("returns the account profile", () => {
    const { store, data } = serviceWith();
    store.update(success("accountInfo", 3, accountProfile()));

    const account = data.accountInfo();
    expect(account.status === "ok" && account.data.balances.BTC).toEqual({ free: "0.25000000", locked: "0.00000000" });
  });

  it("keeps answering from the previous snapshot until a newer one lands", () => {
    const { store, data } = serviceWith();
    store.update(success("systemStatus", 1, systemStatus("normal")));
    const before = data.query("systemStatus");

    store.update(success("systemStatus", 2, systemStatus("maintenance")));

    expect(before.status === "ok" && before.payload.status).toBe("normal");
    expect(data.query("systemStatus")).toMatchObject({ status: "ok", sequence: 2 });
  });
});
