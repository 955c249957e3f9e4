import type {
  AccountProfile,
  ExchangeInfo,
  FailureSnapshot,
  FetchErrorKind,
  LogEntry,
  ResourceKind,
  ResourcePayloads,
  ResourceSnapshot,
  SuccessSnapshot,
  SymbolRule,
  SystemStatus,
  SystemStatusValue,
} from "@refdata/shared";
import { ExchangeError } from "../errors.js";
import type { ExchangeClient } from "../exchange/types.js";

export const BTCUSDT: SymbolRule = {
  symbol: "BTCUSDT",
  status: "TRADING",
  baseAsset: "BTC",
  quoteAsset: "USDT",
  tickSize: "0.00010000",
  lotSize: "0.00100000",
  stepSize: "0.00100000",
  minPrice: "0.01000000",
  maxPrice: "1000000.00000000",
  minQty: "0.00001000",
  maxQty: "9000.00000000",
};

export function exchangeInfo(overrides: Partial<ExchangeInfo> = {}): ExchangeInfo {
  return {
    timezone: "UTC",
    serverTime: 1_700_000_000_000,
    rateLimits: [{ bucket: "REQUEST_WEIGHT", intervalMs: 60_000, limit: 6000 }],
    symbols: [BTCUSDT],
    rejectedSymbols: [],
    ...overrides,
  };
}

export function accountProfile(): AccountProfile {
  return {
    accountType: "SPOT",
    canTrade: true,
    canWithdraw: true,
    canDeposit: true,
    updateTime: 1_700_000_000_000,
    commissionRates: { maker: "0.00100000", taker: "0.00100000", buyer: "0", seller: "0" },
    permissions: ["SPOT"],
    balances: { BTC: { free: "0.25000000", locked: "0.00000000" } },
  };
}

export function systemStatus(status: SystemStatusValue = "normal"): SystemStatus {
  return { status, message: status === "normal" ? "normal" : "system_maintenance" };
}

export function success<K extends ResourceKind>(
  kind: K,
  sequence: number,
  payload: ResourcePayloads[K],
  fetchedAt = sequence * 1000,
): SuccessSnapshot<K> {
  return { kind, sequence, fetchedAt, outcome: { status: "success" }, payload };
}

export function failure<K extends ResourceKind>(
  kind: K,
  sequence: number,
  errorKind: FetchErrorKind = "network",
  fetchedAt = sequence * 1000,
): FailureSnapshot<K> {
  return {
    kind,
    sequence,
    fetchedAt,
    outcome: { status: "failure", errorKind, message: `${errorKind} failure` },
    payload: null,
  };
}

export function entry<K extends ResourceKind>(snapshot: ResourceSnapshot<K>, writtenAt?: number): LogEntry<K> {
  return { ...snapshot, writtenAt: writtenAt ?? snapshot.fetchedAt + 1 };
}

type Scripted<K extends ResourceKind> = ResourcePayloads[K] | Error;

/** Answers each fetch with the next scripted result; an empty script is a network error. */
export class ScriptedExchangeClient implements ExchangeClient {
  readonly calls: Record<ResourceKind, number> = { exchangeInfo: 0, accountInfo: 0, systemStatus: 0 };

  private scripts: { [K in ResourceKind]: Scripted<K>[] } = {
    exchangeInfo: [],
    accountInfo: [],
    systemStatus: [],
  };

  enqueue<K extends ResourceKind>(kind: K, ...results: Scripted<K>[]): this {
    const script: Scripted<K>[] = this.scripts[kind];
    script.push(...results);
    return this;
  }

  fetchExchangeInfo(): Promise<ExchangeInfo> {
    return this.next("exchangeInfo");
  }

  fetchAccountInfo(): Promise<AccountProfile> {
    return this.next("accountInfo");
  }

  fetchSystemStatus(): Promise<SystemStatus> {
    return this.next("systemStatus");
  }

  private async next<K extends ResourceKind>(kind: K): Promise<ResourcePayloads[K]> {
    this.calls[kind]++;
    const script: Scripted<K>[] = this.scripts[kind];
    const result = script.shift();
    if (result === undefined) {
      throw new ExchangeError("network", `no scripted ${kind} response`);
    }
    if (result instanceof Error) throw result;
    return result;
  }
}
