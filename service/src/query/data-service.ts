import type {
  AccountProfile,
  RateLimitRule,
  ResourceKind,
  ResourcePayloads,
  ResourceView,
  SymbolRule,
  SystemStatus,
  Versioned,
} from "@refdata/shared";
import type { StateStore } from "../storage/state-store.js";

/**
 * Read-only view over the state store. Every answer is taken from the
 * snapshot currently in the store; nothing here waits on a poll.
 */
export class DataService {
  private store: StateStore;

  constructor(store: StateStore) {
    this.store = store;
  }

  query<K extends ResourceKind>(kind: K): ResourceView<K> {
    const snapshot = this.store.read(kind);
    if (!snapshot) return { status: "not_polled", kind };
    return {
      status: "ok",
      kind,
      sequence: snapshot.sequence,
      fetchedAt: snapshot.fetchedAt,
      payload: snapshot.payload,
    };
  }

  rateLimits(): Versioned<RateLimitRule[]> {
    return this.project("exchangeInfo", (info) => info.rateLimits);
  }

  listSymbols(): Versioned<string[]> {
    return this.project("exchangeInfo", (info) => info.symbols.map((s) => s.symbol));
  }

  symbol(name: string): Versioned<SymbolRule> {
    const snapshot = this.store.read("exchangeInfo");
    if (!snapshot) return { status: "not_polled" };

    const wanted = name.toUpperCase();
    const rule = snapshot.payload.symbols.find((s) => s.symbol === wanted);
    if (!rule) return { status: "not_found" };
    return { status: "ok", sequence: snapshot.sequence, fetchedAt: snapshot.fetchedAt, data: rule };
  }

  systemStatus(): Versioned<SystemStatus> {
    return this.project("systemStatus", (status) => status);
  }

  accountInfo(): Versioned<AccountProfile> {
    return this.project("accountInfo", (profile) => profile);
  }

  private project<K extends ResourceKind, T>(
    kind: K,
    select: (payload: ResourcePayloads[K]) => T,
  ): Versioned<T> {
    const view = this.query(kind);
    if (view.status !== "ok") return { status: "not_polled" };
    return { status: "ok", sequence: view.sequence, fetchedAt: view.fetchedAt, data: select(view.payload) };
  }
}
