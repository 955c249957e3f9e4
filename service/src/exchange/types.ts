import type {
  AccountProfile,
  ExchangeInfo,
  ResourceKind,
  ResourcePayloads,
  SystemStatus,
} from "@refdata/shared";

/**
 * One call per polled resource. Implementations throw `ExchangeError` for
 * transport, HTTP and schema failures; retries are the caller's tick cadence.
 */
export interface ExchangeClient {
  fetchExchangeInfo(): Promise<ExchangeInfo>;
  fetchAccountInfo(): Promise<AccountProfile>;
  fetchSystemStatus(): Promise<SystemStatus>;
}

export type ResourceFetcher<K extends ResourceKind> = () => Promise<ResourcePayloads[K]>;

export type ResourceFetchers = { [K in ResourceKind]: ResourceFetcher<K> };

export function resourceFetchers(client: ExchangeClient): ResourceFetchers {
  return {
    exchangeInfo: () => client.fetchExchangeInfo(),
    accountInfo: () => client.fetchAccountInfo(),
    systemStatus: () => client.fetchSystemStatus(),
  };
}
