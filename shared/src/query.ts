import type { ResourceKind, ResourcePayloads } from "./resources.js";

// Responses of the read-only query surface.

export type ResourceView<K extends ResourceKind> =
  | {
      status: "ok";
      kind: K;
      sequence: number;
      fetchedAt: number;
      payload: ResourcePayloads[K];
    }
  | { status: "not_polled"; kind: K };

export type Versioned<T> =
  | { status: "ok"; sequence: number; fetchedAt: number; data: T }
  | { status: "not_polled" }
  | { status: "not_found" };

export type PollerState = "idle" | "waiting" | "fetching" | "applying" | "failed";

export type PollerHealth = {
  kind: ResourceKind;
  state: PollerState;
  attempts: number;
  /** Consecutive failed attempts; reset by a success. */
  failCount: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
  lastError?: string;
};

export type BucketUsage = {
  bucket: string;
  intervalMs: number;
  limit: number;
  used: number;
};

export type ServiceStatus = {
  startedAt: number;
  pollers: PollerHealth[];
  rateLimits: BucketUsage[];
  store: Record<ResourceKind, { sequence: number | null; conflicts: number }>;
  durabilityGaps: number;
};
