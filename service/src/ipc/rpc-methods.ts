import { z } from "zod";
import { ResourceKindSchema, type PollerHealth, type ResourceKind, type ServiceStatus } from "@refdata/shared";
import type { TickOutcome } from "../polling/resource-poller.js";
import type { DataService } from "../query/data-service.js";
import { INVALID_PARAMS, JsonRpcError, parseParams } from "./json-rpc.js";
import { JsonRpcServer } from "./json-rpc-server.js";

export type RpcContext = {
  data: DataService;
  health(): PollerHealth[];
  /** `undefined` when no poller runs for the kind. */
  refresh(kind: ResourceKind): Promise<TickOutcome> | undefined;
  status(): ServiceStatus;
};

const KindParams = z.object({ kind: ResourceKindSchema });
const SymbolParams = z.object({ symbol: z.string().min(1) });

export function createRpcServer(ctx: RpcContext): JsonRpcServer {
  const server = new JsonRpcServer();

  server.register("ping", async () => ({
    status: "ok",
    timestamp: Date.now(),
  }));

  server.register("resource:get", async (params) => {
    const { kind } = parseParams(KindParams, params);
    return ctx.data.query(kind);
  });

  server.register("exchange:rateLimits", async () => ctx.data.rateLimits());
  server.register("exchange:symbols", async () => ctx.data.listSymbols());

  server.register("exchange:symbol", async (params) => {
    const { symbol } = parseParams(SymbolParams, params);
    return ctx.data.symbol(symbol);
  });

  server.register("system:status", async () => ctx.data.systemStatus());
  server.register("account:info", async () => ctx.data.accountInfo());
  server.register("poller:health", async () => ctx.health());

  server.register("poller:refresh", async (params) => {
    const { kind } = parseParams(KindParams, params);
    const pending = ctx.refresh(kind);
    if (!pending) {
      throw new JsonRpcError(INVALID_PARAMS, `Poller not enabled: ${kind}`);
    }
    return pending;
  });

  server.register("service:status", async () => ctx.status());

  return server;
}
