import "dotenv/config";
import type { SnapshotLog } from "./storage/snapshot-log.js";
import { loadConfig, type LoadedConfig } from "./config-loader.js";
import { BinanceClient } from "./exchange/binance-client.js";
import { createRpcServer } from "./ipc/rpc-methods.js";
import { serveStdio } from "./ipc/stdio-transport.js";
import { WsTransport } from "./ipc/ws-transport.js";
import { Pipeline } from "./pipeline.js";
import { JsonlSnapshotLog } from "./storage/jsonl-snapshot-log.js";
import { SqliteSnapshotLog, openSnapshotDb } from "./storage/sqlite-snapshot-log.js";
import { createLogger, setLogLevel } from "./utils/logger.js";
import { errorMessage } from "./errors.js";

const log = createLogger("main");

export { Pipeline } from "./pipeline.js";
export { createRpcServer } from "./ipc/rpc-methods.js";
export { JsonRpcServer } from "./ipc/json-rpc-server.js";

export function openLog(loaded: LoadedConfig): SnapshotLog {
  return loaded.config.log.backend === "jsonl"
    ? new JsonlSnapshotLog(loaded.logPath)
    : new SqliteSnapshotLog(openSnapshotDb(loaded.logPath));
}

export async function start(loaded: LoadedConfig = loadConfig()): Promise<Pipeline> {
  const { config, credentials } = loaded;
  setLogLevel(config.logging.level);

  const client = new BinanceClient({
    baseUrl: config.exchange.baseUrl,
    apiKey: credentials.apiKey,
    apiSecret: credentials.apiSecret,
    signing: config.exchange.signing,
    privateKey: credentials.privateKey,
    recvWindowMs: config.exchange.recvWindowMs,
    timeoutMs: config.exchange.timeoutMs,
    symbols: config.exchange.symbols,
  });

  const pipeline = new Pipeline({
    config,
    client,
    log: openLog(loaded),
    hasCredentials: client.hasCredentials,
  });
  await pipeline.start();

  const rpc = createRpcServer({
    data: pipeline.data,
    health: () => pipeline.health(),
    refresh: (kind) => pipeline.refresh(kind),
    status: () => pipeline.status(),
  });

  const ws = new WsTransport(rpc, { host: config.server.host, port: config.server.port });
  try {
    await ws.start();
  } catch (err) {
    await pipeline.stop();
    throw err;
  }
  pipeline.addTransport(ws);

  if (config.server.stdio) {
    const detach = serveStdio(rpc);
    pipeline.addTransport({ stop: async () => detach() });
  }

  return pipeline;
}

function installShutdown(pipeline: Pipeline): void {
  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info("Shutting down", { signal });
    pipeline
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("Shutdown failed", { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Start when run directly
const isMain =
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("index.js");
if (isMain) {
  start()
    .then(installShutdown)
    .catch((err: unknown) => {
      log.error("Failed to start", { error: errorMessage(err) });
      process.exit(1);
    });
}
