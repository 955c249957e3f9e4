import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { JsonRpcServer } from "./json-rpc-server.js";

const log = createLogger("ws-transport");

export type WsTransportOptions = {
  host: string;
  /** 0 picks a free port. */
  port: number;
};

/** Serves JSON-RPC over WebSocket, one request per text frame. */
export class WsTransport {
  private rpc: JsonRpcServer;
  private options: WsTransportOptions;
  private wss: WebSocketServer | null = null;

  constructor(rpc: JsonRpcServer, options: WsTransportOptions) {
    this.rpc = rpc;
    this.options = options;
  }

  /** Resolves with the bound port once listening. */
  start(): Promise<number> {
    if (this.wss) throw new Error("WebSocket transport already started");

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ host: this.options.host, port: this.options.port });
      this.wss = wss;

      wss.once("error", reject);
      wss.once("listening", () => {
        wss.off("error", reject);
        wss.on("error", (err) => log.error("Server error", { error: err.message }));
        const address = wss.address();
        const port = typeof address === "object" ? address.port : this.options.port;
        log.info("Listening", { host: this.options.host, port });
        resolve(port);
      });
      wss.on("connection", (socket) => this.accept(socket));
    });
  }

  get clientCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(socket: WebSocket): void {
    log.debug("Client connected", { clients: this.clientCount });

    socket.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        log.warn("Ignoring binary frame");
        return;
      }
      this.rpc
        .handleRequest(rawText(data))
        .then((response) => {
          if (socket.readyState === socket.OPEN) socket.send(response);
        })
        .catch((err: unknown) => log.error("Failed to answer request", { error: errorMessage(err) }));
    });

    socket.on("error", (err) => log.warn("Client error", { error: err.message }));
    socket.on("close", () => log.debug("Client disconnected", { clients: this.clientCount }));
  }
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}
