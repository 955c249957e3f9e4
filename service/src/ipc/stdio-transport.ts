import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { JsonRpcServer } from "./json-rpc-server.js";

const log = createLogger("stdio-transport");

type Readable = NodeJS.ReadableStream;
type Writable = { write(chunk: string): unknown };

/** Newline-delimited JSON-RPC: one request per input line, one response per output line. */
export function serveStdio(
  rpc: JsonRpcServer,
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): () => void {
  input.setEncoding("utf-8");
  let buffer = "";

  const onData = (chunk: string | Buffer) => {
    buffer += chunk.toString();
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";

    for (const line of lines) {
      if (!line.trim()) continue;
      rpc
        .handleRequest(line.trim())
        .then((response) => {
          output.write(response + "\n");
        })
        .catch((err: unknown) => log.error("Failed to answer request", { error: errorMessage(err) }));
    }
  };

  input.on("data", onData);
  return () => {
    input.off("data", onData);
  };
}
