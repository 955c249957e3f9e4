import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  INVALID_PARAMS,
  INVALID_REQUEST,
  JsonRpcError,
  PARSE_ERROR,
  createJsonRpcError,
  createJsonRpcResponse,
  parseJsonRpcRequest,
  parseParams,
} from "../ipc/json-rpc.js";

function thrownBy(fn: () => unknown): JsonRpcError {
  try {
    fn();
  } catch (err) {
    if (err instanceof JsonRpcError) return err;
    throw err;
  }
  throw new Error("expected a JsonRpcError");
}

describe("JSON-RPC message parsing", () => {
  it("parses a valid request", () => {
    const raw = JSON.stringify({
      jsonrpc: "2.0",
      id: 1,
      method: "ping",
      params: {},
    });
    const req = parseJsonRpcRequest(raw);
    expect(req.method).toBe("ping");
    expect(req.id).toBe(1);
  });

  it("defaults missing params to an empty object", () => {
    const req = parseJsonRpcRequest(JSON.stringify({ jsonrpc: "2.0", id: "a", method: "ping" }));
    expect(req.params).toEqual({});
  });

  it("rejects invalid JSON with a parse error", () => {
    expect(thrownBy(() => parseJsonRpcRequest("not json")).code).toBe(PARSE_ERROR);
  });

  it("rejects missing method", () => {
    const err = thrownBy(() => parseJsonRpcRequest(JSON.stringify({ jsonrpc: "2.0", id: 1 })));
    expect(err.code).toBe(INVALID_REQUEST);
    expect(err.message).toContain("method");
  });

  it("rejects a request that is not JSON-RPC 2.0", () => {
    const err = thrownBy(() => parseJsonRpcRequest(JSON.stringify({ jsonrpc: "1.0", id: 1, method: "ping" })));
    expect(err.code).toBe(INVALID_REQUEST);
  });

  it("rejects positional params", () => {
    const raw = JSON.stringify({ jsonrpc: "2.0", id: 1, method: "ping", params: [1, 2] });
    expect(thrownBy(() => parseJsonRpcRequest(raw)).code).toBe(INVALID_REQUEST);
  });

  it("validates handler params against a schema", () => {
    const schema = z.object({ kind: z.enum(["a", "b"]) });
    expect(parseParams(schema, { kind: "a" })).toEqual({ kind: "a" });

    const err = thrownBy(() => parseParams(schema, { kind: "c" }));
    expect(err.code).toBe(INVALID_PARAMS);
    expect(err.message).toBe("Invalid params");
  });

  it("creates a valid response", () => {
    const resp = createJsonRpcResponse(1, { status: "ok" });
    expect(resp.jsonrpc).toBe("2.0");
    expect(resp.id).toBe(1);
    expect(resp.result).toEqual({ status: "ok" });
    expect(resp.error).toBeUndefined();
  });

  it("creates a valid error response", () => {
    const resp = createJsonRpcError(1, -32600, "Invalid Request");
    expect(resp.jsonrpc).toBe("2.0");
    expect(resp.id).toBe(1);
    expect(resp.error?.code).toBe(-32600);
    expect(resp.error?.message).toBe("Invalid Request");
    expect(resp.result).toBeUndefined();
  });
});
