import { z } from "zod";

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;

export type JsonRpcId = number | string;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
};

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
};

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string()]),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

/** Thrown by handlers to answer with a specific JSON-RPC error code. */
export class JsonRpcError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = "JsonRpcError";
    this.code = code;
    this.data = data;
  }
}

export function parseJsonRpcRequest(raw: string): JsonRpcRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new JsonRpcError(PARSE_ERROR, "Parse error");
  }

  const result = JsonRpcRequestSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "request"}: ${i.message}`)
      .join("; ");
    throw new JsonRpcError(INVALID_REQUEST, `Invalid Request: ${detail}`, { id: requestId(parsed) });
  }

  return { ...result.data, params: result.data.params ?? {} };
}

/** Validate handler params, answering -32602 on mismatch. */
export function parseParams<T>(schema: z.ZodType<T>, params: Record<string, unknown>): T {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new JsonRpcError(INVALID_PARAMS, "Invalid params", result.error.issues);
  }
  return result.data;
}

export function createJsonRpcResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function createJsonRpcError(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message, data } };
}

/** The id of a malformed request, when it carried a usable one. */
export function requestId(parsed: unknown): JsonRpcId | null {
  if (typeof parsed !== "object" || parsed === null || !("id" in parsed)) return null;
  const { id } = parsed;
  return typeof id === "number" || typeof id === "string" ? id : null;
}
