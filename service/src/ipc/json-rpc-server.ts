import {
  INTERNAL_ERROR,
  JsonRpcError,
  METHOD_NOT_FOUND,
  createJsonRpcError,
  createJsonRpcResponse,
  parseJsonRpcRequest,
  requestId,
  type JsonRpcId,
} from "./json-rpc.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("json-rpc");

export type JsonRpcHandler = (params: Record<string, unknown>) => Promise<unknown>;

export class JsonRpcServer {
  private handlers = new Map<string, JsonRpcHandler>();

  register(method: string, handler: JsonRpcHandler): void {
    if (this.handlers.has(method)) {
      throw new Error(`Method already registered: ${method}`);
    }
    this.handlers.set(method, handler);
  }

  listMethods(): string[] {
    return [...this.handlers.keys()];
  }

  /** Answer one serialized request; never rejects. */
  async handleRequest(raw: string): Promise<string> {
    let id: JsonRpcId | null = null;

    try {
      const req = parseJsonRpcRequest(raw);
      id = req.id;

      const handler = this.handlers.get(req.method);
      if (!handler) {
        return JSON.stringify(createJsonRpcError(id, METHOD_NOT_FOUND, `Method not found: ${req.method}`));
      }

      const result = await handler(req.params ?? {});
      return JSON.stringify(createJsonRpcResponse(id, result));
    } catch (err) {
      if (err instanceof JsonRpcError) {
        if (id === null) {
          // Rejected before dispatch; echo whatever id could be recovered
          return JSON.stringify(createJsonRpcError(requestId(err.data), err.code, err.message));
        }
        return JSON.stringify(createJsonRpcError(id, err.code, err.message, err.data));
      }
      log.error("Handler failed", { id, error: errorMessage(err) });
      return JSON.stringify(createJsonRpcError(id, INTERNAL_ERROR, errorMessage(err)));
    }
  }
}
