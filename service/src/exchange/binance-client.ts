import * as crypto from "node:crypto";
import type { AccountProfile, ExchangeInfo, SystemStatus } from "@refdata/shared";
import { ExchangeError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { parseAccountInfo, parseExchangeInfo, parseSystemStatus } from "./binance-parsers.js";
import type { ExchangeClient } from "./types.js";

const log = createLogger("binance-client");

export type SigningMethod = "hmac" | "ed25519";

export type BinanceClientConfig = {
  baseUrl: string;
  apiKey?: string;
  apiSecret?: string;
  /** Ed25519 API keys sign with a private key instead of the shared secret. */
  signing?: SigningMethod;
  /** PEM-encoded Ed25519 private key, used when `signing` is "ed25519". */
  privateKey?: string;
  recvWindowMs: number;
  timeoutMs: number;
  /** Restrict exchangeInfo to these symbols; all symbols when empty. */
  symbols?: string[];
  now?: () => number;
};

export class BinanceClient implements ExchangeClient {
  private config: BinanceClientConfig;
  private now: () => number;
  private signing: SigningMethod;
  private signingKey: crypto.KeyObject | undefined;

  constructor(config: BinanceClientConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
    this.signing = config.signing ?? "hmac";
    if (this.signing === "ed25519" && config.privateKey) {
      this.signingKey = loadEd25519Key(config.privateKey);
    }
  }

  get hasCredentials(): boolean {
    if (!this.config.apiKey) return false;
    return this.signing === "ed25519" ? this.signingKey !== undefined : Boolean(this.config.apiSecret);
  }

  async fetchExchangeInfo(): Promise<ExchangeInfo> {
    const params = new URLSearchParams();
    if (this.config.symbols && this.config.symbols.length > 0) {
      params.set("symbols", JSON.stringify(this.config.symbols));
    }
    const body = await this.request("/api/v3/exchangeInfo", params);
    return parseExchangeInfo(body);
  }

  async fetchAccountInfo(): Promise<AccountProfile> {
    const body = await this.signedRequest(
      "/api/v3/account",
      new URLSearchParams({ omitZeroBalances: "true" }),
    );
    return parseAccountInfo(body);
  }

  async fetchSystemStatus(): Promise<SystemStatus> {
    const body = await this.request("/sapi/v1/system/status", new URLSearchParams());
    return parseSystemStatus(body);
  }

  /**
   * Signature over the exact query string sent: HMAC-SHA256 hex with the API
   * secret, or Ed25519 base64 with the private key.
   */
  sign(query: string): string {
    if (this.signing === "ed25519") {
      if (!this.signingKey) {
        throw new ExchangeError("http", "Ed25519 private key is not configured", { status: 401 });
      }
      return crypto.sign(null, Buffer.from(query), this.signingKey).toString("base64");
    }
    if (!this.config.apiSecret) {
      throw new ExchangeError("http", "API secret is not configured", { status: 401 });
    }
    return crypto.createHmac("sha256", this.config.apiSecret).update(query).digest("hex");
  }

  private async signedRequest(path: string, params: URLSearchParams): Promise<unknown> {
    if (!this.config.apiKey) {
      throw new ExchangeError("http", "API key is not configured", { status: 401 });
    }
    params.set("recvWindow", String(this.config.recvWindowMs));
    params.set("timestamp", String(this.now()));
    params.set("signature", this.sign(params.toString()));
    return this.request(path, params, { "X-MBX-APIKEY": this.config.apiKey });
  }

  private async request(
    path: string,
    params: URLSearchParams,
    headers: Record<string, string> = {},
  ): Promise<unknown> {
    const query = params.toString();
    const url = `${this.config.baseUrl}${path}${query ? `?${query}` : ""}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const startTime = Date.now();

    try {
      let response: Response;
      try {
        response = await globalThis.fetch(url, { headers, signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new ExchangeError("timeout", `${path} timed out after ${this.config.timeoutMs}ms`, {
            cause: err,
          });
        }
        throw new ExchangeError("network", `${path} request failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      if (!response.ok) {
        const text = await readBody(response);
        throw new ExchangeError("http", `${path} returned HTTP ${response.status}: ${text}`, {
          status: response.status,
        });
      }

      try {
        const body: unknown = await response.json();
        log.debug("Exchange request completed", { path, latencyMs: Date.now() - startTime });
        return body;
      } catch (err) {
        if (controller.signal.aborted) {
          throw new ExchangeError("timeout", `${path} timed out reading the response body`, {
            cause: err,
          });
        }
        throw new ExchangeError("parse", `${path} returned a body that is not JSON`, { cause: err });
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

function loadEd25519Key(pem: string): crypto.KeyObject {
  const key = crypto.createPrivateKey(pem);
  if (key.asymmetricKeyType !== "ed25519") {
    throw new Error(`Expected an Ed25519 private key, got ${key.asymmetricKeyType ?? "a symmetric key"}`);
  }
  return key;
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    return `<unreadable body: ${errorMessage(err)}>`;
  }
}
