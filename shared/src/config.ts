import { z } from "zod";
import { RateLimitRuleSchema, type RateLimitRule } from "./resources.js";

/** Spot API limits as published by the exchange; refreshed at runtime from exchangeInfo. */
export const DEFAULT_RATE_LIMITS: RateLimitRule[] = [
  { bucket: "REQUEST_WEIGHT", intervalMs: 60_000, limit: 6000 },
  { bucket: "RAW_REQUESTS", intervalMs: 300_000, limit: 61_000 },
  { bucket: "ORDERS", intervalMs: 10_000, limit: 100 },
  { bucket: "ORDERS", intervalMs: 86_400_000, limit: 200_000 },
  { bucket: "SAPI_IP_WEIGHT", intervalMs: 60_000, limit: 12_000 },
];

const ExchangeConfigSchema = z.object({
  baseUrl: z.string().url().default("https://api.binance.com"),
  apiKeyEnv: z.string().min(1).default("BINANCE_API_KEY"),
  apiSecretEnv: z.string().min(1).default("BINANCE_API_SECRET"),
  recvWindowMs: z.number().int().positive().max(60_000).default(5000),
  timeoutMs: z.number().int().positive().default(10_000),
  /** Restrict exchangeInfo to these symbols; all listed symbols when absent. */
  symbols: z.array(z.string().min(1)).min(1).optional(),
  /** How signed requests are signed: the API secret (HMAC-SHA256) or an Ed25519 private key. */
  signing: z.enum(["hmac", "ed25519"]).default("hmac"),
  /** PEM file holding the Ed25519 private key, resolved against the working directory. */
  privateKeyPath: z.string().min(1).optional(),
}).refine((e) => e.signing !== "ed25519" || e.privateKeyPath !== undefined, {
  message: "privateKeyPath is required for ed25519 signing",
  path: ["privateKeyPath"],
});

function resourcePollSchema(defaults: { intervalMs: number; bucket: string; weight: number }) {
  return z
    .object({
      intervalMs: z.number().int().positive().default(defaults.intervalMs),
      bucket: z.string().min(1).default(defaults.bucket),
      weight: z.number().int().positive().default(defaults.weight),
      enabled: z.boolean().default(true),
    })
    .default({});
}

const ResourcesConfigSchema = z.object({
  exchangeInfo: resourcePollSchema({ intervalMs: 60_000, bucket: "REQUEST_WEIGHT", weight: 20 }),
  accountInfo: resourcePollSchema({ intervalMs: 30_000, bucket: "REQUEST_WEIGHT", weight: 20 }),
  systemStatus: resourcePollSchema({ intervalMs: 10_000, bucket: "SAPI_IP_WEIGHT", weight: 1 }),
});

const PollerConfigSchema = z.object({
  pollOnStart: z.boolean().default(true),
  publishOnLogFailure: z.boolean().default(false),
});

const LogConfigSchema = z.object({
  backend: z.enum(["sqlite", "jsonl"]).default("sqlite"),
  /** SQLite database file, or the directory holding one file per kind for jsonl. */
  path: z.string().min(1).optional(),
});

const ServerConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65_535).default(8000),
  stdio: z.boolean().default(false),
});

const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ConfigSchema = z.object({
  exchange: ExchangeConfigSchema.default({}),
  resources: ResourcesConfigSchema.default({}),
  rateLimits: z.array(RateLimitRuleSchema).min(1).default(DEFAULT_RATE_LIMITS),
  poller: PollerConfigSchema.default({}),
  log: LogConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}
