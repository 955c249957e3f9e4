import Decimal from "decimal.js";
import { z } from "zod";
import {
  AccountProfileSchema,
  SymbolRuleSchema,
  type AccountProfile,
  type ExchangeInfo,
  type RateLimitRule,
  type SymbolRule,
  type SystemStatus,
} from "@refdata/shared";
import { ExchangeError } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("binance-parsers");

const INTERVAL_MS = {
  SECOND: 1000,
  MINUTE: 60_000,
  HOUR: 3_600_000,
  DAY: 86_400_000,
} as const;

// Raw response shapes; only the fields we read are declared.

const RawRateLimitSchema = z.object({
  rateLimitType: z.string().min(1),
  interval: z.enum(["SECOND", "MINUTE", "HOUR", "DAY"]),
  intervalNum: z.number().int().positive(),
  limit: z.number().int().positive(),
});

const RawFilterSchema = z.object({ filterType: z.string() }).catchall(z.unknown());

const RawSymbolSchema = z.object({
  symbol: z.string(),
  status: z.string(),
  baseAsset: z.string(),
  quoteAsset: z.string(),
  filters: z.array(RawFilterSchema),
});

const RawExchangeInfoSchema = z.object({
  timezone: z.string(),
  serverTime: z.number().int().nonnegative(),
  rateLimits: z.array(RawRateLimitSchema),
  symbols: z.array(RawSymbolSchema),
});

const RawAccountSchema = z.object({
  accountType: z.string(),
  canTrade: z.boolean(),
  canWithdraw: z.boolean(),
  canDeposit: z.boolean(),
  updateTime: z.number().int().nonnegative(),
  commissionRates: z.object({
    maker: z.string(),
    taker: z.string(),
    buyer: z.string(),
    seller: z.string(),
  }),
  permissions: z.array(z.string()).default([]),
  balances: z.array(z.object({ asset: z.string(), free: z.string(), locked: z.string() })),
});

const RawSystemStatusSchema = z.object({
  status: z.union([z.literal(0), z.literal(1)]),
  msg: z.string(),
});

function describeIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ExchangeError("parse", `Unexpected ${what} response: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function toRateLimitRule(raw: z.infer<typeof RawRateLimitSchema>): RateLimitRule {
  return {
    bucket: raw.rateLimitType,
    intervalMs: INTERVAL_MS[raw.interval] * raw.intervalNum,
    limit: raw.limit,
  };
}

function findFilter(symbol: z.infer<typeof RawSymbolSchema>, type: string) {
  return symbol.filters.find((f) => f.filterType === type);
}

function positiveDecimal(value: unknown): string | undefined {
  if (typeof value !== "string" || !/^\d+(\.\d+)?$/.test(value)) return undefined;
  return new Decimal(value).greaterThan(0) ? value : undefined;
}

export function toSymbolRule(
  raw: z.infer<typeof RawSymbolSchema>,
): { ok: true; rule: SymbolRule } | { ok: false; reason: string } {
  const price = findFilter(raw, "PRICE_FILTER");
  const lot = findFilter(raw, "LOT_SIZE");
  const marketLot = findFilter(raw, "MARKET_LOT_SIZE");

  const candidate = {
    symbol: raw.symbol,
    status: raw.status,
    baseAsset: raw.baseAsset,
    quoteAsset: raw.quoteAsset,
    tickSize: price?.tickSize,
    lotSize: lot?.stepSize,
    // A zero MARKET_LOT_SIZE step means market orders follow LOT_SIZE
    stepSize: positiveDecimal(marketLot?.stepSize) ?? lot?.stepSize,
    minPrice: price?.minPrice,
    maxPrice: price?.maxPrice,
    minQty: lot?.minQty,
    maxQty: lot?.maxQty,
  };

  const result = SymbolRuleSchema.safeParse(candidate);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  return { ok: true, rule: result.data };
}

export function parseExchangeInfo(raw: unknown): ExchangeInfo {
  const data = parseOrThrow(RawExchangeInfoSchema, raw, "exchangeInfo");

  const symbols: SymbolRule[] = [];
  const rejectedSymbols: string[] = [];

  for (const rawSymbol of data.symbols) {
    const parsed = toSymbolRule(rawSymbol);
    if (parsed.ok) {
      symbols.push(parsed.rule);
    } else {
      rejectedSymbols.push(rawSymbol.symbol);
      log.warn("Symbol filters failed validation", { symbol: rawSymbol.symbol, reason: parsed.reason });
    }
  }

  return {
    timezone: data.timezone,
    serverTime: data.serverTime,
    rateLimits: data.rateLimits.map(toRateLimitRule),
    symbols,
    rejectedSymbols,
  };
}

export function parseAccountInfo(raw: unknown): AccountProfile {
  const data = parseOrThrow(RawAccountSchema, raw, "account");

  const balances: AccountProfile["balances"] = {};
  for (const b of data.balances) {
    balances[b.asset] = { free: b.free, locked: b.locked };
  }

  return parseOrThrow(
    AccountProfileSchema,
    {
      accountType: data.accountType,
      canTrade: data.canTrade,
      canWithdraw: data.canWithdraw,
      canDeposit: data.canDeposit,
      updateTime: data.updateTime,
      commissionRates: data.commissionRates,
      permissions: data.permissions,
      balances,
    },
    "account",
  );
}

export function parseSystemStatus(raw: unknown): SystemStatus {
  const data = parseOrThrow(RawSystemStatusSchema, raw, "system status");
  return {
    status: data.status === 0 ? "normal" : "maintenance",
    message: data.msg,
  };
}
