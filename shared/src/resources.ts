import Decimal from "decimal.js";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Resource kinds
// ---------------------------------------------------------------------------

export const RESOURCE_KINDS = ["exchangeInfo", "accountInfo", "systemStatus"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

// ---------------------------------------------------------------------------
// Payload types
// ---------------------------------------------------------------------------

export type SymbolRule = {
  symbol: string;
  status: string;
  baseAsset: string;
  quoteAsset: string;
  tickSize: string;
  /** LOT_SIZE step: increment for limit order quantities. */
  lotSize: string;
  /** MARKET_LOT_SIZE step, or the LOT_SIZE step when the market step is absent or zero. */
  stepSize: string;
  minPrice: string;
  maxPrice: string;
  minQty: string;
  maxQty: string;
};

export type RateLimitRule = {
  bucket: string;
  intervalMs: number;
  limit: number;
};

export type ExchangeInfo = {
  timezone: string;
  serverTime: number;
  rateLimits: RateLimitRule[];
  symbols: SymbolRule[];
  /** Symbols present in the response whose filters failed validation. */
  rejectedSymbols: string[];
};

export type Balance = {
  free: string;
  locked: string;
};

export type CommissionRates = {
  maker: string;
  taker: string;
  buyer: string;
  seller: string;
};

export type AccountProfile = {
  accountType: string;
  canTrade: boolean;
  canWithdraw: boolean;
  canDeposit: boolean;
  updateTime: number;
  commissionRates: CommissionRates;
  permissions: string[];
  balances: Record<string, Balance>;
};

export type SystemStatusValue = "normal" | "maintenance";

export type SystemStatus = {
  status: SystemStatusValue;
  message: string;
};

export type ResourcePayloads = {
  exchangeInfo: ExchangeInfo;
  accountInfo: AccountProfile;
  systemStatus: SystemStatus;
};

// ---------------------------------------------------------------------------
// Snapshots and log entries
// ---------------------------------------------------------------------------

export type FetchErrorKind = "network" | "timeout" | "http" | "parse" | "unknown";

type SuccessOutcome = { status: "success" };

type FailureOutcome = { status: "failure"; errorKind: FetchErrorKind; message: string };

export type SuccessSnapshot<K extends ResourceKind = ResourceKind> = {
  kind: K;
  sequence: number;
  fetchedAt: number;
  outcome: SuccessOutcome;
  payload: ResourcePayloads[K];
};

export type FailureSnapshot<K extends ResourceKind = ResourceKind> = {
  kind: K;
  sequence: number;
  fetchedAt: number;
  outcome: FailureOutcome;
  payload: null;
};

export type ResourceSnapshot<K extends ResourceKind = ResourceKind> =
  | SuccessSnapshot<K>
  | FailureSnapshot<K>;

/** A snapshot as recorded by the persistence log. */
export type LogEntry<K extends ResourceKind = ResourceKind> = ResourceSnapshot<K> & {
  writtenAt: number;
};

export function isSuccess<K extends ResourceKind>(
  snapshot: ResourceSnapshot<K>,
): snapshot is SuccessSnapshot<K> {
  return snapshot.outcome.status === "success";
}

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

const DecimalStringSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal string");

const PositiveDecimalSchema = DecimalStringSchema.refine(
  (v) => new Decimal(v).greaterThan(0),
  "must be positive",
);

export const SymbolRuleSchema: z.ZodType<SymbolRule> = z
  .object({
    symbol: z.string().min(1),
    status: z.string().min(1),
    baseAsset: z.string(),
    quoteAsset: z.string(),
    tickSize: PositiveDecimalSchema,
    lotSize: PositiveDecimalSchema,
    stepSize: PositiveDecimalSchema,
    minPrice: PositiveDecimalSchema,
    maxPrice: PositiveDecimalSchema,
    minQty: PositiveDecimalSchema,
    maxQty: PositiveDecimalSchema,
  })
  .refine((r) => new Decimal(r.minPrice).lessThanOrEqualTo(r.maxPrice), {
    message: "minPrice must not exceed maxPrice",
    path: ["minPrice"],
  })
  .refine((r) => new Decimal(r.minQty).lessThanOrEqualTo(r.maxQty), {
    message: "minQty must not exceed maxQty",
    path: ["minQty"],
  });

export const RateLimitRuleSchema: z.ZodType<RateLimitRule> = z.object({
  bucket: z.string().min(1),
  intervalMs: z.number().int().positive(),
  limit: z.number().int().positive(),
});

export const ExchangeInfoSchema: z.ZodType<ExchangeInfo> = z.object({
  timezone: z.string(),
  serverTime: z.number().int().nonnegative(),
  rateLimits: z.array(RateLimitRuleSchema),
  symbols: z.array(SymbolRuleSchema),
  rejectedSymbols: z.array(z.string()),
});

const BalanceSchema: z.ZodType<Balance> = z.object({
  free: DecimalStringSchema,
  locked: DecimalStringSchema,
});

export const AccountProfileSchema: z.ZodType<AccountProfile> = z.object({
  accountType: z.string(),
  canTrade: z.boolean(),
  canWithdraw: z.boolean(),
  canDeposit: z.boolean(),
  updateTime: z.number().int().nonnegative(),
  commissionRates: z.object({
    maker: DecimalStringSchema,
    taker: DecimalStringSchema,
    buyer: DecimalStringSchema,
    seller: DecimalStringSchema,
  }),
  permissions: z.array(z.string()),
  balances: z.record(BalanceSchema),
});

const SystemStatusSchema: z.ZodType<SystemStatus> = z.object({
  status: z.enum(["normal", "maintenance"]),
  message: z.string(),
});

export const ResourceKindSchema = z.enum(RESOURCE_KINDS);

const FailureOutcomeSchema = z.object({
  status: z.literal("failure"),
  errorKind: z.enum(["network", "timeout", "http", "parse", "unknown"]),
  message: z.string(),
});

function successEntrySchema<K extends ResourceKind, P>(kind: K, payload: z.ZodType<P>) {
  return z.object({
    kind: z.literal(kind),
    sequence: z.number().int().positive(),
    fetchedAt: z.number().int().nonnegative(),
    writtenAt: z.number().int().nonnegative(),
    outcome: z.object({ status: z.literal("success") }),
    payload,
  });
}

function failureEntrySchema<K extends ResourceKind>(kind: K) {
  return z.object({
    kind: z.literal(kind),
    sequence: z.number().int().positive(),
    fetchedAt: z.number().int().nonnegative(),
    writtenAt: z.number().int().nonnegative(),
    outcome: FailureOutcomeSchema,
    payload: z.null(),
  });
}

const LOG_ENTRY_SCHEMAS: { [K in ResourceKind]: z.ZodType<LogEntry<K>> } = {
  exchangeInfo: z.union([
    successEntrySchema("exchangeInfo", ExchangeInfoSchema),
    failureEntrySchema("exchangeInfo"),
  ]),
  accountInfo: z.union([
    successEntrySchema("accountInfo", AccountProfileSchema),
    failureEntrySchema("accountInfo"),
  ]),
  systemStatus: z.union([
    successEntrySchema("systemStatus", SystemStatusSchema),
    failureEntrySchema("systemStatus"),
  ]),
};

/** Validate an entry read back from storage. */
export function parseLogEntry<K extends ResourceKind>(kind: K, raw: unknown): LogEntry<K> {
  const schema: z.ZodType<LogEntry<K>> = LOG_ENTRY_SCHEMAS[kind];
  return schema.parse(raw);
}
