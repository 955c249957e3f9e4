export type {
  ResourceKind,
  SymbolRule,
  RateLimitRule,
  ExchangeInfo,
  AccountProfile,
  SystemStatusValue,
  SystemStatus,
  ResourcePayloads,
  FetchErrorKind,
  SuccessSnapshot,
  FailureSnapshot,
  ResourceSnapshot,
  LogEntry,
} from "./resources.js";

export {
  RESOURCE_KINDS,
  isSuccess,
  SymbolRuleSchema,
  ExchangeInfoSchema,
  AccountProfileSchema,
  ResourceKindSchema,
  parseLogEntry,
} from "./resources.js";

export type {
  ResourceView,
  Versioned,
  PollerState,
  PollerHealth,
  BucketUsage,
  ServiceStatus,
} from "./query.js";

export {
  type Config,
  ConfigSchema,
  DEFAULT_RATE_LIMITS,
  parseConfig,
} from "./config.js";
